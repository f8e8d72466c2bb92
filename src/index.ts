export * from "./constants";
export * from "./directory";
export * from "./errors";
export * from "./geokeys";
export * from "./georeference";
export * from "./layout";
export * from "./mode";
export * from "./source";
export * from "./tiff-parser";
export type * from "./types";
export * from "./values";
