export type ByteOrder = "little" | "big";

export interface TiffHeader {
  byteOrder: ByteOrder;
  firstIfdOffset: number;
}

/** One 12 byte IFD slot exactly as stored. */
export interface RawEntry {
  tag: number;
  type: number;
  count: number;
  /** The 4 value-or-offset bytes, in file byte order. */
  valueField: Uint8Array;
}

export interface RawDirectory {
  offset: number;
  entries: RawEntry[];
  nextOffset: number;
}

export interface Rational {
  numerator: number;
  denominator: number;
}

export type FieldValue =
  | { kind: "integer"; values: number[] }
  | { kind: "rational"; values: Rational[] }
  | { kind: "float"; values: number[] }
  | { kind: "ascii"; values: string[] }
  | { kind: "undefined"; values: Uint8Array };

export interface ResolvedField {
  tag: number;
  type: number;
  count: number;
  value: FieldValue;
}

export interface DirectoryWarning {
  code: "DuplicateTag";
  tag: number;
  /** Position of the ignored entry within the directory. */
  index: number;
}

export interface Directory {
  offset: number;
  /** Resolved fields keyed by tag, in file order. */
  fields: ReadonlyMap<number, ResolvedField>;
  nextOffset: number;
  warnings: DirectoryWarning[];
}

export interface TiffStructure {
  header: TiffHeader;
  ifds: Directory[];
}

export type ImageMode =
  | "bilevel"
  | "paletted"
  | "gray"
  | "gray-inverted"
  | "rgb"
  | "rgba"
  | "nrgba";

export interface ModeResolution {
  mode: ImageMode;
  /** Zero samples are white: WhiteIsZero bilevel and gray images. */
  inverted: boolean;
  width: number;
  height: number;
  bitsPerSample: number[];
  samplesPerPixel: number;
  compression: number;
  photometric: number;
  extraSamples: number[];
  sampleFormat: number;
  planarConfiguration: number;
  /** Horizontal differencing must be undone after decompression. */
  predictor: boolean;
}

export type GeoKeyValue = number | number[] | string;

export interface GeoKeyEntry {
  id: number;
  /** 0 for an inline short, otherwise the tag holding the value. */
  location: number;
  count: number;
  value: GeoKeyValue;
}

export interface GeoKeyDirectory {
  version: number;
  keyRevision: number;
  minorRevision: number;
  keys: ReadonlyMap<number, GeoKeyEntry>;
}

export interface SegmentLayout {
  tiled: boolean;
  /** Segment width in pixels: the tile width, or the image width for strips. */
  segmentWidth: number;
  /** Segment height in pixels: the tile length or rows per strip. */
  segmentHeight: number;
  across: number;
  down: number;
  /** 1 for chunky images, SamplesPerPixel for planar ones. */
  planes: number;
  offsets: number[];
  byteCounts: number[];
}

/**
 * The raw bytes of one strip or tile plus what a decompressor needs to
 * turn them into pixels.
 */
export interface SegmentRequest {
  index: number;
  /** Sample plane, always 0 for chunky images. */
  plane: number;
  compression: number;
  predictor: boolean;
  /** Pixel rectangle covered, clipped to the image. */
  x: number;
  y: number;
  width: number;
  height: number;
  bytes: Uint8Array;
}

/** Affine coefficients `[a, b, c, d, e, f]`: x' = a*col + b*row + c, y' = d*col + e*row + f. */
export type GeoTransform = [number, number, number, number, number, number];
