/**
 * Failure codes raised while decoding.
 *
 * `UnsupportedCompression` and `UnsupportedConfiguration` describe images
 * that are well formed but that this package assigns no pixel mode to; a
 * caller may skip such an image and carry on with the next directory.
 */
export type TiffErrorCode =
  | "InvalidFormat"
  | "Truncated"
  | "Overflow"
  | "UnsupportedType"
  | "UnsupportedCompression"
  | "UnsupportedConfiguration"
  | "MissingTag"
  | "MissingReferencedTag";

/** The decoding step that raised an error. */
export type DecodeStage =
  | "header"
  | "directory"
  | "value"
  | "mode"
  | "geokey"
  | "layout";

export interface TiffErrorDetails {
  stage: DecodeStage;
  tag?: number;
  offset?: number;
}

export class TiffError extends Error {
  readonly code: TiffErrorCode;
  readonly stage: DecodeStage;
  readonly tag: number | undefined;
  readonly offset: number | undefined;

  constructor(code: TiffErrorCode, message: string, details: TiffErrorDetails) {
    super(message);
    this.name = "TiffError";
    this.code = code;
    this.stage = details.stage;
    this.tag = details.tag;
    this.offset = details.offset;
  }
}

/**
 * Returns true when the error marks an image that can be skipped rather
 * than a file that cannot be read.
 *
 * @example
 * ```typescript
 * for (const ifd of tiff.ifds) {
 *   try {
 *     modes.push(resolveMode(ifd));
 *   } catch (err) {
 *     if (!isRecoverable(err)) throw err;
 *   }
 * }
 * ```
 */
export function isRecoverable(err: unknown): boolean {
  return (
    err instanceof TiffError &&
    (err.code === "UnsupportedCompression" ||
      err.code === "UnsupportedConfiguration")
  );
}
