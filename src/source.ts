import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { TiffError, type TiffErrorDetails } from "./errors";

/**
 * Random access to the bytes of a TIFF file.
 *
 * Decoding only ever asks for "N bytes at offset" and never writes, so an
 * in-memory buffer and an open file work equally well.
 */
export interface ByteSource {
  readonly byteLength: number;
  read(offset: number, length: number): Uint8Array;
}

/**
 * A source backed by bytes already in memory.
 */
export class BufferSource implements ByteSource {
  private readonly bytes: Uint8Array;

  constructor(data: Uint8Array | ArrayBuffer) {
    this.bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  read(offset: number, length: number): Uint8Array {
    return this.bytes.slice(offset, offset + length);
  }
}

/**
 * A source that reads from an open file with positional reads, so only
 * the directories and values actually requested are loaded.
 *
 * @example
 * ```typescript
 * const source = new FileSource("scene.tif");
 * try {
 *   const tiff = parseTiff(source);
 * } finally {
 *   source.close();
 * }
 * ```
 */
export class FileSource implements ByteSource {
  private fd: number | null;
  readonly byteLength: number;

  constructor(path: string) {
    const fd = openSync(path, "r");
    try {
      this.byteLength = fstatSync(fd).size;
    } catch (err) {
      closeSync(fd);
      throw err;
    }
    this.fd = fd;
  }

  read(offset: number, length: number): Uint8Array {
    if (this.fd === null) {
      throw new Error("FileSource has been closed");
    }

    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = readSync(
        this.fd,
        out,
        filled,
        length - filled,
        offset + filled,
      );
      if (n === 0) break;
      filled += n;
    }

    return filled === length ? out : out.subarray(0, filled);
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

export type SourceInput = ByteSource | Uint8Array | ArrayBuffer;

export function toSource(input: SourceInput): ByteSource {
  if (input instanceof Uint8Array || input instanceof ArrayBuffer) {
    return new BufferSource(input);
  }
  return input;
}

/**
 * Reads exactly `length` bytes at `offset`, failing with `Truncated` when
 * any part of the range lies outside the source.
 */
export function readAt(
  source: ByteSource,
  offset: number,
  length: number,
  details: TiffErrorDetails,
): Uint8Array {
  const end = offset + length;
  if (offset < 0 || length < 0 || end > source.byteLength) {
    throw new TiffError(
      "Truncated",
      `Read of ${length} bytes at offset ${offset} exceeds source length ${source.byteLength}`,
      { ...details, offset },
    );
  }

  const bytes = source.read(offset, length);
  if (bytes.byteLength !== length) {
    throw new TiffError(
      "Truncated",
      `Short read at offset ${offset}: wanted ${length} bytes, got ${bytes.byteLength}`,
      { ...details, offset },
    );
  }

  return bytes;
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
