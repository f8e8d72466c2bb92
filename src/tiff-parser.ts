import {
  BIG_ENDIAN_MAGIC,
  HEADER_LENGTH,
  IFD_ENTRY_LENGTH,
  LITTLE_ENDIAN_MAGIC,
} from "./constants";
import { TiffError } from "./errors";
import {
  type ByteSource,
  type SourceInput,
  readAt,
  toSource,
  viewOf,
} from "./source";
import type {
  ByteOrder,
  Directory,
  DirectoryWarning,
  RawDirectory,
  RawEntry,
  ResolvedField,
  TiffHeader,
  TiffStructure,
} from "./types";
import { resolveValue } from "./values";

// prevent infinite loops on malformed files
const MAX_IFDS = 1000;

function hasPrefix(bytes: Uint8Array, magic: readonly number[]): boolean {
  return magic.every((b, i) => bytes[i] === b);
}

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Parses the TIFF header.
 *
 * Bytes 0-3 must be exactly "II*\0" (little-endian) or "MM\0*"
 * (big-endian); the byte order they select applies to every later read
 * in the file. Bytes 4-7 hold the offset of the first IFD.
 *
 * @param input - File bytes or a {@link ByteSource}
 * @returns Byte order and first IFD offset
 * @throws TiffError `InvalidFormat` for any other magic, `Truncated` when
 * the source is shorter than the header
 *
 * @example
 * ```typescript
 * const header = parseHeader(await readFile("image.tif"));
 * console.log(header.byteOrder); // "little"
 * ```
 */
export function parseHeader(input: SourceInput): TiffHeader {
  const source = toSource(input);
  const magic = readAt(source, 0, 4, { stage: "header" });

  let byteOrder: ByteOrder;
  if (hasPrefix(magic, LITTLE_ENDIAN_MAGIC)) {
    byteOrder = "little";
  } else if (hasPrefix(magic, BIG_ENDIAN_MAGIC)) {
    byteOrder = "big";
  } else {
    throw new TiffError(
      "InvalidFormat",
      `Not a valid TIFF file: bad magic ${hex(magic)}`,
      { stage: "header", offset: 0 },
    );
  }

  const firstIfdOffset = viewOf(
    readAt(source, 4, HEADER_LENGTH - 4, { stage: "header" }),
  ).getUint32(0, byteOrder === "little");

  return { byteOrder, firstIfdOffset };
}

/**
 * Reads the raw entries of the IFD at `offset` without resolving them.
 *
 * An IFD is a 2 byte entry count N, N 12 byte entries and a 4 byte
 * offset to the next IFD. The whole `2 + 12 * N + 4` byte span must lie
 * within the source; a short directory is never partially returned.
 *
 * Entries are kept in file order, sorted or not.
 *
 * @throws TiffError `Truncated` when the directory runs past the source
 */
export function readRawDirectory(
  input: SourceInput,
  offset: number,
  byteOrder: ByteOrder,
): RawDirectory {
  const source = toSource(input);
  const le = byteOrder === "little";

  const entryCount = viewOf(
    readAt(source, offset, 2, { stage: "directory" }),
  ).getUint16(0, le);

  const length = 2 + entryCount * IFD_ENTRY_LENGTH + 4;
  if (offset + length > source.byteLength) {
    throw new TiffError(
      "Truncated",
      `IFD at offset ${offset} declares ${entryCount} entries (${length} bytes) but the source ends at ${source.byteLength}`,
      { stage: "directory", offset },
    );
  }

  const bytes = readAt(source, offset, length, { stage: "directory" });
  const view = viewOf(bytes);

  const entries: RawEntry[] = [];
  for (let i = 0; i < entryCount; i++) {
    const pos = 2 + i * IFD_ENTRY_LENGTH;
    entries.push({
      tag: view.getUint16(pos, le),
      type: view.getUint16(pos + 2, le),
      count: view.getUint32(pos + 4, le),
      valueField: bytes.slice(pos + 8, pos + IFD_ENTRY_LENGTH),
    });
  }

  const nextOffset = view.getUint32(length - 4, le);

  return { offset, entries, nextOffset };
}

/**
 * Parses and resolves a single IFD (Image File Directory).
 *
 * When a tag appears more than once the first entry wins; each later
 * one is skipped without being resolved and reported as a
 * `DuplicateTag` warning.
 *
 * Nothing is returned unless every entry resolves, so a caller never
 * sees a partly decoded directory.
 *
 * @param input - File bytes or a {@link ByteSource}
 * @param offset - Byte offset where this IFD begins
 * @param byteOrder - Byte order from {@link parseHeader}
 * @returns Resolved fields and pointer to the next IFD
 *
 * @example
 * ```typescript
 * const header = parseHeader(bytes);
 * const ifd = parseIfd(bytes, header.firstIfdOffset, header.byteOrder);
 * console.log(ifd.fields.size); // number of tags in this image
 * ```
 */
export function parseIfd(
  input: SourceInput,
  offset: number,
  byteOrder: ByteOrder,
): Directory {
  const source = toSource(input);
  const raw = readRawDirectory(source, offset, byteOrder);

  const fields = new Map<number, ResolvedField>();
  const warnings: DirectoryWarning[] = [];

  raw.entries.forEach((entry, index) => {
    if (fields.has(entry.tag)) {
      warnings.push({ code: "DuplicateTag", tag: entry.tag, index });
      return;
    }
    fields.set(entry.tag, resolveValue(entry, source, byteOrder));
  });

  return { offset, fields, nextOffset: raw.nextOffset, warnings };
}

/**
 * Parses all IFDs in a TIFF file by following the linked list.
 *
 * The header points to the first IFD, each IFD points to the next, and
 * the last IFD has a next offset of zero. Multi-page files and pyramids
 * of overviews both use this chain.
 *
 * @throws TiffError `InvalidFormat` if the chain is circular or exceeds
 * a reasonable depth
 */
export function parseAllIfds(
  source: ByteSource,
  header: TiffHeader,
): Directory[] {
  const ifds: Directory[] = [];
  const seenOffsets = new Set<number>();

  let currentOffset = header.firstIfdOffset;
  while (currentOffset !== 0) {
    if (ifds.length >= MAX_IFDS) {
      throw new TiffError(
        "InvalidFormat",
        `Exceeded maximum IFD count (${MAX_IFDS}), file may be malformed`,
        { stage: "directory", offset: currentOffset },
      );
    }

    if (seenOffsets.has(currentOffset)) {
      throw new TiffError(
        "InvalidFormat",
        `Circular IFD reference detected at offset ${currentOffset}`,
        { stage: "directory", offset: currentOffset },
      );
    }
    seenOffsets.add(currentOffset);

    const ifd = parseIfd(source, currentOffset, header.byteOrder);
    ifds.push(ifd);

    currentOffset = ifd.nextOffset;
  }

  return ifds;
}

/**
 * Parses the header and every IFD of a TIFF file.
 *
 * @param input - Raw bytes of the file, or a {@link ByteSource}
 * @returns The header and all directories in chain order
 *
 * @example
 * ```typescript
 * const tiff = parseTiff(await readFile("scene.tif"));
 * console.log(`Byte order: ${tiff.header.byteOrder}`);
 * console.log(`IFDs: ${tiff.ifds.length}`);
 * ```
 */
export function parseTiff(input: SourceInput): TiffStructure {
  const source = toSource(input);
  const header = parseHeader(source);
  const ifds = parseAllIfds(source, header);

  return { header, ifds };
}
