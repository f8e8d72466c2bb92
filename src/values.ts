import { TYPE_WIDTHS, TypeCode } from "./constants";
import { TiffError } from "./errors";
import { type ByteSource, readAt, viewOf } from "./source";
import type {
  ByteOrder,
  FieldValue,
  Rational,
  RawEntry,
  ResolvedField,
} from "./types";

// Offsets are 32 bit, so no value can be longer than this.
const MAX_VALUE_BYTES = 0xffffffff;

export function isTypeCode(value: number): value is TypeCode {
  return (
    Number.isInteger(value) &&
    value >= TypeCode.Byte &&
    value <= TypeCode.Double
  );
}

/**
 * Byte width of one element of `type`. Types listed with width 0
 * (UNDEFINED) are read one byte at a time.
 */
export function elementWidth(type: TypeCode): number {
  return TYPE_WIDTHS[type] || 1;
}

function unsupportedType(tag: number, type: number): TiffError {
  return new TiffError(
    "UnsupportedType",
    `Tag ${tag} has unsupported data type ${type}`,
    { stage: "value", tag },
  );
}

function checkedByteLength(tag: number, type: TypeCode, count: number): number {
  // count is at most 2^32 - 1 and widths at most 8, so the product is
  // exact in a double and can be compared directly.
  const total = elementWidth(type) * count;
  if (total > MAX_VALUE_BYTES) {
    throw new TiffError(
      "Overflow",
      `Tag ${tag}: ${count} elements of type ${type} exceed the 32-bit value range`,
      { stage: "value", tag },
    );
  }
  return total;
}

/**
 * Total byte length of an entry's value, checked against the 32 bit
 * address range of the file.
 *
 * @throws TiffError `UnsupportedType` for a type code outside 1-12
 * @throws TiffError `Overflow` when count × width cannot be addressed
 */
export function valueByteLength(entry: RawEntry): number {
  if (!isTypeCode(entry.type)) throw unsupportedType(entry.tag, entry.type);
  return checkedByteLength(entry.tag, entry.type, entry.count);
}

/**
 * Expands a raw entry into its typed values.
 *
 * Values of 4 bytes or less are packed left-aligned in the entry itself;
 * anything longer lives at the offset the entry holds. Both paths go
 * through the same element decoder.
 *
 * @param entry - Raw entry from {@link readRawDirectory}
 * @param source - The file the entry was read from
 * @param byteOrder - Byte order fixed by the header
 *
 * @example
 * ```typescript
 * const raw = readRawDirectory(source, header.firstIfdOffset, header.byteOrder);
 * const width = resolveValue(raw.entries[0], source, header.byteOrder);
 * // { tag: 256, type: 3, count: 1, value: { kind: "integer", values: [100] } }
 * ```
 */
export function resolveValue(
  entry: RawEntry,
  source: ByteSource,
  byteOrder: ByteOrder,
): ResolvedField {
  const { tag, type, count } = entry;
  if (!isTypeCode(type)) throw unsupportedType(tag, type);
  const total = checkedByteLength(tag, type, count);

  let bytes: Uint8Array;
  if (total <= 4) {
    bytes = entry.valueField.subarray(0, total);
  } else {
    const offset = viewOf(entry.valueField).getUint32(
      0,
      byteOrder === "little",
    );
    bytes = readAt(source, offset, total, { stage: "value", tag });
  }

  return {
    tag,
    type,
    count,
    value: decodeElements(bytes, type, count, byteOrder),
  };
}

/**
 * Decodes `count` elements of `type` from `bytes`, which must hold at
 * least `count * elementWidth(type)` bytes.
 */
export function decodeElements(
  bytes: Uint8Array,
  type: TypeCode,
  count: number,
  byteOrder: ByteOrder,
): FieldValue {
  const view = viewOf(bytes);
  const le = byteOrder === "little";
  const width = elementWidth(type);

  switch (type) {
    case TypeCode.Ascii:
      return { kind: "ascii", values: splitAscii(bytes.subarray(0, count)) };

    case TypeCode.Undefined:
      return { kind: "undefined", values: bytes.slice(0, count) };

    case TypeCode.Rational:
    case TypeCode.SRational: {
      const signed = type === TypeCode.SRational;
      const values: Rational[] = [];
      for (let i = 0; i < count; i++) {
        const at = i * width;
        values.push(
          signed
            ? {
                numerator: view.getInt32(at, le),
                denominator: view.getInt32(at + 4, le),
              }
            : {
                numerator: view.getUint32(at, le),
                denominator: view.getUint32(at + 4, le),
              },
        );
      }
      return { kind: "rational", values };
    }

    case TypeCode.Float:
    case TypeCode.Double: {
      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(
          type === TypeCode.Float
            ? view.getFloat32(i * width, le)
            : view.getFloat64(i * width, le),
        );
      }
      return { kind: "float", values };
    }

    case TypeCode.Byte:
    case TypeCode.SByte:
    case TypeCode.Short:
    case TypeCode.SShort:
    case TypeCode.Long:
    case TypeCode.SLong: {
      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(readInteger(view, i * width, type, le));
      }
      return { kind: "integer", values };
    }
  }
}

type IntegerType =
  | typeof TypeCode.Byte
  | typeof TypeCode.SByte
  | typeof TypeCode.Short
  | typeof TypeCode.SShort
  | typeof TypeCode.Long
  | typeof TypeCode.SLong;

function readInteger(
  view: DataView,
  offset: number,
  type: IntegerType,
  le: boolean,
): number {
  switch (type) {
    case TypeCode.Byte:
      return view.getUint8(offset);
    case TypeCode.SByte:
      return view.getInt8(offset);
    case TypeCode.Short:
      return view.getUint16(offset, le);
    case TypeCode.SShort:
      return view.getInt16(offset, le);
    case TypeCode.Long:
      return view.getUint32(offset, le);
    case TypeCode.SLong:
      return view.getInt32(offset, le);
  }
}

/**
 * Splits ASCII data into its NUL-terminated runs. A final run without a
 * terminator is kept.
 *
 * Each byte becomes one character (Latin-1), so string offsets equal byte
 * offsets. GeoKeys address GeoAsciiParams by byte.
 */
function splitAscii(bytes: Uint8Array): string[] {
  const runs: string[] = [];
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === 0) {
      runs.push(latin1(bytes.subarray(start, i)));
      start = i + 1;
    }
  }
  if (start < bytes.length) {
    runs.push(latin1(bytes.subarray(start)));
  }
  return runs;
}

function latin1(bytes: Uint8Array): string {
  let text = "";
  for (const b of bytes) text += String.fromCharCode(b);
  return text;
}
