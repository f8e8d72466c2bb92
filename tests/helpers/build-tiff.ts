/**
 * Builds small TIFF files in memory for tests.
 *
 * Layout: 8 byte header, then every data blob in order, then each IFD
 * immediately followed by the out-of-line values of its entries. Blob
 * offsets are therefore known up front: the first blob starts at 8.
 */

export interface EntrySpec {
  tag: number;
  type: number;
  /** Rationals are given flattened: numerator, denominator, ... */
  values: number[] | string | Uint8Array;
  /** Overrides the count written to the entry. */
  count?: number;
  /** Overrides the value-or-offset field with this 32-bit number. */
  valueField?: number;
}

export interface IfdSpec {
  entries: EntrySpec[];
  /** Overrides the next-IFD pointer; defaults to the following IFD or 0. */
  next?: number;
}

export interface BuildOptions {
  byteOrder?: "little" | "big";
  data?: Uint8Array[];
}

export interface BuiltTiff {
  bytes: Uint8Array;
  ifdOffsets: number[];
  dataOffsets: number[];
}

const WIDTHS: Record<number, number> = {
  1: 1, 2: 1, 3: 2, 4: 4, 5: 8, 6: 1, 7: 1, 8: 2, 9: 4, 10: 8, 11: 4, 12: 8,
};

function encodeValues(
  spec: EntrySpec,
  le: boolean,
): { payload: Uint8Array; count: number } {
  const { type, values } = spec;

  if (values instanceof Uint8Array) {
    return { payload: values, count: values.length };
  }

  if (typeof values === "string") {
    const payload = new Uint8Array(values.length + 1);
    for (let i = 0; i < values.length; i++) payload[i] = values.charCodeAt(i);
    return { payload, count: payload.length };
  }

  const width = WIDTHS[type] ?? 1;
  const rational = type === 5 || type === 10;
  const count = rational ? values.length / 2 : values.length;
  const payload = new Uint8Array(count * width);
  const view = new DataView(payload.buffer);

  values.forEach((v, i) => {
    switch (type) {
      case 1:
      case 7:
        view.setUint8(i, v);
        break;
      case 6:
        view.setInt8(i, v);
        break;
      case 3:
        view.setUint16(i * 2, v, le);
        break;
      case 8:
        view.setInt16(i * 2, v, le);
        break;
      case 4:
      case 5:
        view.setUint32(i * 4, v, le);
        break;
      case 9:
      case 10:
        view.setInt32(i * 4, v, le);
        break;
      case 11:
        view.setFloat32(i * 4, v, le);
        break;
      case 12:
        view.setFloat64(i * 8, v, le);
        break;
    }
  });

  return { payload, count };
}

export function buildTiff(
  ifds: IfdSpec[],
  options: BuildOptions = {},
): BuiltTiff {
  const le = (options.byteOrder ?? "little") === "little";
  const data = options.data ?? [];

  let pos = 8;
  const dataOffsets = data.map((blob) => {
    const at = pos;
    pos += blob.length;
    return at;
  });

  const plans = ifds.map((ifd) => {
    const offset = pos;
    pos += 2 + ifd.entries.length * 12 + 4;
    const entries = ifd.entries.map((spec) => {
      const { payload, count } = encodeValues(spec, le);
      let external: number | undefined;
      if (payload.length > 4) {
        external = pos;
        pos += payload.length;
      }
      return { spec, payload, count, external };
    });
    return { ifd, offset, entries };
  });

  const bytes = new Uint8Array(pos);
  const view = new DataView(bytes.buffer);

  if (le) {
    bytes.set([0x49, 0x49, 0x2a, 0x00], 0);
  } else {
    bytes.set([0x4d, 0x4d, 0x00, 0x2a], 0);
  }
  view.setUint32(4, plans[0]?.offset ?? 0, le);

  data.forEach((blob, i) => bytes.set(blob, dataOffsets[i] ?? 0));

  plans.forEach((plan, p) => {
    let at = plan.offset;
    view.setUint16(at, plan.entries.length, le);
    at += 2;

    for (const { spec, payload, count, external } of plan.entries) {
      view.setUint16(at, spec.tag, le);
      view.setUint16(at + 2, spec.type, le);
      view.setUint32(at + 4, spec.count ?? count, le);
      if (external !== undefined) {
        bytes.set(payload, external);
        view.setUint32(at + 8, external, le);
      } else {
        bytes.set(payload, at + 8);
      }
      if (spec.valueField !== undefined) {
        view.setUint32(at + 8, spec.valueField, le);
      }
      at += 12;
    }

    const next = plan.ifd.next ?? plans[p + 1]?.offset ?? 0;
    view.setUint32(at, next, le);
  });

  return { bytes, ifdOffsets: plans.map((p) => p.offset), dataOffsets };
}

/** Shorthand for a single SHORT entry. */
export function short(tag: number, ...values: number[]): EntrySpec {
  return { tag, type: 3, values };
}

/** Shorthand for a LONG entry. */
export function long(tag: number, ...values: number[]): EntrySpec {
  return { tag, type: 4, values };
}
