import { Tag } from "./constants";
import { valueNumbers } from "./directory";
import { TiffError } from "./errors";
import type {
  Directory,
  GeoKeyDirectory,
  GeoKeyEntry,
  GeoKeyValue,
} from "./types";

const HEADER_WORDS = 4;
const KEY_WORDS = 4;

/**
 * Parses the GeoKey directory held in tag 34735, if there is one.
 *
 * The tag holds SHORTs: a header (version, key revision, minor revision,
 * number of keys) followed by one 4-short entry per key (key ID, tag
 * location, count, value or offset).
 *
 * A location of 0 means the value is the last short itself. Any other
 * location names a tag of the same IFD, usually GeoDoubleParams or
 * GeoAsciiParams, and the value is `count` elements of it starting at the
 * offset. ASCII values lose their trailing `|` separator. The lookup goes
 * exactly one level deep.
 *
 * @returns The parsed keys, or undefined when the IFD has no GeoKeys
 * @throws TiffError `MissingReferencedTag` when a key points at an absent
 * tag, `Truncated` when the directory or a referenced slice runs short
 *
 * @example
 * ```typescript
 * const geo = parseGeoKeys(tiff.ifds[0]);
 * const epsg = geo?.keys.get(GeoKey.ProjectedCSType)?.value; // 32633
 * ```
 */
export function parseGeoKeys(ifd: Directory): GeoKeyDirectory | undefined {
  const field = ifd.fields.get(Tag.GeoKeyDirectory);
  if (!field) return undefined;

  if (field.value.kind !== "integer") {
    throw new TiffError(
      "InvalidFormat",
      `GeoKeyDirectory must hold integers, found ${field.value.kind}`,
      { stage: "geokey", tag: Tag.GeoKeyDirectory },
    );
  }

  const shorts = field.value.values;
  const word = (i: number): number => shorts[i] ?? 0;

  if (shorts.length < HEADER_WORDS) {
    throw truncated(
      `GeoKeyDirectory holds ${shorts.length} values, too few for its header`,
      Tag.GeoKeyDirectory,
    );
  }

  const numberOfKeys = word(3);
  const needed = HEADER_WORDS + numberOfKeys * KEY_WORDS;
  if (shorts.length < needed) {
    throw truncated(
      `GeoKeyDirectory declares ${numberOfKeys} keys (${needed} values) but holds ${shorts.length}`,
      Tag.GeoKeyDirectory,
    );
  }

  const keys = new Map<number, GeoKeyEntry>();
  for (let k = 0; k < numberOfKeys; k++) {
    const base = HEADER_WORDS + k * KEY_WORDS;
    const id = word(base);
    const location = word(base + 1);
    const count = word(base + 2);
    const valueOrOffset = word(base + 3);

    if (keys.has(id)) continue;

    const value =
      location === 0
        ? valueOrOffset
        : readReferenced(ifd, id, location, count, valueOrOffset);

    keys.set(id, { id, location, count, value });
  }

  return {
    version: word(0),
    keyRevision: word(1),
    minorRevision: word(2),
    keys,
  };
}

function readReferenced(
  ifd: Directory,
  key: number,
  location: number,
  count: number,
  start: number,
): GeoKeyValue {
  const ref = ifd.fields.get(location);
  if (!ref) {
    throw new TiffError(
      "MissingReferencedTag",
      `GeoKey ${key} references tag ${location}, which is not in this IFD`,
      { stage: "geokey", tag: location },
    );
  }

  const end = start + count;

  if (ref.value.kind === "ascii") {
    // Runs hold one character per byte; rejoining them with the NULs that
    // split them restores byte offsets. The final terminator belongs to no
    // run.
    const text = ref.value.values.join("\0");
    if (end > text.length + 1) {
      throw truncated(
        `GeoKey ${key} reads characters ${start}-${end} of tag ${location}, which has ${text.length}`,
        location,
      );
    }
    return text.slice(start, end).replace(/\|$/, "");
  }

  const numbers = valueNumbers(ref.value) ?? [];
  if (end > numbers.length) {
    throw truncated(
      `GeoKey ${key} reads values ${start}-${end} of tag ${location}, which has ${numbers.length}`,
      location,
    );
  }
  return numbers.slice(start, end);
}

function truncated(message: string, tag: number): TiffError {
  return new TiffError("Truncated", message, { stage: "geokey", tag });
}
