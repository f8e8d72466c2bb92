import { Tag, nameOf } from "./constants";
import type { Directory, FieldValue, ResolvedField } from "./types";

export function getField(
  ifd: Directory,
  tag: number,
): ResolvedField | undefined {
  return ifd.fields.get(tag);
}

export function hasTag(ifd: Directory, tag: number): boolean {
  return ifd.fields.has(tag);
}

/**
 * Numeric view of a field value. Rationals become `numerator /
 * denominator` (0 when the denominator is 0), undefined bytes become
 * their byte values, and ASCII has no numeric view.
 */
export function valueNumbers(value: FieldValue): number[] | undefined {
  switch (value.kind) {
    case "integer":
    case "float":
      return value.values;
    case "rational":
      return value.values.map((r) =>
        r.denominator !== 0 ? r.numerator / r.denominator : 0,
      );
    case "undefined":
      return Array.from(value.values);
    case "ascii":
      return undefined;
  }
}

/**
 * Retrieves a tag's values as numbers.
 *
 * @returns The values, or undefined if the tag is absent or is ASCII
 */
export function getNumbers(ifd: Directory, tag: number): number[] | undefined {
  const field = ifd.fields.get(tag);
  return field ? valueNumbers(field.value) : undefined;
}

/** First numeric value of a tag, for the many tags that hold just one. */
export function getNumber(ifd: Directory, tag: number): number | undefined {
  return getNumbers(ifd, tag)?.[0];
}

/** First string of an ASCII tag. */
export function getString(ifd: Directory, tag: number): string | undefined {
  const field = ifd.fields.get(tag);
  return field?.value.kind === "ascii" ? field.value.values[0] : undefined;
}

/**
 * Name of a known tag, or `Tag<id>` for anything else.
 */
export function tagName(tag: number): string {
  return nameOf(Tag, tag) ?? `Tag${tag}`;
}

/**
 * Short printable form of a field, used by the CLI report. Long arrays
 * are cut after `limit` elements.
 */
export function formatValue(field: ResolvedField, limit = 8): string {
  const { value } = field;
  if (value.kind === "ascii") {
    return value.values.map((s) => JSON.stringify(s)).join(", ");
  }

  const items =
    value.kind === "rational"
      ? value.values.map((r) => `${r.numerator}/${r.denominator}`)
      : Array.from(value.values, String);

  const shown = items.slice(0, limit).join(", ");
  return items.length > limit
    ? `[${shown}, … (${items.length} values)]`
    : `[${shown}]`;
}
