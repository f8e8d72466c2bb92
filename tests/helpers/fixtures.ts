import { TiffError } from "../../src/errors";
import type { Directory, ResolvedField } from "../../src/types";

/**
 * Runs `fn` and returns the TiffError it throws. Anything else thrown is
 * rethrown; not throwing at all fails the test.
 */
export function captureTiffError(fn: () => unknown): TiffError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TiffError) return err;
    throw err;
  }
  throw new Error("expected a TiffError to be thrown");
}

export function integerField(tag: number, ...values: number[]): ResolvedField {
  return {
    tag,
    type: 3,
    count: values.length,
    value: { kind: "integer", values },
  };
}

export function doubleField(tag: number, ...values: number[]): ResolvedField {
  return {
    tag,
    type: 12,
    count: values.length,
    value: { kind: "float", values },
  };
}

export function asciiField(tag: number, ...values: string[]): ResolvedField {
  const count = values.reduce((n, s) => n + s.length + 1, 0);
  return { tag, type: 2, count, value: { kind: "ascii", values } };
}

/** A directory assembled from already resolved fields. */
export function directoryOf(...fields: ResolvedField[]): Directory {
  return {
    offset: 8,
    fields: new Map(fields.map((f) => [f.tag, f])),
    nextOffset: 0,
    warnings: [],
  };
}
