import { Tag } from "./constants";
import { getNumbers, getString } from "./directory";
import type { Directory, GeoTransform } from "./types";

/**
 * Reads the pixel-to-model affine transform of a GeoTIFF image.
 *
 * ModelTransformation, a row-major 4x4 matrix, wins when present.
 * Otherwise the transform is built from the first ModelTiepoint and
 * ModelPixelScale, with rows running down (negative y scale).
 *
 * @returns `[a, b, c, d, e, f]`, or undefined when the image carries
 * neither form
 */
export function readGeoTransform(ifd: Directory): GeoTransform | undefined {
  const matrix = getNumbers(ifd, Tag.ModelTransformation);
  if (matrix && matrix.length >= 16) {
    const m = (i: number): number => matrix[i] ?? 0;
    return [m(0), m(1), m(3), m(4), m(5), m(7)];
  }

  const tiepoint = getNumbers(ifd, Tag.ModelTiepoint);
  const scale = getNumbers(ifd, Tag.ModelPixelScale);
  if (!tiepoint || tiepoint.length < 6 || !scale || scale.length < 2) {
    return undefined;
  }

  const [i = 0, j = 0, , x = 0, y = 0] = tiepoint;
  const [sx = 0, sy = 0] = scale;
  return [sx, 0, x - i * sx, 0, -sy, y + j * sy];
}

/**
 * Parses GDAL's nodata tag. The value is stored as text; "nan" yields NaN.
 */
export function readNoData(ifd: Directory): number | undefined {
  const text = getString(ifd, Tag.GdalNoData)?.trim();
  if (!text) return undefined;
  return Number(text);
}

/** GDAL's metadata tag: an XML document of per-dataset and per-band items. */
export function readGdalMetadata(ifd: Directory): string | undefined {
  return getString(ifd, Tag.GdalMetadata);
}
