import { PlanarConfiguration, Tag } from "./constants";
import { getNumber, getNumbers, hasTag } from "./directory";
import { TiffError } from "./errors";
import { type ByteSource, readAt } from "./source";
import type {
  Directory,
  ModeResolution,
  SegmentLayout,
  SegmentRequest,
} from "./types";

/**
 * Checks whether an IFD represents a tiled image.
 *
 * TIFF images are organized either as strips (bands of whole rows) or as
 * tiles (rectangular blocks).
 */
export function isTiled(ifd: Directory): boolean {
  return (
    hasTag(ifd, Tag.TileWidth) &&
    hasTag(ifd, Tag.TileLength) &&
    hasTag(ifd, Tag.TileOffsets)
  );
}

/**
 * Describes how an image's pixel data is cut into strips or tiles.
 *
 * RowsPerStrip defaults to the image height, so an image without it is
 * one strip. Planar images repeat the whole grid once per sample.
 *
 * @param ifd - The image's directory
 * @param image - Its resolved mode, for dimensions and sample layout
 * @throws TiffError `InvalidFormat` when there are fewer offsets or byte
 * counts than segments
 */
export function segmentLayout(
  ifd: Directory,
  image: ModeResolution,
): SegmentLayout {
  const { width, height } = image;
  const tiled = isTiled(ifd);

  let segmentWidth: number;
  let segmentHeight: number;
  if (tiled) {
    segmentWidth = getNumber(ifd, Tag.TileWidth) ?? 0;
    segmentHeight = getNumber(ifd, Tag.TileLength) ?? 0;
    if (segmentWidth === 0 || segmentHeight === 0) {
      throw new TiffError(
        "InvalidFormat",
        `Tile size ${segmentWidth}x${segmentHeight} is invalid`,
        { stage: "layout", tag: Tag.TileWidth },
      );
    }
  } else {
    const rowsPerStrip = getNumber(ifd, Tag.RowsPerStrip) ?? height;
    segmentWidth = width;
    segmentHeight =
      rowsPerStrip === 0 ? height : Math.min(rowsPerStrip, height);
  }

  const across = tiled ? Math.ceil(width / segmentWidth) : 1;
  const down = segmentHeight > 0 ? Math.ceil(height / segmentHeight) : 0;
  const planes =
    image.planarConfiguration === PlanarConfiguration.Planar
      ? image.samplesPerPixel
      : 1;

  const offsetsTag = tiled ? Tag.TileOffsets : Tag.StripOffsets;
  const countsTag = tiled ? Tag.TileByteCounts : Tag.StripByteCounts;
  const offsets = getNumbers(ifd, offsetsTag) ?? [];
  const byteCounts = getNumbers(ifd, countsTag) ?? [];

  const expected = across * down * planes;
  if (offsets.length < expected || byteCounts.length < expected) {
    throw new TiffError(
      "InvalidFormat",
      `Inconsistent header: ${expected} segments but ${offsets.length} offsets and ${byteCounts.length} byte counts`,
      { stage: "layout", tag: offsetsTag },
    );
  }

  return {
    tiled,
    segmentWidth,
    segmentHeight,
    across,
    down,
    planes,
    offsets: offsets.slice(0, expected),
    byteCounts: byteCounts.slice(0, expected),
  };
}

/**
 * Reads the still-compressed bytes of one strip or tile.
 *
 * The bytes are returned exactly as stored. Decompression, and undoing
 * the predictor when `predictor` is set, belong to the caller.
 *
 * @throws RangeError for an index outside the layout
 * @throws TiffError `Truncated` when the segment runs past the source
 *
 * @example
 * ```typescript
 * const image = resolveMode(ifd);
 * const layout = segmentLayout(ifd, image);
 * const first = readSegment(source, layout, image, 0);
 * const pixels = inflate(first.bytes); // external decompressor
 * ```
 */
export function readSegment(
  source: ByteSource,
  layout: SegmentLayout,
  image: ModeResolution,
  index: number,
): SegmentRequest {
  const perPlane = layout.across * layout.down;
  const offset = layout.offsets[index];
  const byteCount = layout.byteCounts[index];
  if (
    !Number.isInteger(index) ||
    offset === undefined ||
    byteCount === undefined
  ) {
    throw new RangeError(
      `Segment ${index} is out of range (image has ${layout.offsets.length})`,
    );
  }

  const plane = Math.floor(index / perPlane);
  const within = index % perPlane;
  const x = (within % layout.across) * layout.segmentWidth;
  const y = Math.floor(within / layout.across) * layout.segmentHeight;

  const bytes = readAt(source, offset, byteCount, {
    stage: "layout",
    tag: layout.tiled ? Tag.TileOffsets : Tag.StripOffsets,
  });

  return {
    index,
    plane,
    compression: image.compression,
    predictor: image.predictor,
    x,
    y,
    width: Math.min(layout.segmentWidth, image.width - x),
    height: Math.min(layout.segmentHeight, image.height - y),
    bytes,
  };
}
