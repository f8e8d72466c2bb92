import { describe, expect, test } from "vitest";
import { Compression, Photometric, Predictor, Tag } from "../src/constants";
import { getNumbers } from "../src/directory";
import { isTiled, readSegment, segmentLayout } from "../src/layout";
import { resolveMode } from "../src/mode";
import { BufferSource } from "../src/source";
import { parseTiff } from "../src/tiff-parser";
import type { ResolvedField } from "../src/types";
import { buildTiff, long, short } from "./helpers/build-tiff";
import {
  captureTiffError,
  directoryOf,
  integerField,
} from "./helpers/fixtures";

const stripA = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);
const stripB = new Uint8Array([9, 10, 11, 12]);

// Strip data follows the 8 byte header: stripA at 8, stripB at 16.
function stripped(...extra: ReturnType<typeof short>[]) {
  const { bytes } = buildTiff(
    [
      {
        entries: [
          short(Tag.ImageWidth, 4),
          short(Tag.ImageLength, 3),
          short(Tag.BitsPerSample, 8),
          short(Tag.PhotometricInterpretation, Photometric.BlackIsZero),
          long(Tag.StripOffsets, 8, 16),
          short(Tag.RowsPerStrip, 2),
          long(Tag.StripByteCounts, 8, 4),
          ...extra,
        ],
      },
    ],
    { data: [stripA, stripB] },
  );
  const [ifd] = parseTiff(bytes).ifds;
  if (!ifd) throw new Error("no IFD decoded");
  return { bytes, ifd };
}

function tiledImage(...extra: ResolvedField[]) {
  return directoryOf(
    integerField(Tag.ImageWidth, 5),
    integerField(Tag.ImageLength, 3),
    integerField(Tag.BitsPerSample, 8),
    integerField(Tag.PhotometricInterpretation, Photometric.BlackIsZero),
    integerField(Tag.TileWidth, 4),
    integerField(Tag.TileLength, 2),
    integerField(Tag.TileOffsets, 0, 8, 16, 24),
    integerField(Tag.TileByteCounts, 8, 8, 8, 8),
    ...extra,
  );
}

describe("segmentLayout", () => {
  test("describes strips", () => {
    const { ifd } = stripped();

    expect(isTiled(ifd)).toBe(false);
    expect(segmentLayout(ifd, resolveMode(ifd))).toEqual({
      tiled: false,
      segmentWidth: 4,
      segmentHeight: 2,
      across: 1,
      down: 2,
      planes: 1,
      offsets: [8, 16],
      byteCounts: [8, 4],
    });
  });

  test("treats a missing RowsPerStrip as one strip", () => {
    const ifd = directoryOf(
      integerField(Tag.ImageWidth, 4),
      integerField(Tag.ImageLength, 3),
      integerField(Tag.BitsPerSample, 8),
      integerField(Tag.PhotometricInterpretation, Photometric.BlackIsZero),
      integerField(Tag.StripOffsets, 8),
      integerField(Tag.StripByteCounts, 12),
    );

    const layout = segmentLayout(ifd, resolveMode(ifd));

    expect(layout.segmentHeight).toBe(3);
    expect(layout.down).toBe(1);
  });

  test("describes tiles, rounding partial tiles up", () => {
    const ifd = tiledImage();

    const layout = segmentLayout(ifd, resolveMode(ifd));

    expect(isTiled(ifd)).toBe(true);
    expect(layout).toMatchObject({
      tiled: true,
      segmentWidth: 4,
      segmentHeight: 2,
      across: 2,
      down: 2,
    });
  });

  test("repeats the grid per sample for planar images", () => {
    const ifd = directoryOf(
      integerField(Tag.ImageWidth, 2),
      integerField(Tag.ImageLength, 2),
      integerField(Tag.BitsPerSample, 8, 8, 8),
      integerField(Tag.PhotometricInterpretation, Photometric.RGB),
      integerField(Tag.SamplesPerPixel, 3),
      integerField(Tag.PlanarConfiguration, 2),
      integerField(Tag.StripOffsets, 0, 4, 8),
      integerField(Tag.StripByteCounts, 4, 4, 4),
    );
    const image = resolveMode(ifd);
    const layout = segmentLayout(ifd, image);

    expect(layout.planes).toBe(3);
    const source = new BufferSource(new Uint8Array(12));

    expect(readSegment(source, layout, image, 2)).toMatchObject({
      plane: 2,
      x: 0,
      y: 0,
    });
  });

  test("fails InvalidFormat with fewer offsets than segments", () => {
    const ifd = directoryOf(
      integerField(Tag.ImageWidth, 4),
      integerField(Tag.ImageLength, 4),
      integerField(Tag.BitsPerSample, 8),
      integerField(Tag.PhotometricInterpretation, Photometric.BlackIsZero),
      integerField(Tag.RowsPerStrip, 2),
      integerField(Tag.StripOffsets, 8),
      integerField(Tag.StripByteCounts, 8, 8),
    );

    const err = captureTiffError(() => segmentLayout(ifd, resolveMode(ifd)));

    expect(err.code).toBe("InvalidFormat");
    expect(err.stage).toBe("layout");
    expect(err.message).toBe(
      "Inconsistent header: 2 segments but 1 offsets and 2 byte counts",
    );
  });
});

describe("readSegment", () => {
  test("returns a strip's stored bytes and its rows", () => {
    const { bytes, ifd } = stripped();
    const image = resolveMode(ifd);
    const layout = segmentLayout(ifd, image);

    const segment = readSegment(new BufferSource(bytes), layout, image, 1);

    expect(segment).toEqual({
      index: 1,
      plane: 0,
      compression: Compression.None,
      predictor: false,
      x: 0,
      y: 2,
      width: 4,
      height: 1,
      bytes: stripB,
    });
  });

  test("passes the predictor flag on without touching the bytes", () => {
    const plain = stripped(short(Tag.Compression, Compression.LZW));
    const predicted = stripped(
      short(Tag.Compression, Compression.LZW),
      short(Tag.Predictor, Predictor.Horizontal),
    );
    const image = resolveMode(predicted.ifd);
    const layout = segmentLayout(predicted.ifd, image);

    const source = new BufferSource(predicted.bytes);

    const segment = readSegment(source, layout, image, 0);

    expect(segment.predictor).toBe(true);
    expect(segment.compression).toBe(Compression.LZW);
    expect(segment.bytes).toEqual(stripA);
    for (const tag of [Tag.StripOffsets, Tag.StripByteCounts]) {
      expect(getNumbers(predicted.ifd, tag)).toEqual(
        getNumbers(plain.ifd, tag),
      );
    }
  });

  test("clips edge tiles to the image", () => {
    const ifd = tiledImage();
    const image = resolveMode(ifd);
    const layout = segmentLayout(ifd, image);
    const source = new BufferSource(
      Uint8Array.from({ length: 32 }, (_, i) => i),
    );

    const segment = readSegment(source, layout, image, 3);

    expect(segment).toMatchObject({ x: 4, y: 2, width: 1, height: 1 });
    expect(segment.bytes).toEqual(
      Uint8Array.from([24, 25, 26, 27, 28, 29, 30, 31]),
    );
  });

  test("fails Truncated when a segment runs past the source", () => {
    const ifd = tiledImage();
    const image = resolveMode(ifd);
    const layout = segmentLayout(ifd, image);

    const source = new BufferSource(new Uint8Array(20));

    const err = captureTiffError(() =>
      readSegment(source, layout, image, 2),
    );

    expect(err.code).toBe("Truncated");
    expect(err.tag).toBe(Tag.TileOffsets);
  });

  test("throws RangeError for an index outside the layout", () => {
    const ifd = tiledImage();
    const image = resolveMode(ifd);
    const layout = segmentLayout(ifd, image);

    const source = new BufferSource(new Uint8Array(32));

    expect(() => readSegment(source, layout, image, 4)).toThrow(RangeError);
  });
});
