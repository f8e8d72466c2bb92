import {
  Compression,
  ExtraSamples,
  Photometric,
  PlanarConfiguration,
  Predictor,
  SampleFormat,
  Tag,
  nameOf,
} from "./constants";
import { getNumber, getNumbers } from "./directory";
import { TiffError } from "./errors";
import type { Directory, ImageMode, ModeResolution } from "./types";

const KNOWN_COMPRESSIONS: ReadonlySet<number> = new Set(
  Object.values(Compression),
);

const PALETTE_DEPTHS: ReadonlySet<number> = new Set([1, 2, 4, 8]);
const RGB_DEPTHS: ReadonlySet<number> = new Set([8, 16]);

const MAX_PALETTE_COLORS = 256;

function unsupported(message: string, tag?: number): TiffError {
  return new TiffError("UnsupportedConfiguration", message, {
    stage: "mode",
    tag,
  });
}

function requireNumber(ifd: Directory, tag: number, name: string): number {
  const value = getNumber(ifd, tag);
  if (value === undefined) {
    throw new TiffError(
      "MissingTag",
      `Required tag ${name} (${tag}) is missing`,
      { stage: "mode", tag },
    );
  }
  return value;
}

/**
 * Works out how the pixels of an image are encoded.
 *
 * The mode comes from a fixed table over PhotometricInterpretation,
 * BitsPerSample, SamplesPerPixel, ColorMap and ExtraSamples:
 *
 * | Photometric          | Condition                      | Mode                         |
 * | -------------------- | ------------------------------ | ---------------------------- |
 * | WhiteIsZero/BlackIsZero | 1 bit                       | bilevel                      |
 * | BlackIsZero          | 1 sample, any other depth      | gray                         |
 * | WhiteIsZero          | 1 sample, any other depth      | gray-inverted                |
 * | Paletted             | ColorMap of 1-256 colors       | paletted                     |
 * | RGB                  | 3 samples                      | rgb                          |
 * | RGB                  | 4 samples, ExtraSamples 1 / 2  | rgba / nrgba                 |
 *
 * Anything else (CMYK, YCbCr, CIE Lab, RGB with unspecified extra
 * samples...) is refused rather than guessed at. The fields stay readable
 * on the directory.
 *
 * The Predictor tag is only reported; undoing it is the decompressor's
 * job.
 *
 * @throws TiffError `MissingTag` without ImageWidth or ImageLength,
 * `UnsupportedCompression` for an unknown Compression value,
 * `UnsupportedConfiguration` for a combination outside the table
 *
 * @example
 * ```typescript
 * const { mode, predictor } = resolveMode(tiff.ifds[0]);
 * ```
 */
export function resolveMode(ifd: Directory): ModeResolution {
  const width = requireNumber(ifd, Tag.ImageWidth, "ImageWidth");
  const height = requireNumber(ifd, Tag.ImageLength, "ImageLength");

  const compression = getNumber(ifd, Tag.Compression) ?? Compression.None;
  if (!KNOWN_COMPRESSIONS.has(compression)) {
    throw new TiffError(
      "UnsupportedCompression",
      `Unknown compression scheme ${compression}`,
      { stage: "mode", tag: Tag.Compression },
    );
  }

  const bitsPerSample = getNumbers(ifd, Tag.BitsPerSample) ?? [1];
  const samplesPerPixel = getNumber(ifd, Tag.SamplesPerPixel) ?? 1;
  // An absent PhotometricInterpretation reads as 0, WhiteIsZero.
  const photometric =
    getNumber(ifd, Tag.PhotometricInterpretation) ?? Photometric.WhiteIsZero;
  const extraSamples = getNumbers(ifd, Tag.ExtraSamples) ?? [];

  const bps = bitsPerSample[0] ?? 0;
  if (bps === 0) {
    throw unsupported("BitsPerSample must not be 0", Tag.BitsPerSample);
  }
  if (bitsPerSample.some((b) => b !== bps)) {
    throw unsupported(
      `Mixed BitsPerSample ${bitsPerSample.join("/")} is not supported`,
      Tag.BitsPerSample,
    );
  }
  if (bitsPerSample.length !== 1 && bitsPerSample.length !== samplesPerPixel) {
    throw unsupported(
      `BitsPerSample has ${bitsPerSample.length} values for ${samplesPerPixel} samples`,
      Tag.BitsPerSample,
    );
  }

  const { mode, inverted } = deriveMode(
    ifd,
    photometric,
    bps,
    samplesPerPixel,
    extraSamples,
  );

  return {
    mode,
    inverted,
    width,
    height,
    bitsPerSample,
    samplesPerPixel,
    compression,
    photometric,
    extraSamples,
    sampleFormat: getNumber(ifd, Tag.SampleFormat) ?? SampleFormat.Unsigned,
    planarConfiguration:
      getNumber(ifd, Tag.PlanarConfiguration) ?? PlanarConfiguration.Chunky,
    predictor: getNumber(ifd, Tag.Predictor) === Predictor.Horizontal,
  };
}

function deriveMode(
  ifd: Directory,
  photometric: number,
  bps: number,
  samplesPerPixel: number,
  extraSamples: number[],
): { mode: ImageMode; inverted: boolean } {
  switch (photometric) {
    case Photometric.WhiteIsZero:
    case Photometric.BlackIsZero: {
      const inverted = photometric === Photometric.WhiteIsZero;
      if (samplesPerPixel !== 1) {
        throw unsupported(
          `Grayscale with ${samplesPerPixel} samples per pixel is not supported`,
          Tag.SamplesPerPixel,
        );
      }
      if (bps === 1) {
        return { mode: "bilevel", inverted };
      }
      // SampleFormat on the resolution tells integer from float samples.
      return { mode: inverted ? "gray-inverted" : "gray", inverted };
    }

    case Photometric.Paletted: {
      const colorMap = getNumbers(ifd, Tag.ColorMap);
      if (colorMap === undefined) {
        throw unsupported("Paletted image has no ColorMap", Tag.ColorMap);
      }
      const colors = colorMap.length / 3;
      if (
        colorMap.length % 3 !== 0 ||
        colors < 1 ||
        colors > MAX_PALETTE_COLORS
      ) {
        throw unsupported(
          `Bad ColorMap length ${colorMap.length}`,
          Tag.ColorMap,
        );
      }
      if (samplesPerPixel !== 1 || !PALETTE_DEPTHS.has(bps)) {
        throw unsupported(
          `Paletted image with ${samplesPerPixel} x ${bps} bit samples is not supported`,
          Tag.BitsPerSample,
        );
      }
      return { mode: "paletted", inverted: false };
    }

    case Photometric.RGB: {
      if (!RGB_DEPTHS.has(bps)) {
        throw unsupported(
          `RGB at ${bps} bits is not supported`,
          Tag.BitsPerSample,
        );
      }
      if (samplesPerPixel === 3) {
        return { mode: "rgb", inverted: false };
      }
      if (samplesPerPixel === 4) {
        switch (extraSamples[0]) {
          case ExtraSamples.AssociatedAlpha:
            return { mode: "rgba", inverted: false };
          case ExtraSamples.UnassociatedAlpha:
            return { mode: "nrgba", inverted: false };
        }
        throw unsupported(
          `RGB with extra sample type ${extraSamples[0] ?? "none"} is not supported`,
          Tag.ExtraSamples,
        );
      }
      throw unsupported(
        `Wrong number of samples for RGB: ${samplesPerPixel}`,
        Tag.SamplesPerPixel,
      );
    }

    default: {
      const name = nameOf(Photometric, photometric) ?? String(photometric);
      throw unsupported(
        `Photometric interpretation ${name} is not supported`,
        Tag.PhotometricInterpretation,
      );
    }
  }
}
