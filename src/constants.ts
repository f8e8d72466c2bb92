/**
 * Numeric constants from the TIFF 6.0 and GeoTIFF 1.0 specifications.
 *
 * Each group is a plain object `as const` so the values can be used both
 * as runtime lookups and as literal types.
 */

/** Byte order markers followed by the magic number 42. */
export const LITTLE_ENDIAN_MAGIC = [0x49, 0x49, 0x2a, 0x00] as const; // "II*\0"
export const BIG_ENDIAN_MAGIC = [0x4d, 0x4d, 0x00, 0x2a] as const; // "MM\0*"

/** Header: 4 magic bytes then a 4 byte offset to the first IFD. */
export const HEADER_LENGTH = 8;

/** Length of one IFD entry in bytes. */
export const IFD_ENTRY_LENGTH = 12;

/**
 * TIFF field data types.
 */
export const TypeCode = {
  Byte: 1,
  Ascii: 2,
  Short: 3,
  Long: 4,
  Rational: 5,
  SByte: 6,
  Undefined: 7,
  SShort: 8,
  SLong: 9,
  SRational: 10,
  Float: 11,
  Double: 12,
} as const;

export type TypeCode = (typeof TypeCode)[keyof typeof TypeCode];

/**
 * Width in bytes of one element of each data type, indexed by type code.
 *
 * Index 0 and UNDEFINED carry a width of 0: their elements are read as raw
 * single bytes.
 */
export const TYPE_WIDTHS: readonly number[] = [
  0, 1, 1, 2, 4, 8, 1, 0, 2, 4, 8, 4, 8,
];

/**
 * Tag IDs: TIFF baseline and extension tags, GeoTIFF tags and the GDAL
 * private tags.
 */
export const Tag = {
  NewSubfileType: 254,
  ImageWidth: 256,
  ImageLength: 257,
  BitsPerSample: 258,
  Compression: 259,
  PhotometricInterpretation: 262,
  ImageDescription: 270,
  StripOffsets: 273,
  Orientation: 274,
  SamplesPerPixel: 277,
  RowsPerStrip: 278,
  StripByteCounts: 279,
  XResolution: 282,
  YResolution: 283,
  PlanarConfiguration: 284,
  XPosition: 286,
  YPosition: 287,
  ResolutionUnit: 296,
  Software: 305,
  DateTime: 306,
  Predictor: 317,
  ColorMap: 320,
  TileWidth: 322,
  TileLength: 323,
  TileOffsets: 324,
  TileByteCounts: 325,
  ExtraSamples: 338,
  SampleFormat: 339,

  // GeoTIFF
  ModelPixelScale: 33550,
  ModelTiepoint: 33922,
  ModelTransformation: 34264,
  GeoKeyDirectory: 34735,
  GeoDoubleParams: 34736,
  GeoAsciiParams: 34737,

  // GDAL
  GdalMetadata: 42112,
  GdalNoData: 42113,
} as const;

export type Tag = (typeof Tag)[keyof typeof Tag];

export const Compression = {
  None: 1,
  CCITT: 2,
  Group3Fax: 3,
  Group4Fax: 4,
  LZW: 5,
  JPEGOld: 6, // superseded by JPEG
  JPEG: 7,
  Deflate: 8,
  PackBits: 32773,
  DeflateOld: 32946, // superseded by Deflate
} as const;

export type Compression = (typeof Compression)[keyof typeof Compression];

export const Photometric = {
  WhiteIsZero: 0,
  BlackIsZero: 1,
  RGB: 2,
  Paletted: 3,
  TransparencyMask: 4,
  CMYK: 5,
  YCbCr: 6,
  CIELab: 8,
} as const;

export const Predictor = {
  None: 1,
  Horizontal: 2,
} as const;

export const ResolutionUnit = {
  None: 1,
  PerInch: 2,
  PerCentimeter: 3,
} as const;

export const ExtraSamples = {
  Unspecified: 0,
  AssociatedAlpha: 1, // premultiplied
  UnassociatedAlpha: 2, // straight
} as const;

export const SampleFormat = {
  Unsigned: 1,
  Signed: 2,
  Float: 3,
  Undefined: 4,
} as const;

export const PlanarConfiguration = {
  Chunky: 1,
  Planar: 2,
} as const;

/**
 * GeoKey IDs (GeoTIFF 1.0, section 6.2).
 */
export const GeoKey = {
  // Configuration
  GTModelType: 1024,
  GTRasterType: 1025,
  GTCitation: 1026,

  // Geographic CS parameters
  GeographicType: 2048,
  GeogCitation: 2049,
  GeogGeodeticDatum: 2050,
  GeogPrimeMeridian: 2051,
  GeogLinearUnits: 2052,
  GeogLinearUnitSize: 2053,
  GeogAngularUnits: 2054,
  GeogAngularUnitSize: 2055,
  GeogEllipsoid: 2056,
  GeogSemiMajorAxis: 2057,
  GeogSemiMinorAxis: 2058,
  GeogInvFlattening: 2059,
  GeogAzimuthUnits: 2060,
  GeogPrimeMeridianLong: 2061,

  // Projected CS parameters
  ProjectedCSType: 3072,
  PCSCitation: 3073,
  Projection: 3074,
  ProjCoordTrans: 3075,
  ProjLinearUnits: 3076,
  ProjLinearUnitSize: 3077,
  ProjStdParallel1: 3078,
  ProjStdParallel2: 3079,
  ProjNatOriginLong: 3080,
  ProjNatOriginLat: 3081,
  ProjFalseEasting: 3082,
  ProjFalseNorthing: 3083,
  ProjFalseOriginLong: 3084,
  ProjFalseOriginLat: 3085,
  ProjFalseOriginEasting: 3086,
  ProjFalseOriginNorthing: 3087,
  ProjCenterLong: 3088,
  ProjCenterLat: 3089,
  ProjCenterEasting: 3090,
  ProjCenterNorthing: 3091,
  ProjScaleAtNatOrigin: 3092,
  ProjScaleAtCenter: 3093,
  ProjAzimuthAngle: 3094,
  ProjStraightVertPoleLong: 3095,
} as const;

/**
 * Coordinate transformation codes, the values of `ProjCoordTrans`
 * (GeoTIFF 1.0, section 6.3.3.3).
 */
export const CoordTransform = {
  TransverseMercator: 1,
  TransvMercatorModifiedAlaska: 2,
  ObliqueMercator: 3,
  ObliqueMercatorLaborde: 4,
  ObliqueMercatorRosenmund: 5,
  ObliqueMercatorSpherical: 6,
  Mercator: 7,
  LambertConfConic2SP: 8,
  LambertConfConicHelmert: 9,
  LambertAzimEqualArea: 10,
  AlbersEqualArea: 11,
  AzimuthalEquidistant: 12,
  EquidistantConic: 13,
  Stereographic: 14,
  PolarStereographic: 15,
  ObliqueStereographic: 16,
  Equirectangular: 17,
  CassiniSoldner: 18,
  Gnomonic: 19,
  MillerCylindrical: 20,
  Orthographic: 21,
  Polyconic: 22,
  Robinson: 23,
  Sinusoidal: 24,
  VanDerGrinten: 25,
  NewZealandMapGrid: 26,
  TransvMercatorSouthOriented: 27,
} as const;

/**
 * Reverse lookup from a numeric value to the key naming it in one of the
 * constant groups above.
 */
export function nameOf(
  group: Readonly<Record<string, number>>,
  value: number,
): string | undefined {
  for (const [name, id] of Object.entries(group)) {
    if (id === value) return name;
  }
  return undefined;
}
