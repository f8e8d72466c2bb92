import { existsSync } from "node:fs";
import { GeoKey, nameOf } from "./constants";
import { formatValue, tagName } from "./directory";
import { TiffError } from "./errors";
import { parseGeoKeys } from "./geokeys";
import { resolveMode } from "./mode";
import { FileSource } from "./source";
import { parseTiff } from "./tiff-parser";
import type {
  ByteOrder,
  Directory,
  DirectoryWarning,
  GeoKeyValue,
  ImageMode,
  TiffStructure,
} from "./types";

/**
 * CLI exit codes following Unix conventions.
 */
export const ExitCode = {
  Ok: 0,
  Unsupported: 1,
  Error: 2,
} as const;

export interface CliOptions {
  file: string | null;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

export interface ImageReport {
  index: number;
  offset: number;
  width?: number;
  height?: number;
  mode?: ImageMode;
  compression?: number;
  predictor?: boolean;
  geoKeys?: Record<string, GeoKeyValue>;
  warnings: DirectoryWarning[];
  /** Why no pixel mode could be assigned, when none could. */
  error?: string;
  /** Why the GeoKey directory could not be read, when it could not. */
  geoKeyError?: string;
}

export interface InspectionReport {
  byteOrder: ByteOrder;
  images: ImageReport[];
  supported: boolean;
}

/**
 * Prints usage information to stdout.
 */
function printUsage(): void {
  console.log(
    `
tiff-inspect - Describe the image directories of a TIFF or GeoTIFF file

Usage:
  tiff-inspect <file>
  tiff-inspect <file> --json
  tiff-inspect <file> --verbose

Options:
  --json      Output results as JSON
  --verbose   List every tag of every image
  --help      Show this help message

Exit codes:
  0  Every image decoded
  1  Some images use an unsupported compression or pixel layout
  2  Error (file not found, not a TIFF, etc.)
`.trim(),
  );
}

/**
 * Parses command line arguments.
 *
 * @param args - Raw arguments from process.argv
 */
export function parseArgs(args: string[]): CliOptions {
  // process.argv: [node, script.js, ...userArgs]
  const userArgs = args.slice(2);

  return {
    file: userArgs.find((arg) => !arg.startsWith("--")) ?? null,
    json: userArgs.includes("--json"),
    verbose: userArgs.includes("--verbose"),
    help: userArgs.includes("--help"),
  };
}

/**
 * Resolves the mode and GeoKeys of every image, each independently of the
 * other. Failures that only affect one image are recorded on that image;
 * anything else propagates.
 */
export function inspect(tiff: TiffStructure): InspectionReport {
  const images = tiff.ifds.map((ifd, index) => describeImage(ifd, index));

  return {
    byteOrder: tiff.header.byteOrder,
    images,
    supported: images.every(
      (image) =>
        image.error === undefined && image.geoKeyError === undefined,
    ),
  };
}

function describeImage(ifd: Directory, index: number): ImageReport {
  const report: ImageReport = {
    index,
    offset: ifd.offset,
    warnings: ifd.warnings,
  };

  try {
    const image = resolveMode(ifd);
    report.width = image.width;
    report.height = image.height;
    report.mode = image.mode;
    report.compression = image.compression;
    report.predictor = image.predictor;
  } catch (err) {
    if (!(err instanceof TiffError)) throw err;
    report.error = err.message;
  }

  // GeoKeys stay readable on images that have no pixel mode.
  try {
    const geo = parseGeoKeys(ifd);
    if (geo) {
      report.geoKeys = {};
      for (const key of geo.keys.values()) {
        report.geoKeys[nameOf(GeoKey, key.id) ?? String(key.id)] = key.value;
      }
    }
  } catch (err) {
    if (!(err instanceof TiffError)) throw err;
    report.geoKeyError = err.message;
  }

  return report;
}

/**
 * Renders a report as the plain text the CLI prints.
 */
export function formatReport(
  report: InspectionReport,
  tiff: TiffStructure,
  verbose: boolean,
): string[] {
  const lines: string[] = [
    `Byte order: ${report.byteOrder}`,
    `IFDs: ${report.images.length}`,
  ];

  for (const image of report.images) {
    lines.push("");
    if (image.error !== undefined) {
      lines.push(`✗ IFD ${image.index} @ ${image.offset}: ${image.error}`);
    } else {
      const predictor = image.predictor ? ", horizontal predictor" : "";
      const size = `${image.width}x${image.height}`;
      lines.push(
        `✓ IFD ${image.index} @ ${image.offset}: ${size} ${image.mode}, compression ${image.compression}${predictor}`,
      );
    }

    for (const w of image.warnings) {
      lines.push(`  warning: duplicate ${tagName(w.tag)} (${w.tag}) ignored`);
    }

    if (image.geoKeyError !== undefined) {
      lines.push(`  GeoKeys unreadable: ${image.geoKeyError}`);
    }

    if (image.geoKeys) {
      for (const [name, value] of Object.entries(image.geoKeys)) {
        lines.push(`  ${name}: ${JSON.stringify(value)}`);
      }
    }

    const ifd = tiff.ifds[image.index];
    if (verbose && ifd) {
      for (const field of ifd.fields.values()) {
        lines.push(
          `  ${tagName(field.tag)} (${field.tag}): ${formatValue(field)}`,
        );
      }
    }
  }

  return lines;
}

/**
 * Main entry point for the CLI.
 *
 * Opens a TIFF file, decodes its directories, resolves each image's mode
 * and GeoKeys, and prints the results to stdout.
 *
 * @returns The process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printUsage();
    return ExitCode.Ok;
  }

  if (!args.file) {
    console.error("Error: No file specified\n");
    printUsage();
    return ExitCode.Error;
  }

  if (!existsSync(args.file)) {
    console.error(`Error: File not found: ${args.file}`);
    return ExitCode.Error;
  }

  let source: FileSource;
  try {
    source = new FileSource(args.file);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: Could not read file: ${args.file} (${message})`);
    return ExitCode.Error;
  }

  let tiff: TiffStructure;
  let report: InspectionReport;
  try {
    tiff = parseTiff(source);
    report = inspect(tiff);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    if (args.json) {
      console.log(
        JSON.stringify({ supported: false, error: message }, null, 2),
      );
    } else {
      console.error(`Error: ${message}`);
    }
    return ExitCode.Error;
  } finally {
    source.close();
  }

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(`File: ${args.file}`);
    for (const line of formatReport(report, tiff, args.verbose)) {
      console.log(line);
    }
  }

  return report.supported ? ExitCode.Ok : ExitCode.Unsupported;
}
