import { parseArgs } from "util";
import { z } from "zod";

import { ConfigurationError } from "./errors";
import { WATERMARK_POSITIONS } from "./types";
import type { WatermarkConfig } from "./types";
import { cleanPath } from "./utils";
import { DEFAULT_POSITION, DEFAULT_SCALE, DEFAULT_TRANSPARENCY } from "./watermark";

export const DEFAULT_WATERMARK_TEXT = "Watermark";

export const USAGE = `Usage: bulk-watermark --input-dir <dir> [options]

Bulk image watermarking tool.

Options:
  --input-dir <dir>         Input directory containing images (required)
  --output-dir <dir>        Output directory for watermarked images (default: <input-dir>/watermarked)
  --logo-path <file>        Path to watermark image
  --watermark-text <text>   Text to use when creating text watermark (default: "${DEFAULT_WATERMARK_TEXT}")
  --font-path <file>        BMFont (.fnt) file for the text watermark
  --scale <number>          Watermark scale relative to image width (default: ${DEFAULT_SCALE})
  --position <position>     ${WATERMARK_POSITIONS.join(" | ")} (default: ${DEFAULT_POSITION})
  --transparency <0-255>    Watermark transparency (default: ${DEFAULT_TRANSPARENCY})
  -h, --help                Show this help
`;

/** Cleaned path; blank input counts as absent. */
const optionalPath = z
  .string()
  .transform(cleanPath)
  .optional()
  .transform((value) => (value ? value : undefined));

export const configSchema = z.object({
  inputDir: z
    .string({ required_error: "--input-dir is required" })
    .transform(cleanPath)
    .pipe(z.string().min(1, "--input-dir cannot be empty")),
  outputDir: optionalPath,
  logoPath: optionalPath,
  fontPath: optionalPath,
  watermarkText: z.string().default(DEFAULT_WATERMARK_TEXT),
  scale: z.coerce
    .number({ invalid_type_error: "--scale must be a number" })
    .finite()
    .positive("--scale must be greater than 0")
    .default(DEFAULT_SCALE),
  position: z
    .enum(WATERMARK_POSITIONS, {
      errorMap: () => ({ message: `--position must be one of ${WATERMARK_POSITIONS.join(", ")}` }),
    })
    .default(DEFAULT_POSITION),
  transparency: z.coerce
    .number({ invalid_type_error: "--transparency must be a number" })
    .int("--transparency must be an integer")
    .min(0, "--transparency must be between 0 and 255")
    .max(255, "--transparency must be between 0 and 255")
    .default(DEFAULT_TRANSPARENCY),
});

export type ParsedArgs = { help: true } | { help: false; config: WatermarkConfig };

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        "input-dir": { type: "string" },
        "output-dir": { type: "string" },
        "logo-path": { type: "string" },
        "watermark-text": { type: "string" },
        "font-path": { type: "string" },
        scale: { type: "string" },
        position: { type: "string" },
        transparency: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    // unknown flags, missing flag values
    throw new ConfigurationError([err instanceof Error ? err.message : String(err)]);
  }
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const values = readFlags(argv);
  if (values.help) return { help: true };

  const result = configSchema.safeParse({
    inputDir: values["input-dir"],
    outputDir: values["output-dir"],
    logoPath: values["logo-path"],
    fontPath: values["font-path"],
    watermarkText: values["watermark-text"],
    scale: values.scale,
    position: values.position,
    transparency: values.transparency,
  });

  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map((issue) => issue.message));
  }
  return { help: false, config: result.data };
}
