import type { WatermarkError } from "./errors";
import type { Logger } from "./logger";

export type ColorMode = "RGB" | "RGBA";

export interface Raster {
  width: number;
  height: number;
  mode: ColorMode;
  data: Buffer; // interleaved 8-bit samples, 3 (RGB) or 4 (RGBA) per pixel
}

export interface Size {
  width: number;
  height: number;
}

export const WATERMARK_POSITIONS = [
  "top-left",
  "top-right",
  "bottom-left",
  "bottom-right",
  "center",
] as const;

export type WatermarkPosition = (typeof WATERMARK_POSITIONS)[number];

export interface Offset {
  x: number;
  y: number;
}

export interface WatermarkOptions {
  scale?: number;        // watermark width as a fraction of the base width
  position?: string;     // unknown values behave like "top-right"
  transparency?: number; // 0-255 multiplier on the watermark alpha
  padding?: number;
}

export interface WatermarkResult {
  image: Raster;
  offset: Offset;
  watermarkSize: Size;
}

export interface WatermarkSource {
  logoPath?: string;
  text: string;
  fontPath?: string;
}

export interface ProcessorContext {
  outputDir: string;
  watermark: Raster;
  options: WatermarkOptions;
  logger: Logger;
}

export type ProcessingResult =
  | { ok: true; file: string; outputPath: string }
  | { ok: false; file: string; error: WatermarkError };

export interface DirectoryJob {
  inputDir: string;
  outputDir?: string;
  watermark: Raster;
  options: WatermarkOptions;
  logger: Logger;
}

export interface DirectorySummary {
  successful: number;
  failed: number;
  results: ProcessingResult[];
}

export interface WatermarkConfig {
  inputDir: string;
  outputDir?: string;
  logoPath?: string;
  fontPath?: string;
  watermarkText: string;
  scale: number;
  position: WatermarkPosition;
  transparency: number;
}
