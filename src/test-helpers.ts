import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { PNG } from "pngjs";
import * as jpeg from "jpeg-js";

import type { LogLevel, Logger } from "./logger";
import type { ColorMode, Raster } from "./types";
import { channelsOf } from "./utils";

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
}

export type RecordingLogger = Logger & { entries: LogEntry[]; closed: boolean };

export function recordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const logger: RecordingLogger = {
    entries,
    closed: false,
    debug: (message, data) => entries.push({ level: "DEBUG", message, data }),
    info: (message, data) => entries.push({ level: "INFO", message, data }),
    warn: (message, data) => entries.push({ level: "WARN", message, data }),
    error: (message, data) => entries.push({ level: "ERROR", message, data }),
    close: () => {
      logger.closed = true;
    },
  };
  return logger;
}

export function messages(logger: RecordingLogger, level: LogLevel): string[] {
  return logger.entries.filter((e) => e.level === level).map((e) => e.message);
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "bulk-watermark-"));
}

export function solidRaster(width: number, height: number, mode: ColorMode, color: number[]): Raster {
  const channels = channelsOf(mode);
  const data = Buffer.alloc(width * height * channels);
  for (let i = 0; i < data.length; i += channels) {
    for (let c = 0; c < channels; c++) data[i + c] = color[c];
  }
  return { width, height, mode, data };
}

export function pixelAt(image: Raster, x: number, y: number): number[] {
  const channels = channelsOf(image.mode);
  const i = (y * image.width + x) * channels;
  return Array.from(image.data.subarray(i, i + channels));
}

function rgbaFill(width: number, height: number, color: [number, number, number, number]): Buffer {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < data.length; i += 4) data.set(color, i);
  return data;
}

export function writeJpeg(filePath: string, width: number, height: number, rgb: [number, number, number]): void {
  const data = rgbaFill(width, height, [...rgb, 255]);
  fs.writeFileSync(filePath, jpeg.encode({ data, width, height }, 90).data);
}

export function writePng(
  filePath: string,
  width: number,
  height: number,
  rgba: [number, number, number, number],
  colorType: 0 | 2 | 4 | 6 = 6
): void {
  const png = new PNG({ width, height });
  png.data = rgbaFill(width, height, rgba);
  fs.writeFileSync(filePath, PNG.sync.write(png, { colorType }));
}

// IHDR colour type byte: 8-byte signature + 4 length + 4 "IHDR" + 4 width + 4 height + 1 bit depth
export function pngColorType(buffer: Buffer): number {
  return buffer[25];
}
