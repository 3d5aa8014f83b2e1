import * as fs from "fs/promises";
import * as path from "path";
import { Jimp } from "jimp";
import { PNG } from "pngjs";
import * as jpeg from "jpeg-js";
import sharp from "sharp";

import type { Raster } from "./types";
import { fromRgbaBitmap, toRgba } from "./utils";

export type ImageFormat = "png" | "jpeg" | "bmp" | "webp";

export const OUTPUT_QUALITY = 95;

const FORMAT_BY_EXTENSION: Record<string, ImageFormat> = {
  ".png": "png",
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".bmp": "bmp",
  ".webp": "webp",
};

export function formatFromPath(filePath: string): ImageFormat | undefined {
  return FORMAT_BY_EXTENSION[path.extname(filePath).toLowerCase()];
}

function encodePng(image: Raster): Buffer {
  const { width, height } = image;
  const png = new PNG({ width, height });
  png.data = toRgba(image).data;
  // colorType 2 = truecolor without alpha
  return PNG.sync.write(png, { colorType: image.mode === "RGBA" ? 6 : 2 });
}

function encodeJpeg(image: Raster, quality: number): Buffer {
  const { width, height } = image;
  return jpeg.encode({ data: toRgba(image).data, width, height }, quality).data;
}

async function encodeBmp(image: Raster): Promise<Buffer> {
  const { width, height } = image;
  return Jimp.fromBitmap({ width, height, data: toRgba(image).data }).getBuffer("image/bmp");
}

async function encodeWebp(image: Raster, quality: number): Promise<Buffer> {
  const { width, height, mode } = image;
  return sharp(image.data, { raw: { width, height, channels: mode === "RGBA" ? 4 : 3 } })
    .webp({ quality })
    .toBuffer();
}

async function decodeWithJimp(buffer: Buffer): Promise<Raster> {
  const img = await Jimp.read(buffer);
  return fromRgbaBitmap(img.bitmap);
}

async function decodeWithSharp(buffer: Buffer): Promise<Raster> {
  const { data, info } = await sharp(buffer).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return fromRgbaBitmap({ width: info.width, height: info.height, data });
}

/**
 * Decodes an encoded image into a Raster.
 *
 * WEBP goes through sharp, everything else through Jimp. Without a format
 * hint Jimp is tried first and sharp second.
 */
export async function decodeImage(buffer: Buffer, format?: ImageFormat): Promise<Raster> {
  if (format === "webp") return decodeWithSharp(buffer);
  if (format) return decodeWithJimp(buffer);
  try {
    return await decodeWithJimp(buffer);
  } catch (jimpError) {
    try {
      return await decodeWithSharp(buffer);
    } catch {
      throw jimpError;
    }
  }
}

export async function encodeImage(image: Raster, format: ImageFormat, quality = OUTPUT_QUALITY): Promise<Buffer> {
  switch (format) {
    case "png":
      return encodePng(image);
    case "jpeg":
      return encodeJpeg(image, quality);
    case "bmp":
      return encodeBmp(image);
    case "webp":
      return encodeWebp(image, quality);
  }
}

export async function readImageFile(filePath: string): Promise<Raster> {
  const buffer = await fs.readFile(filePath);
  return decodeImage(buffer, formatFromPath(filePath));
}

export async function writeImageFile(filePath: string, image: Raster, quality = OUTPUT_QUALITY): Promise<void> {
  const format = formatFromPath(filePath);
  if (!format) throw new Error(`Unsupported output format: ${path.extname(filePath) || filePath}`);
  await fs.writeFile(filePath, await encodeImage(image, format, quality));
}
