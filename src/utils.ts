import * as path from "path";
import type { ColorMode, Raster } from "./types";

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([".png", ".jpg", ".jpeg", ".bmp", ".webp"]);

// Strip surrounding whitespace and any embedded line breaks from user paths
export function cleanPath(value: string): string {
  return value.trim().replace(/[\r\n]/g, "");
}

export function isSupportedImage(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

export function channelsOf(mode: ColorMode): 3 | 4 {
  return mode === "RGBA" ? 4 : 3;
}

export function clampByte(v: number): number {
  return Math.max(0, Math.min(255, Math.round(v)));
}

export function cloneRaster(image: Raster): Raster {
  return { ...image, data: Buffer.from(image.data) };
}

/** Always returns a new raster, even when the input is already RGBA. */
export function toRgba(image: Raster): Raster {
  if (image.mode === "RGBA") return cloneRaster(image);
  const { width, height, data } = image;
  const out = Buffer.alloc(width * height * 4);
  for (let i = 0, j = 0; i < data.length; i += 3, j += 4) {
    out[j] = data[i];
    out[j + 1] = data[i + 1];
    out[j + 2] = data[i + 2];
    out[j + 3] = 255;
  }
  return { width, height, mode: "RGBA", data: out };
}

/** Drops the alpha channel without compositing it over a background. */
export function toRgb(image: Raster): Raster {
  if (image.mode === "RGB") return cloneRaster(image);
  const { width, height, data } = image;
  const out = Buffer.alloc(width * height * 3);
  for (let i = 0, j = 0; i < data.length; i += 4, j += 3) {
    out[j] = data[i];
    out[j + 1] = data[i + 1];
    out[j + 2] = data[i + 2];
  }
  return { width, height, mode: "RGB", data: out };
}

export function hasTransparency(rgba: Buffer): boolean {
  for (let i = 3; i < rgba.length; i += 4) {
    if (rgba[i] !== 255) return true;
  }
  return false;
}

// Decoders hand back RGBA; keep the alpha only when it carries information
export function fromRgbaBitmap(bitmap: { width: number; height: number; data: Buffer }): Raster {
  const image: Raster = {
    width: bitmap.width,
    height: bitmap.height,
    mode: "RGBA",
    data: Buffer.from(bitmap.data),
  };
  return hasTransparency(image.data) ? image : toRgb(image);
}

export function describeRaster(image: Raster): string {
  return `${image.width}x${image.height}, ${image.mode}`;
}
