import { Jimp } from "jimp";

import type { Offset, Raster, Size, WatermarkOptions, WatermarkPosition, WatermarkResult } from "./types";
import { WATERMARK_POSITIONS } from "./types";
import { clampByte, toRgb, toRgba } from "./utils";

export const DEFAULT_SCALE = 0.1;
export const DEFAULT_POSITION: WatermarkPosition = "top-right";
export const DEFAULT_TRANSPARENCY = 128;
export const DEFAULT_PADDING = 10;

export function isWatermarkPosition(value: string): value is WatermarkPosition {
  return (WATERMARK_POSITIONS as readonly string[]).includes(value);
}

/**
 * Scales the watermark so its width is `scale` times the base width,
 * keeping its aspect ratio. The input raster is left untouched.
 */
export async function resizeWatermark(watermark: Raster, base: Size, scale = DEFAULT_SCALE): Promise<Raster> {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new RangeError(`scale must be a positive number, got ${scale}`);
  }
  const w = Math.max(1, Math.floor(base.width * scale));
  const h = Math.max(1, Math.round((watermark.height * w) / watermark.width));

  const { width, height, data } = toRgba(watermark);
  const img = Jimp.fromBitmap({ width, height, data });
  // no strategy: Jimp's default resampler averages source areas when shrinking
  img.resize({ w, h });

  return { width: img.bitmap.width, height: img.bitmap.height, mode: "RGBA", data: Buffer.from(img.bitmap.data) };
}

export function calculatePosition(
  base: Size,
  watermark: Size,
  position: string = DEFAULT_POSITION,
  padding = DEFAULT_PADDING
): Offset {
  const right = base.width - watermark.width - padding;
  const bottom = base.height - watermark.height - padding;
  const positions: Record<WatermarkPosition, Offset> = {
    "top-left": { x: padding, y: padding },
    "top-right": { x: right, y: padding },
    "bottom-left": { x: padding, y: bottom },
    "bottom-right": { x: right, y: bottom },
    center: {
      x: Math.trunc((base.width - watermark.width) / 2),
      y: Math.trunc((base.height - watermark.height) / 2),
    },
  };
  return positions[isWatermarkPosition(position) ? position : DEFAULT_POSITION];
}

/**
 * Composites `watermark` onto `base` at `offset` and returns a new RGB raster.
 *
 * The watermark alpha is multiplied by transparency/255, then used as its own
 * paste mask over an RGBA canvas holding the base. Pixels falling outside the
 * base are clipped.
 */
export function blendWatermark(
  base: Raster,
  watermark: Raster,
  offset: Offset,
  transparency = DEFAULT_TRANSPARENCY
): Raster {
  const t = clampByte(transparency);
  const mark = toRgba(watermark);
  for (let i = 3; i < mark.data.length; i += 4) {
    mark.data[i] = Math.floor((mark.data[i] * t) / 255);
  }

  const canvas = toRgba(base);

  const x0 = Math.max(0, offset.x);
  const y0 = Math.max(0, offset.y);
  const x1 = Math.min(canvas.width, offset.x + mark.width);
  const y1 = Math.min(canvas.height, offset.y + mark.height);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const src = ((y - offset.y) * mark.width + (x - offset.x)) * 4;
      const dst = (y * canvas.width + x) * 4;
      const a = mark.data[src + 3];
      if (a === 0) continue;
      for (let c = 0; c < 4; c++) {
        canvas.data[dst + c] = Math.round((mark.data[src + c] * a + canvas.data[dst + c] * (255 - a)) / 255);
      }
    }
  }

  return toRgb(canvas);
}

export async function addWatermark(
  base: Raster,
  template: Raster,
  options: WatermarkOptions = {}
): Promise<WatermarkResult> {
  const scale = options.scale ?? DEFAULT_SCALE;
  const position = options.position ?? DEFAULT_POSITION;
  const transparency = options.transparency ?? DEFAULT_TRANSPARENCY;
  const padding = options.padding ?? DEFAULT_PADDING;

  const scaled = await resizeWatermark(template, base, scale);
  const offset = calculatePosition(base, scaled, position, padding);
  const image = blendWatermark(base, scaled, offset, transparency);

  return { image, offset, watermarkSize: { width: scaled.width, height: scaled.height } };
}
