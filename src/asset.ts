import { Jimp, loadFont } from "jimp";
import { SANS_16_BLACK } from "jimp/fonts";

import { AssetLoadError, describeError } from "./errors";
import { readImageFile } from "./codecs";
import type { Logger } from "./logger";
import type { Raster, WatermarkSource } from "./types";
import { describeRaster } from "./utils";

export const TEXT_CANVAS_WIDTH = 150;
export const TEXT_CANVAS_HEIGHT = 50;
export const TEXT_OFFSET = { x: 10, y: 10 } as const;
export const TEXT_ALPHA = 128;

type BitmapFont = Awaited<ReturnType<typeof loadFont>>;

async function loadTextFont(fontPath: string | undefined, logger: Logger): Promise<BitmapFont | undefined> {
  const candidates = fontPath ? [fontPath, SANS_16_BLACK] : [SANS_16_BLACK];
  for (const candidate of candidates) {
    try {
      return await loadFont(candidate);
    } catch (err) {
      logger.warn(`Font ${candidate} unavailable, trying the next one`, describeError(err));
    }
  }
  return undefined;
}

/**
 * Renders `text` onto a small transparent canvas. The glyphs are recolored to
 * black at TEXT_ALPHA so the template reads as a half-transparent stamp.
 */
export async function createTextWatermark(text: string, logger: Logger, fontPath?: string): Promise<Raster> {
  const canvas = new Jimp({ width: TEXT_CANVAS_WIDTH, height: TEXT_CANVAS_HEIGHT, color: 0x00000000 });

  const font = await loadTextFont(fontPath, logger);
  if (font) {
    canvas.print({ font, x: TEXT_OFFSET.x, y: TEXT_OFFSET.y, text });
  } else {
    logger.warn("No font could be loaded, text watermark will be blank");
  }

  const { data } = canvas.bitmap;
  for (let i = 0; i < data.length; i += 4) {
    data[i] = 0;
    data[i + 1] = 0;
    data[i + 2] = 0;
    data[i + 3] = Math.floor((data[i + 3] * TEXT_ALPHA) / 255);
  }

  return { width: canvas.bitmap.width, height: canvas.bitmap.height, mode: "RGBA", data: Buffer.from(data) };
}

/**
 * Resolves the watermark template for a run: the logo at `logoPath` when it
 * decodes, a rendered text stamp otherwise.
 */
export async function loadOrCreateWatermark(source: WatermarkSource, logger: Logger): Promise<Raster> {
  if (source.logoPath) {
    try {
      const logo = await readImageFile(source.logoPath);
      logger.info(`Watermark loaded: ${describeRaster(logo)}`);
      return logo;
    } catch (err) {
      const error = new AssetLoadError(source.logoPath, err);
      logger.warn("Logo not found. Using text watermark instead.", error);
    }
  }
  return createTextWatermark(source.text, logger, source.fontPath);
}
