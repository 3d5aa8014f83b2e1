import * as path from "path";

import { readImageFile, writeImageFile } from "./codecs";
import { CompositeError, SourceOpenError, WatermarkError, WriteError, describeError } from "./errors";
import type { ProcessingResult, ProcessorContext, Raster } from "./types";
import { describeRaster, toRgb } from "./utils";
import { addWatermark } from "./watermark";

/**
 * Watermarks a single file into `context.outputDir`, keeping its file name.
 * Never throws: every failure comes back as `{ ok: false }` and is logged.
 */
export async function processImage(sourcePath: string, context: ProcessorContext): Promise<ProcessingResult> {
  const { outputDir, watermark, options, logger } = context;
  const file = path.basename(sourcePath);
  const outputPath = path.join(outputDir, file);

  try {
    let image: Raster;
    try {
      image = await readImageFile(sourcePath);
    } catch (err) {
      throw new SourceOpenError(sourcePath, err);
    }
    logger.info(`Processing ${file}: ${describeRaster(image)}`);

    if (image.mode !== "RGB") image = toRgb(image);

    let result: Raster;
    try {
      result = (await addWatermark(image, watermark, options)).image;
    } catch (err) {
      throw new CompositeError(sourcePath, err);
    }

    try {
      await writeImageFile(outputPath, result);
    } catch (err) {
      throw new WriteError(outputPath, err);
    }

    logger.info(`Successfully processed: ${file}`);
    return { ok: true, file, outputPath };
  } catch (err) {
    const error = err instanceof WatermarkError ? err : new CompositeError(sourcePath, err);
    logger.error(`Error processing ${file}: ${describeError(error)}`);
    return { ok: false, file, error };
  }
}
