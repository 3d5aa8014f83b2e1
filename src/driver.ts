import * as fs from "fs/promises";
import * as path from "path";

import { processImage } from "./processor";
import type { DirectoryJob, DirectorySummary, ProcessingResult } from "./types";
import { isSupportedImage } from "./utils";

export const DEFAULT_OUTPUT_SUBDIR = "watermarked";

export function resolveOutputDir(inputDir: string, outputDir?: string): string {
  return outputDir ? outputDir : path.join(inputDir, DEFAULT_OUTPUT_SUBDIR);
}

export async function ensureOutputDir(outputDir: string): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  return outputDir;
}

/** Supported image files directly inside `inputDir`, in directory order. */
export async function listImageFiles(inputDir: string): Promise<string[]> {
  const entries = await fs.readdir(inputDir, { withFileTypes: true });
  return entries.filter((entry) => entry.isFile() && isSupportedImage(entry.name)).map((entry) => entry.name);
}

/**
 * Watermarks every supported image in `job.inputDir`, one at a time.
 * A failing file is counted and skipped; the loop always runs to the end.
 */
export async function processDirectory(job: DirectoryJob): Promise<DirectorySummary> {
  const outputDir = await ensureOutputDir(resolveOutputDir(job.inputDir, job.outputDir));
  const files = await listImageFiles(job.inputDir);
  job.logger.info(`Found ${files.length} image(s) in ${job.inputDir}`);

  const results: ProcessingResult[] = [];
  let successful = 0;
  let failed = 0;

  for (const file of files) {
    const result = await processImage(path.join(job.inputDir, file), {
      outputDir,
      watermark: job.watermark,
      options: job.options,
      logger: job.logger,
    });
    if (result.ok) successful++;
    else failed++;
    results.push(result);
  }

  return { successful, failed, results };
}
