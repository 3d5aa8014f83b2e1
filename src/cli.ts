#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";

import {
  ConfigurationError,
  USAGE,
  createLogger,
  describeError,
  ensureOutputDir,
  loadOrCreateWatermark,
  logFileName,
  parseCliArgs,
  processDirectory,
  resolveOutputDir,
} from "./index";
import type { Logger, WatermarkConfig } from "./index";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function assertDirectory(dir: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(dir);
  } catch {
    throw new ConfigurationError([`--input-dir ${dir} does not exist`]);
  }
  if (!stats.isDirectory()) throw new ConfigurationError([`--input-dir ${dir} is not a directory`]);
}

interface Prepared {
  config: WatermarkConfig;
  outputDir: string;
}

/** Resolves the arguments into a ready output directory, or an exit code. */
async function prepare(argv: string[]): Promise<Prepared | number> {
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.help) {
      console.log(USAGE);
      return EXIT_OK;
    }
    const { config } = parsed;
    assertDirectory(config.inputDir);
    const outputDir = await ensureOutputDir(resolveOutputDir(config.inputDir, config.outputDir));
    return { config, outputDir };
  } catch (err) {
    console.error(`error: ${describeError(err)}`);
    if (err instanceof ConfigurationError) {
      console.error(USAGE);
      return EXIT_USAGE;
    }
    return EXIT_FAILURE;
  }
}

/**
 * Runs the whole job for the given arguments and resolves with the process
 * exit code. Per-file failures still exit with EXIT_OK; only bad arguments
 * and startup failures do not.
 */
export async function runCli(argv: string[]): Promise<number> {
  const prepared = await prepare(argv);
  if (typeof prepared === "number") return prepared;

  const { config, outputDir } = prepared;
  let logger: Logger | undefined;
  try {
    logger = createLogger({ filePath: path.join(outputDir, logFileName()) });
    const watermark = await loadOrCreateWatermark(
      { logoPath: config.logoPath, text: config.watermarkText, fontPath: config.fontPath },
      logger
    );
    const { successful, failed } = await processDirectory({
      inputDir: config.inputDir,
      outputDir,
      watermark,
      options: { scale: config.scale, position: config.position, transparency: config.transparency },
      logger,
    });
    logger.info(`Processing complete. Successful: ${successful}, Failed: ${failed}`);
    return EXIT_OK;
  } catch (err) {
    if (logger) logger.error(`Watermarking aborted: ${describeError(err)}`);
    else console.error(`error: ${describeError(err)}`);
    return EXIT_FAILURE;
  } finally {
    logger?.close();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error("UNHANDLED ERROR:", err);
      process.exitCode = EXIT_FAILURE;
    });
}
