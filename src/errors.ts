/**
 * Error taxonomy for the watermarking pipeline.
 *
 * Only ConfigurationError stops a run. The others are recovered where they
 * happen: asset failures fall back to a text watermark, per-file failures are
 * counted by the directory driver.
 */

export enum WatermarkErrorCode {
  ASSET_LOAD_FAILED = "ASSET_LOAD_FAILED",
  SOURCE_OPEN_FAILED = "SOURCE_OPEN_FAILED",
  COMPOSITE_FAILED = "COMPOSITE_FAILED",
  WRITE_FAILED = "WRITE_FAILED",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
}

export class WatermarkError extends Error {
  public readonly code: WatermarkErrorCode;
  public readonly details?: string;

  constructor(code: WatermarkErrorCode, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "WatermarkError";
    this.code = code;
    if (cause !== undefined) this.details = describeError(cause);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class AssetLoadError extends WatermarkError {
  constructor(public readonly logoPath: string, cause?: unknown) {
    super(WatermarkErrorCode.ASSET_LOAD_FAILED, `Unable to load watermark logo ${logoPath}`, cause);
    this.name = "AssetLoadError";
  }
}

export class SourceOpenError extends WatermarkError {
  constructor(public readonly sourcePath: string, cause?: unknown) {
    super(WatermarkErrorCode.SOURCE_OPEN_FAILED, `Unable to open image ${sourcePath}`, cause);
    this.name = "SourceOpenError";
  }
}

export class CompositeError extends WatermarkError {
  constructor(public readonly sourcePath: string, cause?: unknown) {
    super(WatermarkErrorCode.COMPOSITE_FAILED, `Unable to watermark ${sourcePath}`, cause);
    this.name = "CompositeError";
  }
}

export class WriteError extends WatermarkError {
  constructor(public readonly outputPath: string, cause?: unknown) {
    super(WatermarkErrorCode.WRITE_FAILED, `Unable to write ${outputPath}`, cause);
    this.name = "WriteError";
  }
}

export class ConfigurationError extends WatermarkError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(WatermarkErrorCode.INVALID_CONFIGURATION, `Invalid configuration: ${issues.join(", ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof WatermarkError && error.details) {
    return `${error.message}: ${error.details}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
