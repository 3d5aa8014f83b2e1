export * from "./types";
export * from "./errors";
export * from "./utils";
export * from "./codecs";
export * from "./asset";
export * from "./watermark";
export * from "./processor";
export * from "./driver";
export * from "./logger";
export * from "./config";
