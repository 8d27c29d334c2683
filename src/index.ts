// Public API exports
export {
  resolveSettings,
  resolvePassword,
  buildConnectionString,
  selectViews,
  isViewIdentifier,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_VIEWS,
} from "./config";
export { loadYamlSettings, DEFAULT_SETTINGS_PATH } from "./settings";
export { CsvFileWriter, formatCell } from "./writer";
export { DataExtractor } from "./data-extractor";
export { runExtraction, prepareOutputDirectory } from "./runner";
export { runCli } from "./cli-utils";
export { createLogger } from "./logger";
export { ConfigError, FatalExtractionError } from "./errors";

// Re-export types
export type { Settings, DatabaseSettings, ExtractionSettings, LoggingSettings, LogLevel } from "./config";
export type { RawSettings, SettingsLoadResult } from "./settings";
export type { SqlSession, SqlResult, ViewResult, ViewExtractionOptions } from "./data-extractor";
export type { DbConnection, ExtractionSummary, RunDependencies } from "./runner";
export type { CliDependencies } from "./cli-utils";
