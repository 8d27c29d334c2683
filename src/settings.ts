import * as fs from "fs";
import * as path from "path";
import yaml from "js-yaml";
import type { Logger } from "pino";
import { isRecord } from "./config";
import { ConfigError, describeError, errorCode } from "./errors";

// ─── Types ────────────────────────────────────────────────────

export type RawSettings = Record<string, unknown>;

export type SettingsLoadResult =
  | { ok: true; path: string; settings: RawSettings }
  | { ok: false; path: string; error: ConfigError };

// ─── Settings Loader ──────────────────────────────────────────

/** Resolved from the package root so the working directory does not matter. */
export const DEFAULT_SETTINGS_PATH = path.resolve(__dirname, "..", "config", "settings.yaml");

function fail(logger: Logger, error: ConfigError, filePath: string): SettingsLoadResult {
  logger.error(`FATAL: ${error.message}`);
  return { ok: false, path: filePath, error };
}

/**
 * Read and parse the YAML settings file. Each call reads the file again.
 * Failures come back as a typed error; nothing is thrown.
 */
export function loadYamlSettings(
  logger: Logger,
  filePath: string = DEFAULT_SETTINGS_PATH
): SettingsLoadResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT") {
      return fail(
        logger,
        new ConfigError("not_found", `Configuration file not found at ${filePath}`, filePath),
        filePath
      );
    }
    return fail(
      logger,
      new ConfigError(
        "unreadable",
        `Could not read configuration file at ${filePath}: ${describeError(err)}`,
        filePath
      ),
      filePath
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: filePath });
  } catch (err: unknown) {
    return fail(
      logger,
      new ConfigError(
        "parse_error",
        `Error parsing YAML file at ${filePath}: ${describeError(err)}`,
        filePath
      ),
      filePath
    );
  }

  // Empty file or comments only
  if (parsed === undefined || parsed === null) {
    logger.warn(`Configuration file at ${filePath} is empty.`);
    return { ok: true, path: filePath, settings: {} };
  }

  if (!isRecord(parsed)) {
    return fail(
      logger,
      new ConfigError(
        "parse_error",
        `Configuration file at ${filePath} must contain a mapping at the top level`,
        filePath
      ),
      filePath
    );
  }

  logger.info(`Successfully loaded settings from ${path.basename(filePath)}.`);
  return { ok: true, path: filePath, settings: parsed };
}
