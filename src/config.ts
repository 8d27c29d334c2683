import * as dotenv from "dotenv";
import { ConfigError } from "./errors";

// ─── Load .env ────────────────────────────────────────────────────
dotenv.config();

// ─── Types ────────────────────────────────────────────────────────

export interface DatabaseSettings {
  server: string;
  port: number;
  databaseName: string;
  username: string;
  /** Name of the environment variable holding the password, never the password itself */
  passwordEnvVar: string;
}

export interface ExtractionSettings {
  outputDirectory: string;
  chunkSize: number;
  views: string[];
}

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface LoggingSettings {
  level: LogLevel;
  file: string;
}

export interface Settings {
  database: DatabaseSettings;
  extraction: ExtractionSettings;
  logging: LoggingSettings;
}

export const DEFAULT_PORT = 5432;
export const DEFAULT_CHUNK_SIZE = 10000;
export const DEFAULT_VIEWS = ["gold.dim_customers", "gold.dim_products", "gold.fact_sales"];
export const DEFAULT_LOG_FILE = "extract_data.log";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];

// schema.table; every character is also valid in a file name
const VIEW_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*\.[A-Za-z_][A-Za-z0-9_]*$/;

// ─── Helpers ──────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string, required: boolean): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) {
    if (required) throw new ConfigError("invalid", `Missing "${key}" section in settings`);
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError("invalid", `"${key}" must be a mapping`);
  }
  return value;
}

function requireString(obj: Record<string, unknown>, prefix: string, key: string): string {
  const value = obj[key];
  if (typeof value === "number") return String(value);
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError("invalid", `Missing or empty "${prefix}.${key}" in settings`);
  }
  return value;
}

function optionalInteger(
  obj: Record<string, unknown>,
  prefix: string,
  key: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  const num = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof num !== "number" || !Number.isInteger(num) || num < min || num > max) {
    throw new ConfigError(
      "invalid",
      `Invalid "${prefix}.${key}": "${String(value)}". Expected an integer between ${min} and ${max}`
    );
  }
  return num;
}

export function isViewIdentifier(name: string): boolean {
  return VIEW_IDENTIFIER.test(name);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseViews(value: unknown): string[] {
  if (value === undefined || value === null) return [...DEFAULT_VIEWS];
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError("invalid", `"data_extraction.views" must be a non-empty list`);
  }
  return value.map((item) => {
    if (typeof item !== "string" || !isViewIdentifier(item.trim())) {
      throw new ConfigError(
        "invalid",
        `Invalid view "${String(item)}" in "data_extraction.views". Expected schema.table`
      );
    }
    return item.trim();
  });
}

// ─── Settings ─────────────────────────────────────────────────────

export function resolveSettings(raw: Record<string, unknown>): Settings {
  const db = section(raw, "database", true);
  const extraction = section(raw, "data_extraction", true);
  const logging = section(raw, "logging", false);

  const level = logging.level === undefined ? "info" : String(logging.level);
  if (!isLogLevel(level)) {
    throw new ConfigError(
      "invalid",
      `Invalid "logging.level": "${level}". Use one of ${LOG_LEVELS.join(", ")}`
    );
  }

  return {
    database: {
      server: requireString(db, "database", "server"),
      port: optionalInteger(db, "database", "port", DEFAULT_PORT, 1, 65535),
      databaseName: requireString(db, "database", "database_name"),
      username: requireString(db, "database", "username"),
      passwordEnvVar: requireString(db, "database", "password_env_var"),
    },
    extraction: {
      outputDirectory: requireString(extraction, "data_extraction", "output_directory"),
      chunkSize: optionalInteger(extraction, "data_extraction", "chunk_size", DEFAULT_CHUNK_SIZE, 1),
      views: parseViews(extraction.views),
    },
    logging: {
      level,
      file: logging.file === undefined ? DEFAULT_LOG_FILE : requireString(logging, "logging", "file"),
    },
  };
}

/** An unset variable resolves to an empty password. */
export function resolvePassword(
  db: DatabaseSettings,
  env: NodeJS.ProcessEnv = process.env
): string {
  return env[db.passwordEnvVar] ?? "";
}

export function buildConnectionString(db: DatabaseSettings, password: string): string {
  const user = encodeURIComponent(db.username);
  const secret = encodeURIComponent(password);
  const database = encodeURIComponent(db.databaseName);
  return `postgresql://${user}:${secret}@${db.server}:${db.port}/${database}`;
}

/**
 * Pick the views to extract. Without a request the whole configured list is
 * used; a requested name outside that list is rejected.
 */
export function selectViews(allowList: string[], requested?: string[]): string[] {
  if (!requested || requested.length === 0) return [...allowList];

  const unknown = requested.filter((name) => !allowList.includes(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      "invalid",
      `Views not listed in "data_extraction.views": ${unknown.join(", ")}`
    );
  }
  return [...requested];
}
