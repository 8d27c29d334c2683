import * as path from "path";
import { Command, CommanderError } from "commander";
import { Client, types } from "pg";
import type { Logger } from "pino";
import {
  DEFAULT_LOG_FILE,
  type DatabaseSettings,
  type Settings,
  buildConnectionString,
  isLogLevel,
  resolvePassword,
  resolveSettings,
} from "./config";
import type { SqlSession } from "./data-extractor";
import { ConfigError, FatalExtractionError, describeError, errorCode } from "./errors";
import { type LoggerOptions, createLogger } from "./logger";
import { type DbConnection, runExtraction } from "./runner";
import { DEFAULT_SETTINGS_PATH, loadYamlSettings } from "./settings";

// ─── Parse CLI args ───────────────────────────────────────────────
export interface CliOptions {
  config?: string;
  output?: string;
  chunkSize?: string;
  views?: string;
  logLevel?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name("view-extract")
    .description("Export reporting views from PostgreSQL to CSV files, one file per view")
    .version("1.0.0")
    .option("--config <path>", "Settings YAML file", DEFAULT_SETTINGS_PATH)
    .option("--output <dir>", "Output directory (overrides data_extraction.output_directory)")
    .option("--chunk-size <rows>", "Rows fetched per chunk (overrides data_extraction.chunk_size)")
    .option("--views <views>", "Extract only these configured views (comma-separated, schema.table)")
    .option("--log-level <level>", "fatal, error, warn, info, debug or trace");
}

/** CLI flags take precedence over the settings file. */
export function applyCliOverrides(
  settings: Settings,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const merged: Settings = {
    database: { ...settings.database },
    extraction: { ...settings.extraction },
    logging: { ...settings.logging },
  };

  if (options.output) {
    merged.extraction.outputDirectory = options.output;
  }

  if (options.chunkSize !== undefined) {
    const chunkSize = Number(options.chunkSize);
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ConfigError(
        "invalid",
        `Invalid --chunk-size: "${options.chunkSize}". Expected a positive integer`
      );
    }
    merged.extraction.chunkSize = chunkSize;
  }

  const level = options.logLevel ?? env.LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError("invalid", `Invalid log level: "${level}"`);
    }
    merged.logging.level = level;
  }

  return merged;
}

export function parseViewList(value?: string): string[] | undefined {
  if (!value) return undefined;
  const views = value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v !== "");
  return views.length > 0 ? views : undefined;
}

// ─── Driver setup ────────────────────────────────────────────────
// date, timestamp, timestamptz
const TEXT_PASSTHROUGH_OIDS = [1082, 1114, 1184];

/**
 * Keep date and timestamp columns as the server's text. The default parsers
 * build local-time `Date` objects, which shift the value outside UTC.
 */
export function keepDatesAsText(): void {
  for (const oid of TEXT_PASSTHROUGH_OIDS) {
    types.setTypeParser(oid, (value: string) => value);
  }
}

export interface ErrorSource {
  on(event: "error", listener: (err: Error) => void): unknown;
}

/**
 * An unhandled "error" event (backend terminated, socket dropped) would crash
 * the process. The query in flight still rejects and fails only its view.
 */
export function watchClientErrors(client: ErrorSource, logger: Logger): void {
  client.on("error", (err) => {
    logger.error({ err }, `Database connection error: ${err.message}`);
  });
}

// ─── Connect to database ─────────────────────────────────────────
export async function connectToDatabase(
  db: DatabaseSettings,
  logger: Logger
): Promise<DbConnection> {
  const connectionString = buildConnectionString(db, resolvePassword(db));

  logger.info(`Connecting to ${db.server}:${db.port}/${db.databaseName} as ${db.username}...`);

  keepDatesAsText();
  const client = new Client({ connectionString, connectionTimeoutMillis: 10000 });
  watchClientErrors(client, logger);
  await client.connect();

  const session: SqlSession = {
    query: (text) => client.query(text),
  };

  return {
    session,
    close: async () => {
      await client.end();
      logger.debug("Database connection closed");
    },
  };
}

// ─── Handle common connection errors ─────────────────────────────
function connectionHints(err: unknown): string[] {
  const message = describeError(err);
  const code = errorCode(err);
  const hints: string[] = [];

  if (message.includes("authentication") || code === "28P01") {
    hints.push("Invalid username or password (check the variable named by database.password_env_var)");
  }
  if (message.includes("ECONNREFUSED") || code === "ECONNREFUSED") {
    hints.push("Check that the database server is running");
  }
  if (message.includes("timeout") || code === "ETIMEDOUT") {
    hints.push("Connection timed out. Check host and port");
  }
  if (code === "3D000") {
    hints.push("Database does not exist");
  }
  return hints;
}

// ─── Handle errors in main function ──────────────────────────────
export function handleError(err: unknown, logger: Logger): void {
  if (err instanceof ConfigError) {
    logger.fatal(`Configuration error: ${err.message}`);
    return;
  }

  if (err instanceof FatalExtractionError) {
    logger.fatal({ err: err.cause }, err.message);
    if (err.stage === "connection") {
      for (const hint of connectionHints(err.cause)) {
        logger.fatal(`  → ${hint}`);
      }
    }
    return;
  }

  logger.fatal({ err }, `Unexpected error: ${describeError(err)}`);
}

// ─── Run the CLI ─────────────────────────────────────────────────
export interface CliDependencies {
  connect: (db: DatabaseSettings, logger: Logger) => Promise<DbConnection>;
  createLogger: (options: LoggerOptions) => Logger;
  env: NodeJS.ProcessEnv;
}

const defaultDependencies: CliDependencies = {
  connect: connectToDatabase,
  createLogger,
  env: process.env,
};

/**
 * Parse `argv` (as in `process.argv`), load settings and extract.
 * Resolves to the exit code: 0 once the view loop has run, even when views
 * failed; 1 for configuration errors and fatal stages.
 */
export async function runCli(
  argv: string[],
  overrides: Partial<CliDependencies> = {}
): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };

  const program = buildProgram().exitOverride();
  try {
    program.parse(argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const options = program.opts<CliOptions>();

  // Until settings are read, log to the default file
  const requestedLevel = options.logLevel ?? deps.env.LOG_LEVEL ?? "info";
  const bootstrapOptions: LoggerOptions = {
    level: isLogLevel(requestedLevel) ? requestedLevel : "info",
    file: DEFAULT_LOG_FILE,
  };
  const bootstrap = deps.createLogger(bootstrapOptions);

  const loaded = loadYamlSettings(bootstrap, path.resolve(options.config ?? DEFAULT_SETTINGS_PATH));
  if (!loaded.ok) {
    handleError(loaded.error, bootstrap);
    return 1;
  }

  let settings: Settings;
  try {
    settings = applyCliOverrides(resolveSettings(loaded.settings), options, deps.env);
  } catch (err: unknown) {
    handleError(err, bootstrap);
    return 1;
  }

  const sameSink =
    settings.logging.level === bootstrapOptions.level &&
    path.resolve(settings.logging.file) === path.resolve(bootstrapOptions.file);
  const logger = sameSink ? bootstrap : deps.createLogger(settings.logging);
  if (!sameSink) {
    logger.info(`Settings loaded from ${loaded.path}`);
  }

  try {
    await runExtraction(
      settings,
      { logger, connect: () => deps.connect(settings.database, logger) },
      parseViewList(options.views)
    );
    return 0;
  } catch (err: unknown) {
    handleError(err, logger);
    return 1;
  }
}
