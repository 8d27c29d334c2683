import * as fs from "fs";
import * as path from "path";
import type { Logger } from "pino";
import { type Settings, selectViews } from "./config";
import { DataExtractor, type SqlSession, type ViewResult } from "./data-extractor";
import { FatalExtractionError, describeError } from "./errors";
import { CsvFileWriter } from "./writer";

// ─── Types ────────────────────────────────────────────────────

export interface DbConnection {
  session: SqlSession;
  close(): Promise<void>;
}

export interface RunDependencies {
  logger: Logger;
  connect: () => Promise<DbConnection>;
}

export interface ExtractionSummary {
  outputDirectory: string;
  results: ViewResult[];
  succeeded: number;
  failed: number;
  totalRows: number;
}

// ─── Run ──────────────────────────────────────────────────────

/** Create the output directory (and parents); an existing directory is fine. */
export function prepareOutputDirectory(dir: string): string {
  const resolved = path.resolve(dir);
  fs.mkdirSync(resolved, { recursive: true });
  if (!fs.statSync(resolved).isDirectory()) {
    throw new Error(`${resolved} exists and is not a directory`);
  }
  return resolved;
}

/**
 * One pass over the configured views with a single connection. Connection and
 * output-directory failures are fatal; a failing view is not.
 */
export async function runExtraction(
  settings: Settings,
  deps: RunDependencies,
  requestedViews?: string[]
): Promise<ExtractionSummary> {
  const { logger } = deps;
  const { extraction } = settings;
  const views = selectViews(extraction.views, requestedViews);

  logger.info("Starting extraction of Gold Layer tables/views...");

  let conn: DbConnection;
  try {
    conn = await deps.connect();
    logger.info("Successfully connected to the database.");
  } catch (err: unknown) {
    throw new FatalExtractionError(
      "connection",
      `Error creating database connection: ${describeError(err)}`,
      err
    );
  }

  try {
    let outputDirectory: string;
    try {
      outputDirectory = prepareOutputDirectory(extraction.outputDirectory);
      logger.info(`Output directory ready at: ${outputDirectory}`);
    } catch (err: unknown) {
      throw new FatalExtractionError(
        "output_directory",
        `Failed to create output directory ${extraction.outputDirectory}: ${describeError(err)}`,
        err
      );
    }

    const extractor = new DataExtractor(conn.session, new CsvFileWriter(outputDirectory), logger);
    const results = await extractor.extractViews({
      views,
      allowList: extraction.views,
      chunkSize: extraction.chunkSize,
    });

    const succeeded = results.filter((r) => r.status === "ok").length;
    const failed = results.length - succeeded;
    const totalRows = results.reduce((sum, r) => sum + r.rows, 0);

    logger.info(
      `Extraction process complete. ${succeeded} succeeded, ${failed} failed, ${totalRows} rows written.`
    );

    return { outputDirectory, results, succeeded, failed, totalRows };
  } finally {
    await conn.close();
  }
}
