import type { Logger } from "pino";
import { isViewIdentifier } from "./config";
import { describeError } from "./errors";
import { CsvFileWriter, type CsvRow } from "./writer";

// ─── Types ────────────────────────────────────────────────────

export interface QueryField {
  name: string;
}

export interface SqlResult {
  rows: CsvRow[];
  fields: QueryField[];
}

/** The slice of a pg `Client` the extractor needs */
export interface SqlSession {
  query(text: string): Promise<SqlResult>;
}

export interface ViewExtractionOptions {
  views: string[];
  /** Views permitted in generated SQL */
  allowList: string[];
  chunkSize: number;
}

export type ViewResult =
  | { view: string; status: "ok"; rows: number; file: string }
  | { view: string; status: "failed"; rows: number; error: string };

const CURSOR_NAME = "view_extract_cursor";

// ─── Data Extractor ───────────────────────────────────────────

export class DataExtractor {
  private session: SqlSession;
  private writer: CsvFileWriter;
  private logger: Logger;

  constructor(session: SqlSession, writer: CsvFileWriter, logger: Logger) {
    this.session = session;
    this.writer = writer;
    this.logger = logger;
  }

  /** Extract every view in order; a failing view is logged and skipped. */
  async extractViews(options: ViewExtractionOptions): Promise<ViewResult[]> {
    const { views, allowList, chunkSize } = options;
    const results: ViewResult[] = [];

    for (const viewName of views) {
      this.logger.info(`Processing table/view: ${viewName}`);
      const progress = { rows: 0 };

      try {
        const file = await this.extractView(viewName, allowList, chunkSize, progress);
        this.logger.info(`Success! Extracted ${progress.rows} rows from ${viewName}`);
        results.push({ view: viewName, status: "ok", rows: progress.rows, file });
      } catch (err: unknown) {
        this.logger.error({ err }, `ERROR extracting ${viewName}: ${describeError(err)}`);
        results.push({
          view: viewName,
          status: "failed",
          rows: progress.rows,
          error: describeError(err),
        });
      }
    }

    return results;
  }

  private async extractView(
    viewName: string,
    allowList: string[],
    chunkSize: number,
    progress: { rows: number }
  ): Promise<string> {
    const relation = this.checkedRelation(viewName, allowList);

    await this.session.query("BEGIN");
    try {
      await this.session.query(
        `DECLARE ${CURSOR_NAME} NO SCROLL CURSOR FOR SELECT * FROM ${relation}`
      );

      let file = this.writer.pathFor(viewName);
      for (let chunkIndex = 0; ; chunkIndex++) {
        const { rows, fields } = await this.session.query(
          `FETCH FORWARD ${chunkSize} FROM ${CURSOR_NAME}`
        );
        const columns = fields.map((f) => f.name);

        // The first chunk is written even when empty so the file gets its header
        if (chunkIndex === 0 || rows.length > 0) {
          file = this.writer.writeChunk(viewName, columns, rows, chunkIndex);
          progress.rows += rows.length;
          this.logger.debug(`Processed chunk ${chunkIndex + 1} of ${viewName}: ${rows.length} rows`);
        }

        if (rows.length < chunkSize) break;
      }

      await this.session.query(`CLOSE ${CURSOR_NAME}`);
      await this.session.query("COMMIT");
      return file;
    } catch (err: unknown) {
      await this.rollback(viewName);
      throw err;
    }
  }

  private async rollback(viewName: string): Promise<void> {
    try {
      await this.session.query("ROLLBACK");
    } catch (rollbackErr: unknown) {
      this.logger.warn(`Rollback after ${viewName} failed: ${describeError(rollbackErr)}`);
    }
  }

  /** Only configured, well-formed identifiers reach the query text, verbatim */
  private checkedRelation(viewName: string, allowList: string[]): string {
    if (!allowList.includes(viewName)) {
      throw new Error(`View "${viewName}" is not in the configured view list`);
    }
    if (!isViewIdentifier(viewName)) {
      throw new Error(`View "${viewName}" is not a schema.table identifier`);
    }
    return viewName;
  }
}
