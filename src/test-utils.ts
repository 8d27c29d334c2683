import pino from "pino";
import type { Logger } from "pino";
import type { SqlResult, SqlSession } from "./data-extractor";
import type { CsvRow } from "./writer";

export interface FakeTable {
  columns: string[];
  rows: CsvRow[];
  /** Throw on the nth FETCH (1-based) for this table */
  failOnFetch?: number;
}

interface OpenCursor {
  table: FakeTable;
  offset: number;
  fetches: number;
}

/**
 * In-memory stand-in for a pg client that understands the cursor statements
 * the extractor issues. Tables are keyed by the relation text after FROM.
 */
export class FakeSession implements SqlSession {
  readonly statements: string[] = [];
  private tables: Map<string, FakeTable>;
  private cursors = new Map<string, OpenCursor>();

  constructor(tables: Record<string, FakeTable>) {
    this.tables = new Map(Object.entries(tables));
  }

  async query(text: string): Promise<SqlResult> {
    this.statements.push(text);

    if (text === "BEGIN" || text === "COMMIT" || text === "ROLLBACK") {
      if (text === "ROLLBACK") this.cursors.clear();
      return { rows: [], fields: [] };
    }

    const declare = /^DECLARE (\w+) NO SCROLL CURSOR FOR SELECT \* FROM (.+)$/.exec(text);
    if (declare) {
      const table = this.tables.get(declare[2]);
      if (!table) {
        throw new Error(`relation "${declare[2]}" does not exist`);
      }
      this.cursors.set(declare[1], { table, offset: 0, fetches: 0 });
      return { rows: [], fields: [] };
    }

    const fetch = /^FETCH FORWARD (\d+) FROM (\w+)$/.exec(text);
    if (fetch) {
      const cursor = this.cursors.get(fetch[2]);
      if (!cursor) throw new Error(`cursor "${fetch[2]}" does not exist`);
      cursor.fetches++;
      if (cursor.table.failOnFetch === cursor.fetches) {
        throw new Error("canceling statement due to user request");
      }
      const count = Number(fetch[1]);
      const rows = cursor.table.rows.slice(cursor.offset, cursor.offset + count);
      cursor.offset += rows.length;
      return { rows, fields: cursor.table.columns.map((name) => ({ name })) };
    }

    const close = /^CLOSE (\w+)$/.exec(text);
    if (close) {
      this.cursors.delete(close[1]);
      return { rows: [], fields: [] };
    }

    throw new Error(`syntax error at or near "${text.split(" ")[0]}"`);
  }

  /** SELECT targets declared so far, in order */
  selectedRelations(): string[] {
    return this.statements
      .map((s) => /SELECT \* FROM (.+)$/.exec(s))
      .flatMap((m) => (m ? [m[1]] : []));
  }
}

export interface LogEntry {
  level: number;
  msg: string;
  name?: string;
  err?: { message: string; stack?: string };
}

/** A pino logger that keeps its JSON lines in memory */
export function captureLogger(): { logger: Logger; entries: LogEntry[]; messages: (level?: number) => string[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    { name: "test", level: "debug" },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      },
    }
  );
  const messages = (level?: number) =>
    entries.filter((e) => level === undefined || e.level === level).map((e) => e.msg);
  return { logger, entries, messages };
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50, fatal: 60 } as const;
