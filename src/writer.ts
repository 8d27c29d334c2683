import * as fs from "fs";
import * as path from "path";
import Papa from "papaparse";

/** A value as it arrives from the driver */
export type CellValue = unknown;

export type CsvRow = Record<string, CellValue>;

/** Render a driver value as CSV cell text */
export function formatCell(value: CellValue): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `\\x${value.toString("hex")}`;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function toCsv(lines: Array<Array<string | null>>): string {
  if (lines.length === 0) return "";
  return Papa.unparse(lines, { newline: "\n" }) + "\n";
}

export class CsvFileWriter {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  /** Target file for a view: `<baseDir>/<view>.csv`, the identifier used as is */
  pathFor(viewName: string): string {
    return path.join(this.baseDir, `${viewName}.csv`);
  }

  /**
   * Write one chunk of rows. Chunk 0 truncates the file and starts it with the
   * header row; later chunks are appended without one.
   */
  writeChunk(viewName: string, columns: string[], rows: CsvRow[], chunkIndex: number): string {
    const filepath = this.pathFor(viewName);
    const body = toCsv(rows.map((row) => columns.map((col) => formatCell(row[col]))));

    if (chunkIndex === 0) {
      fs.writeFileSync(filepath, toCsv([columns]) + body, "utf-8");
    } else if (body !== "") {
      fs.appendFileSync(filepath, body, "utf-8");
    }

    return filepath;
  }
}
