import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "./cli-utils";
import { FakeSession, LEVEL, captureLogger } from "./test-utils";

describe("runCli", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "view-extract-cli-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeSettings(outputDirectory: string, extra: string[] = []): string {
    const file = path.join(dir, "settings.yaml");
    fs.writeFileSync(
      file,
      [
        "database:",
        "  server: localhost",
        "  database_name: warehouse",
        "  username: etl",
        "  password_env_var: WAREHOUSE_PASSWORD",
        "data_extraction:",
        `  output_directory: ${JSON.stringify(outputDirectory)}`,
        "  chunk_size: 2",
        "  views:",
        "    - gold.dim_missing",
        "    - gold.dim_customers",
        ...extra,
        "",
      ].join("\n")
    );
    return file;
  }

  function customersSession() {
    return new FakeSession({
      "gold.dim_customers": {
        columns: ["customer_key"],
        rows: [{ customer_key: 1 }, { customer_key: 2 }, { customer_key: 3 }],
      },
    });
  }

  it("exits 0 when the run completes with a failed view", async () => {
    const out = path.join(dir, "out");
    const config = writeSettings(out);
    const session = customersSession();
    const { logger, messages } = captureLogger();
    const createLogger = vi.fn(() => logger);

    const code = await runCli(["node", "view-extract", "--config", config], {
      connect: async () => ({ session, close: async () => {} }),
      createLogger,
      env: {},
    });

    expect(code).toBe(0);
    expect(fs.readFileSync(path.join(out, "gold.dim_customers.csv"), "utf-8")).toBe(
      "customer_key\n1\n2\n3\n"
    );
    expect(messages(LEVEL.info)).toContain(
      "Extraction process complete. 1 succeeded, 1 failed, 3 rows written."
    );
    // default logging settings reuse the bootstrap logger
    expect(createLogger).toHaveBeenCalledTimes(1);
  });

  it("exits 1 when the settings file is missing", async () => {
    const config = path.join(dir, "absent.yaml");
    const connect = vi.fn(async () => ({ session: customersSession(), close: async () => {} }));
    const { logger, messages } = captureLogger();

    const code = await runCli(["node", "view-extract", "--config", config], {
      connect,
      createLogger: () => logger,
      env: {},
    });

    expect(code).toBe(1);
    expect(connect).not.toHaveBeenCalled();
    expect(messages(LEVEL.fatal)).toEqual([
      `Configuration error: Configuration file not found at ${config}`,
    ]);
  });

  it("exits 1 before any view when the output path is a file", async () => {
    const blocker = path.join(dir, "occupied");
    fs.writeFileSync(blocker, "not a directory");
    const config = writeSettings(blocker);
    const session = customersSession();
    const { logger } = captureLogger();

    const code = await runCli(["node", "view-extract", "--config", config], {
      connect: async () => ({ session, close: async () => {} }),
      createLogger: () => logger,
      env: {},
    });

    expect(code).toBe(1);
    expect(session.statements).toEqual([]);
  });

  it("exits 1 for an invalid --chunk-size", async () => {
    const config = writeSettings(path.join(dir, "out"));
    const { logger, messages } = captureLogger();

    const code = await runCli(["node", "view-extract", "--config", config, "--chunk-size", "0"], {
      connect: async () => ({ session: customersSession(), close: async () => {} }),
      createLogger: () => logger,
      env: {},
    });

    expect(code).toBe(1);
    expect(messages(LEVEL.fatal)).toEqual([
      'Configuration error: Invalid --chunk-size: "0". Expected a positive integer',
    ]);
  });

  it("switches to the configured log file once settings are read", async () => {
    const config = writeSettings(path.join(dir, "out"), [
      "logging:",
      "  level: debug",
      "  file: logs/custom.log",
    ]);
    const { logger } = captureLogger();
    const createLogger = vi.fn(() => logger);

    await runCli(["node", "view-extract", "--config", config], {
      connect: async () => ({ session: customersSession(), close: async () => {} }),
      createLogger,
      env: {},
    });

    expect(createLogger.mock.calls).toEqual([
      [{ level: "info", file: "extract_data.log" }],
      [{ level: "debug", file: "logs/custom.log" }],
    ]);
  });
});
