#!/usr/bin/env node
import { runCli } from "./cli-utils";

runCli(process.argv).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  }
);
