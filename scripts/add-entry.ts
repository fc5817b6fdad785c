#!/usr/bin/env tsx
import process from "node:process";
import { EXIT_CODES, runCli } from "../src/lib/cli";
import { createConsoleLogger } from "../src/lib/log";
import { ROOT_DIR } from "../src/lib/constants";

runCli(process.argv.slice(2), { root: ROOT_DIR, logger: createConsoleLogger() }).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_CODES.runtime;
  }
);
