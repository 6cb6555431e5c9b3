#!/usr/bin/env node
import { createProgram, describeError } from "./program";
import { loadEnvFiles } from "./config";

loadEnvFiles();
// stdout carries the JSON report; keep progress chatter off unless asked for.
process.env.LOG_LEVEL ??= "warn";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(JSON.stringify({ error: true, message: describeError(error) }, null, 2));
    process.exitCode = 1;
  });
