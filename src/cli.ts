#!/usr/bin/env node

import { buildProgram } from "./cli/program.js";

buildProgram()
  .parseAsync()
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  });
