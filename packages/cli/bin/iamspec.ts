#!/usr/bin/env node
import { createDefaultDependencies } from "../src/dependencies.js";
import { runCli } from "../src/program.js";

const dependencies = createDefaultDependencies();

runCli(process.argv.slice(2), dependencies).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    dependencies.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  },
);
