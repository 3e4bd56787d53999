import { Command, CommanderError } from "commander";

import { renderCommand } from "./commands/render.js";
import { runCommand } from "./commands/run.js";
import type { CliDependencies } from "./dependencies.js";

export const VERSION = "0.1.0";

export const createProgram = (dependencies: CliDependencies, setExitCode: (code: number) => void): Command => {
  const program = new Command();

  program
    .name("iamspec")
    .description("Test IAM policies against declarative scenarios with a policy simulator")
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: dependencies.stdout, writeErr: dependencies.stderr });

  program
    .command("run")
    .description("Simulate every test of a scenario and check the expected decisions")
    .requiredOption("--scenario <path>", "Path to the scenario YAML")
    .option("--save <path>", "Write the raw simulator responses to this file")
    .option("--no-assert", "Do not exit with status 2 on expectation mismatches")
    .option("--no-warn", "Suppress the guardrail simulation warning")
    .option("--debug", "Log loaded files, variables and per-test results")
    .option("--strict-policy", "Fail when a policy contains non-IAM fields")
    .option("--show-matched-success", "List matched statements for passing tests")
    .option("--test <names>", "Comma-separated names of the tests to run")
    .option("--region <region>", "AWS region of the IAM endpoint")
    .action(async (options: unknown) => {
      setExitCode(await runCommand(options, dependencies));
    });

  program
    .command("render")
    .description("Print the effective scenario and the policies a run would send, without simulating")
    .requiredOption("--scenario <path>", "Path to the scenario YAML")
    .option("--format <format>", "Output format (json|yaml)", "yaml")
    .option("--strict-policy", "Fail when a policy contains non-IAM fields")
    .option("--debug", "Log loaded files and variables")
    .action(async (options: unknown) => {
      setExitCode(await renderCommand(options, dependencies));
    });

  return program;
};

/** Parses `argv` (without the node and script entries) and resolves to the process exit code. */
export const runCli = async (argv: ReadonlyArray<string>, dependencies: CliDependencies): Promise<number> => {
  let exitCode = 0;
  const program = createProgram(dependencies, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
};
