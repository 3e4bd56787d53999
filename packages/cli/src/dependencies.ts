import type { FileSystemPort, PolicySimulatorPort } from "@iamspec/contracts";
import { createNodeFileSystem } from "@iamspec/engine";
import { createIamPolicySimulator } from "@iamspec/simulator-aws";
import { createIamSpecLogger, type IamSpecLogger, type IamSpecLogLevel } from "@iamspec/telemetry";

import type { CliEnvironment } from "./config.js";
import type { TextWriter } from "./reporter.js";

export interface SimulatorFactoryOptions {
  readonly region?: string;
  readonly logger: IamSpecLogger;
}

export interface CliDependencies {
  readonly fileSystem: FileSystemPort;
  readonly env: CliEnvironment;
  readonly cwd: string;
  /** Report output. */
  readonly stdout: TextWriter;
  /** Warnings, errors and log lines. */
  readonly stderr: TextWriter;
  readonly createSimulator: (options: SimulatorFactoryOptions) => PolicySimulatorPort;
}

export const createDefaultDependencies = (): CliDependencies => ({
  fileSystem: createNodeFileSystem(),
  env: process.env,
  cwd: process.cwd(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  createSimulator: (options) => createIamPolicySimulator(options),
});

export const createCliLogger = (dependencies: CliDependencies, level: IamSpecLogLevel): IamSpecLogger =>
  createIamSpecLogger({
    name: "iamspec-cli",
    level,
    sink: (_level, line) => dependencies.stderr(`${line}\n`),
  });
