export type { CliEnvironment, OutputFormat, RenderConfig, RunConfig } from "./config.js";
export {
  DEFAULT_LOG_LEVEL,
  OUTPUT_FORMATS,
  environmentSchema,
  parseTestNames,
  resolveRenderConfig,
  resolveRunConfig,
} from "./config.js";
export type { CliDependencies, SimulatorFactoryOptions } from "./dependencies.js";
export { createCliLogger, createDefaultDependencies } from "./dependencies.js";
export type { ConsoleReporterOptions, RunReporter, TextWriter } from "./reporter.js";
export { createConsoleReporter, formatSummary } from "./reporter.js";
export { EXIT_EXPECTATION_FAILED, EXIT_FATAL, EXIT_OK, runCommand } from "./commands/run.js";
export { formatRenderedView, renderCommand, toRenderedView } from "./commands/render.js";
export { VERSION, createProgram, runCli } from "./program.js";
