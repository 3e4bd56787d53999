import type { IamSpecError } from "@iamspec/contracts";
import { SAVED_RESPONSE_MODE, executeRun, formatError, prepareRun, saveResponses } from "@iamspec/engine";

import { resolveRunConfig } from "../config.js";
import { createCliLogger, type CliDependencies } from "../dependencies.js";
import { createConsoleReporter } from "../reporter.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_EXPECTATION_FAILED = 2;

export const reportFatal = (dependencies: CliDependencies, error: IamSpecError): number => {
  dependencies.stderr(`Error: ${formatError(error)}\n`);
  return EXIT_FATAL;
};

export const reportWarnings = (dependencies: CliDependencies, warnings: ReadonlyArray<string>): void => {
  for (const warning of warnings) {
    dependencies.stderr(`Warning: ${warning}\n`);
  }
};

export const runCommand = async (options: unknown, dependencies: CliDependencies): Promise<number> => {
  const config = resolveRunConfig(options, dependencies.env, dependencies.cwd);
  if (!config.ok) {
    return reportFatal(dependencies, config.error);
  }
  const settings = config.value;
  const { fileSystem } = dependencies;
  const logger = createCliLogger(dependencies, settings.logLevel);

  const prepared = await prepareRun(settings.scenarioPath, {
    fileSystem,
    logger,
    strictPolicy: settings.strictPolicy,
    testNames: settings.testNames,
    warnOnGuardrails: settings.warnOnGuardrails,
  });
  if (!prepared.ok) {
    return reportFatal(dependencies, prepared.error);
  }
  reportWarnings(dependencies, prepared.value.warnings);

  const reporter = createConsoleReporter({
    write: dependencies.stdout,
    fileSystem,
    showMatchedSuccess: settings.showMatchedSuccess,
  });
  reporter.start(prepared.value.executions.length);

  const simulator = dependencies.createSimulator({ region: settings.region, logger });
  const report = await executeRun(prepared.value, {
    simulator,
    fileSystem,
    logger,
    onOutcome: (outcome, progress) => reporter.outcome(outcome, progress),
  });
  if (!report.ok) {
    return reportFatal(dependencies, report.error);
  }
  reporter.summary(report.value.summary);

  if (settings.savePath) {
    await saveResponses(fileSystem, settings.savePath, report.value.outcomes);
    dependencies.stdout(
      `\nSaved raw responses → ${settings.savePath} (permissions: ${SAVED_RESPONSE_MODE.toString(8).padStart(4, "0")})\n`,
    );
  }

  return settings.assert && report.value.summary.failed > 0 ? EXIT_EXPECTATION_FAILED : EXIT_OK;
};
