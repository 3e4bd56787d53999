import { stringify as stringifyYaml } from "yaml";

import { prepareRun, toPrettyJson, type PreparedRun } from "@iamspec/engine";

import { resolveRenderConfig, type OutputFormat } from "../config.js";
import { createCliLogger, type CliDependencies } from "../dependencies.js";
import { EXIT_OK, reportFatal, reportWarnings } from "./run.js";

const parseJson = (text: string | undefined): unknown => (text === undefined ? undefined : JSON.parse(text));

/** What a run would send: the merged scenario, the token-injected policies and the expanded executions. */
export const toRenderedView = (prepared: PreparedRun) => ({
  scenario: prepared.scenario,
  identityPolicy: parseJson(prepared.sourceMap.identityPolicyText),
  permissionsBoundary: parseJson(prepared.sourceMap.permissionsBoundaryText),
  resourcePolicy: parseJson(prepared.sourceMap.resourcePolicyText),
  guardrailFiles: prepared.guardrailFiles,
  statements: Object.fromEntries(prepared.sourceMap.statements),
  executions: prepared.executions.map((execution) => ({
    test: execution.displayName,
    action: execution.action,
    resources: execution.resources,
    expect: execution.expect,
  })),
});

export const formatRenderedView = (view: ReturnType<typeof toRenderedView>, format: OutputFormat): string =>
  format === "json" ? `${toPrettyJson(view)}\n` : stringifyYaml(view);

export const renderCommand = async (options: unknown, dependencies: CliDependencies): Promise<number> => {
  const config = resolveRenderConfig(options, dependencies.env, dependencies.cwd);
  if (!config.ok) {
    return reportFatal(dependencies, config.error);
  }
  const prepared = await prepareRun(config.value.scenarioPath, {
    fileSystem: dependencies.fileSystem,
    logger: createCliLogger(dependencies, config.value.logLevel),
    strictPolicy: config.value.strictPolicy,
  });
  if (!prepared.ok) {
    return reportFatal(dependencies, prepared.error);
  }
  reportWarnings(dependencies, prepared.value.warnings);
  dependencies.stdout(formatRenderedView(toRenderedView(prepared.value), config.value.format));
  return EXIT_OK;
};
