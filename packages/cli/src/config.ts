import { resolve } from "node:path";

import { z } from "zod";

import { err, ok, type IamSpecError, type Result } from "@iamspec/contracts";
import { configurationError, describeIssues } from "@iamspec/engine";
import { isLogLevel, LOG_LEVELS, type IamSpecLogLevel } from "@iamspec/telemetry";

export const DEFAULT_LOG_LEVEL: IamSpecLogLevel = "info";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type CliEnvironment = Readonly<Record<string, string | undefined>>;

// Exported shell variables are often set but empty.
const blankAsUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

const logLevelSchema = z.custom<IamSpecLogLevel>((value) => typeof value === "string" && isLogLevel(value), {
  message: `Expected one of ${LOG_LEVELS.join(", ")}`,
});

export const environmentSchema = z.object({
  IAMSPEC_LOG_LEVEL: blankAsUndefined(logLevelSchema),
  AWS_REGION: blankAsUndefined(z.string()),
});

const runOptionsSchema = z.object({
  scenario: z.string().min(1),
  save: z.string().min(1).optional(),
  assert: z.boolean().default(true),
  warn: z.boolean().default(true),
  debug: z.boolean().default(false),
  strictPolicy: z.boolean().default(false),
  showMatchedSuccess: z.boolean().default(false),
  test: z.string().optional(),
  region: z.string().min(1).optional(),
});

const renderOptionsSchema = z.object({
  scenario: z.string().min(1),
  format: z.enum(OUTPUT_FORMATS).default("yaml"),
  strictPolicy: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export interface RunConfig {
  readonly scenarioPath: string;
  readonly savePath?: string;
  /** Exit with status 2 when any expectation fails. */
  readonly assert: boolean;
  readonly warnOnGuardrails: boolean;
  readonly strictPolicy: boolean;
  readonly showMatchedSuccess: boolean;
  readonly testNames: ReadonlyArray<string>;
  readonly region?: string;
  readonly logLevel: IamSpecLogLevel;
}

export interface RenderConfig {
  readonly scenarioPath: string;
  readonly format: OutputFormat;
  readonly strictPolicy: boolean;
  readonly logLevel: IamSpecLogLevel;
}

const parseWith = <T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  source: string,
): Result<z.output<T>, IamSpecError> => {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(configurationError(`Invalid ${source}`, { issues: describeIssues(parsed.error) }));
};

export const parseTestNames = (value: string | undefined): ReadonlyArray<string> =>
  (value ?? "")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

const logLevelFor = (debug: boolean, environment: z.output<typeof environmentSchema>): IamSpecLogLevel =>
  debug ? "debug" : environment.IAMSPEC_LOG_LEVEL ?? DEFAULT_LOG_LEVEL;

export const resolveRunConfig = (
  options: unknown,
  environment: CliEnvironment,
  cwd: string,
): Result<RunConfig, IamSpecError> => {
  const env = parseWith(environmentSchema, environment, "environment");
  if (!env.ok) {
    return env;
  }
  const parsed = parseWith(runOptionsSchema, options, "run options");
  if (!parsed.ok) {
    return parsed;
  }
  const values = parsed.value;
  return ok({
    scenarioPath: resolve(cwd, values.scenario),
    savePath: values.save === undefined ? undefined : resolve(cwd, values.save),
    assert: values.assert,
    warnOnGuardrails: values.warn,
    strictPolicy: values.strictPolicy,
    showMatchedSuccess: values.showMatchedSuccess,
    testNames: parseTestNames(values.test),
    region: values.region ?? env.value.AWS_REGION,
    logLevel: logLevelFor(values.debug, env.value),
  });
};

export const resolveRenderConfig = (
  options: unknown,
  environment: CliEnvironment,
  cwd: string,
): Result<RenderConfig, IamSpecError> => {
  const env = parseWith(environmentSchema, environment, "environment");
  if (!env.ok) {
    return env;
  }
  const parsed = parseWith(renderOptionsSchema, options, "render options");
  if (!parsed.ok) {
    return parsed;
  }
  return ok({
    scenarioPath: resolve(cwd, parsed.value.scenario),
    format: parsed.value.format,
    strictPolicy: parsed.value.strictPolicy,
    logLevel: logLevelFor(parsed.value.debug, env.value),
  });
};
