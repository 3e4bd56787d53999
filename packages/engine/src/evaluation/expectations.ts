import type {
  AtomicExecution,
  ExecutionOutcome,
  FileSystemPort,
  MatchedStatementReport,
  PolicySourceIndex,
  SimulationResponse,
} from "@iamspec/contracts";

import { sliceLines } from "../policy/statement-spans.js";
import { describeCause } from "../errors.js";

export interface EvaluateExecutionOptions {
  readonly fileSystem: FileSystemPort;
  readonly sources: PolicySourceIndex;
}

export const decisionsMatch = (expected: string, actual: string): boolean =>
  expected.toLowerCase() === actual.toLowerCase();

export const describeMatchedStatements = (
  tokens: ReadonlyArray<string>,
  sources: PolicySourceIndex,
): ReadonlyArray<MatchedStatementReport> =>
  tokens.map((token) => {
    const source = sources.get(token);
    return source
      ? { token, label: source.label, filePath: source.filePath, lineRange: source.lineRange }
      : { token };
  });

const excerpt = async (fileSystem: FileSystemPort, report: MatchedStatementReport): Promise<ReadonlyArray<string>> => {
  const range = report.lineRange;
  if (!report.filePath || !range) {
    return [];
  }
  let text: string;
  try {
    text = await fileSystem.readText(report.filePath);
  } catch (error) {
    return [`    (source unavailable: ${describeCause(error)})`];
  }
  return sliceLines(text, range).map((line, offset) => `    ${range.start + offset}: ${line}`);
};

const describeStatement = async (
  fileSystem: FileSystemPort,
  report: MatchedStatementReport,
): Promise<ReadonlyArray<string>> => {
  if (!report.filePath) {
    return [`  Statement: ${report.token}`];
  }
  const location = report.lineRange ? `${report.filePath}:${report.lineRange.start}-${report.lineRange.end}` : report.filePath;
  return [`  Sid: ${report.label ?? "(none)"}`, `  Source: ${location}`, ...(await excerpt(fileSystem, report))];
};

/** The "Matched statements:" block with source excerpts, or nothing when no statement matched. */
export const renderMatchedStatements = async (
  matched: ReadonlyArray<MatchedStatementReport>,
  fileSystem: FileSystemPort,
): Promise<ReadonlyArray<string>> => {
  if (matched.length === 0) {
    return [];
  }
  const lines = ["Matched statements:"];
  for (const report of matched) {
    lines.push(...(await describeStatement(fileSystem, report)));
  }
  return lines;
};

/**
 * Failure text for one execution. Source lines are read from disk on every call so the
 * excerpt shows the file as it is now.
 */
export const renderDiagnostic = async (
  execution: AtomicExecution,
  decision: string,
  matched: ReadonlyArray<MatchedStatementReport>,
  fileSystem: FileSystemPort,
): Promise<string> => {
  const lines = [`Expected: ${execution.expect ?? "(none)"}`, `Got:      ${decision}`, `Action:   ${execution.action}`];

  const [firstResource] = execution.resources;
  if (execution.resources.length === 1 && firstResource !== undefined) {
    lines.push(`Resource: ${firstResource}`);
  } else {
    lines.push("Resources:", ...execution.resources.map((resource) => `  - ${resource}`));
  }

  if (execution.context.length > 0) {
    lines.push("Context:", ...execution.context.map((entry) => `  ${entry.key} = ${entry.values.join(", ")}`));
  }

  lines.push(...(await renderMatchedStatements(matched, fileSystem)));
  return lines.join("\n");
};

export const evaluateExecution = async (
  execution: AtomicExecution,
  response: SimulationResponse,
  options: EvaluateExecutionOptions,
): Promise<ExecutionOutcome> => {
  const matched = describeMatchedStatements(response.matchedStatements, options.sources);
  const base = { execution, decision: response.decision, matched, raw: response.raw };
  if (execution.expect === undefined) {
    return { ...base, status: "observed" };
  }
  if (decisionsMatch(execution.expect, response.decision)) {
    return { ...base, status: "pass" };
  }
  return {
    ...base,
    status: "fail",
    diagnostic: await renderDiagnostic(execution, response.decision, matched, options.fileSystem),
  };
};
