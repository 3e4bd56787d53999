import type { ExecutionOutcome, FileSystemPort, RunSummary } from "@iamspec/contracts";
import { renderMatchedStatements, type ExecutionProgress } from "@iamspec/engine";

export type TextWriter = (text: string) => void;

export interface ConsoleReporterOptions {
  readonly write: TextWriter;
  readonly fileSystem: FileSystemPort;
  /** Also list matched statements for passing and observed tests. */
  readonly showMatchedSuccess?: boolean;
}

export interface RunReporter {
  start(total: number): void;
  outcome(outcome: ExecutionOutcome, progress: ExecutionProgress): Promise<void>;
  summary(summary: RunSummary): void;
}

const RULE = "=".repeat(40);

const indent = (text: string, prefix: string): ReadonlyArray<string> =>
  text.split("\n").map((line) => `${prefix}${line}`);

const headline = (outcome: ExecutionOutcome): string => {
  switch (outcome.status) {
    case "pass":
      return `  ✓ PASS: ${outcome.decision}`;
    case "observed":
      return `  → Result: ${outcome.decision}`;
    case "fail":
      return `  ✗ FAIL: expected ${outcome.execution.expect ?? "(none)"}, got ${outcome.decision}`;
  }
};

export const formatSummary = (summary: RunSummary): string => {
  const observed = summary.observed > 0 ? `, ${summary.observed} observed` : "";
  return `Test Results: ${summary.passed} passed, ${summary.failed} failed${observed}`;
};

export const createConsoleReporter = (options: ConsoleReporterOptions): RunReporter => {
  const writeLines = (lines: ReadonlyArray<string>) => {
    options.write(`${lines.join("\n")}\n`);
  };

  return {
    start(total) {
      writeLines([`Running ${total} test(s)...`, ""]);
    },

    async outcome(outcome, progress) {
      const lines = [`[${progress.index + 1}/${progress.total}] ${outcome.execution.displayName}`, headline(outcome)];
      if (outcome.diagnostic) {
        lines.push(...indent(outcome.diagnostic, "    "));
      } else if (options.showMatchedSuccess) {
        const matched = await renderMatchedStatements(outcome.matched, options.fileSystem);
        lines.push(...matched.map((line) => `    ${line}`));
      }
      lines.push("");
      writeLines(lines);
    },

    summary(summary) {
      writeLines([RULE, formatSummary(summary), RULE]);
    },
  };
};
