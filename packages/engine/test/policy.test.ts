import { describe, expect, it } from "vitest";

import {
  enforceIamFields,
  findNonIamFields,
  findStatementAtLine,
  findStatementSpans,
  mergeFragmentFiles,
  mergeFragments,
  sliceLines,
  stripNonIamFields,
  trackPolicy,
} from "../src/index.js";
import { createMemoryFileSystem } from "../src/testing/index.js";

const TWO_STATEMENTS = [
  "{",
  '  "Version": "2012-10-17",',
  '  "Statement": [',
  "    {",
  '      "Sid": "DenyS3",',
  '      "Effect": "Deny",',
  '      "Action": "s3:*",',
  '      "Resource": "*"',
  "    },",
  "    {",
  '      "Effect": "Allow",',
  '      "Action": "ec2:Describe*",',
  '      "Resource": "*"',
  "    }",
  "  ]",
  "}",
].join("\n");

const TEMPLATE_WITH_BRACES = [
  "{",
  '  "Statement": [',
  '    { "Effect": "Allow", "Action": "s3:GetObject", "Resource": {{.arns}} },',
  "    {",
  '      "Sid": "Braces",',
  '      "Effect": "Deny",',
  '      "Action": "s3:*",',
  '      "Resource": "arn:aws:s3:::weird}{bucket/*"',
  "    }",
  "  ]",
  "}",
].join("\n");

describe("findStatementSpans", () => {
  it("finds the line range of each statement in a Statement list", () => {
    const spans = findStatementSpans(TWO_STATEMENTS);

    expect(spans.map((span) => [span.ordinal, span.lineRange])).toEqual([
      [0, { start: 4, end: 9 }],
      [1, { start: 10, end: 14 }],
    ]);
  });

  it("steps over template actions and braces inside strings", () => {
    const spans = findStatementSpans(TEMPLATE_WITH_BRACES);

    expect(spans.map((span) => span.lineRange)).toEqual([
      { start: 3, end: 3 },
      { start: 4, end: 9 },
    ]);
  });

  it("treats a single Statement object and a bare statement as ordinal 0", () => {
    expect(findStatementSpans('{"Statement": {"Effect": "Deny"}}').map((span) => span.lineRange)).toEqual([
      { start: 1, end: 1 },
    ]);
    expect(findStatementSpans('{\n  "Effect": "Deny",\n  "Action": "*"\n}').map((span) => span.lineRange)).toEqual([
      { start: 1, end: 4 },
    ]);
  });

  it("keeps ordinals aligned when a list element is not an object", () => {
    const spans = findStatementSpans('{"Statement": ["oops", {"Effect": "Allow"}]}');

    expect(spans.map((span) => span.ordinal)).toEqual([1]);
  });

  it("locates the statement covering a line", () => {
    const spans = findStatementSpans(TWO_STATEMENTS);

    expect(findStatementAtLine(spans, 6)?.ordinal).toBe(0);
    expect(findStatementAtLine(spans, 12)?.ordinal).toBe(1);
    expect(findStatementAtLine(spans, 2)).toBeUndefined();
  });

  it("slices 1-based inclusive line ranges", () => {
    expect(sliceLines(TWO_STATEMENTS, { start: 4, end: 5 })).toEqual(["    {", '      "Sid": "DenyS3",']);
  });
});

describe("trackPolicy", () => {
  it("stamps each statement with a token and keeps the original Sid in its source record", () => {
    const tracked = trackPolicy({
      sourceText: TWO_STATEMENTS,
      sourcePath: "/work/policy.json",
      tokenLabel: "policy.json",
    });

    expect(tracked.statements).toEqual([
      { Sid: "policy.json#stmt:0", Effect: "Deny", Action: "s3:*", Resource: "*" },
      { Sid: "policy.json#stmt:1", Effect: "Allow", Action: "ec2:Describe*", Resource: "*" },
    ]);
    expect(tracked.document).toEqual({ Version: "2012-10-17", Statement: tracked.statements });
    expect(tracked.sources.get("policy.json#stmt:0")).toEqual({
      filePath: "/work/policy.json",
      ordinal: 0,
      lineRange: { start: 4, end: 9 },
      label: "DenyS3",
    });
    expect(tracked.sources.get("policy.json#stmt:1")?.label).toBeUndefined();
  });

  it("writes the token as the first key of the statement", () => {
    const tracked = trackPolicy({ sourceText: TWO_STATEMENTS, sourcePath: "/work/p.json", tokenLabel: "p.json" });
    const [first] = tracked.statements;

    expect(Object.keys(first ?? {})[0]).toBe("Sid");
  });

  it("records line ranges whose text contains the original label", () => {
    const tracked = trackPolicy({ sourceText: TWO_STATEMENTS, sourcePath: "/work/p.json", tokenLabel: "p.json" });

    for (const source of tracked.sources.values()) {
      if (source.label && source.lineRange) {
        expect(sliceLines(TWO_STATEMENTS, source.lineRange).join("\n")).toContain(source.label);
      }
    }
    expect(new Set(tracked.sources.keys()).size).toBe(2);
  });

  it("takes statements from the rendered document and lines from the template", () => {
    const rendered = {
      Statement: [
        { Effect: "Allow", Action: "s3:GetObject", Resource: ["arn:aws:s3:::a", "arn:aws:s3:::b"] },
        { Sid: "Braces", Effect: "Deny", Action: "s3:*", Resource: "arn:aws:s3:::weird}{bucket/*" },
      ],
    };

    const tracked = trackPolicy({
      sourceText: TEMPLATE_WITH_BRACES,
      document: rendered,
      sourcePath: "/work/policy.json.tpl",
      tokenLabel: "policy.json.tpl",
    });

    expect(tracked.sources.get("policy.json.tpl#stmt:1")).toEqual({
      filePath: "/work/policy.json.tpl",
      ordinal: 1,
      lineRange: { start: 4, end: 9 },
      label: "Braces",
    });
  });

  it("leaves a document without statements untouched", () => {
    const tracked = trackPolicy({ sourceText: '{"Version": "2012-10-17"}', sourcePath: "/work/p.json", tokenLabel: "p" });

    expect(tracked.document).toEqual({ Version: "2012-10-17" });
    expect(tracked.sources.size).toBe(0);
  });

  it("rejects text that is not JSON", () => {
    expect(() => trackPolicy({ sourceText: "{", sourcePath: "/work/bad.json", tokenLabel: "bad.json" })).toThrowError(
      "Policy is not valid JSON: /work/bad.json",
    );
  });
});

describe("mergeFragments", () => {
  const allow = '{"Statement":[{"Effect":"Allow","Action":"s3:*","Resource":"*"}]}';
  const deny = '{"Statement":[{"Effect":"Deny","Action":"s3:Delete*","Resource":"*"}]}';

  it("concatenates fragment statements in order inside the fixed envelope", () => {
    const merged = mergeFragments([
      { path: "/work/scp/allow.json", sourceText: allow, tokenLabel: "scp/allow.json" },
      { path: "/work/scp/deny.json", sourceText: deny, tokenLabel: "scp/deny.json" },
    ]);

    expect(merged.document).toEqual({
      Version: "2012-10-17",
      Statement: [
        { Sid: "scp/allow.json#stmt:0", Effect: "Allow", Action: "s3:*", Resource: "*" },
        { Sid: "scp/deny.json#stmt:0", Effect: "Deny", Action: "s3:Delete*", Resource: "*" },
      ],
    });
    expect([...merged.sources.keys()]).toEqual(["scp/allow.json#stmt:0", "scp/deny.json#stmt:0"]);
  });

  it("counts a single statement object and a bare statement as one each", () => {
    const merged = mergeFragments([
      { path: "/a.json", sourceText: TWO_STATEMENTS, tokenLabel: "a.json" },
      { path: "/b.json", sourceText: '{"Statement": {"Effect": "Deny", "Action": "iam:*"}}', tokenLabel: "b.json" },
      { path: "/c.json", sourceText: '{"Effect": "Deny", "Action": "kms:*"}', tokenLabel: "c.json" },
    ]);

    expect(merged.document.Statement).toHaveLength(4);
    expect(merged.sources.get("c.json#stmt:0")?.lineRange).toEqual({ start: 1, end: 1 });
  });

  it("carries any other top-level value over verbatim", () => {
    const merged = mergeFragments([{ path: "/odd.json", sourceText: '["x"]', tokenLabel: "odd.json" }]);

    expect(merged.document.Statement).toEqual([["x"]]);
    expect(merged.sources.size).toBe(0);
  });
});

describe("mergeFragmentFiles", () => {
  it("deduplicates and sorts paths, labelling tokens relative to the base directory", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/scp/a.json": '{"Statement":[{"Sid":"First","Effect":"Deny","Action":"s3:*","Resource":"*"}]}',
      "/work/scp/b.json": '{"Statement":[{"Effect":"Deny","Action":"iam:*","Resource":"*"}]}',
    });

    const merged = await mergeFragmentFiles(
      fileSystem,
      ["/work/scp/b.json", "/work/scp/a.json", "/work/scp/b.json"],
      "/work",
    );

    expect([...merged.sources.keys()]).toEqual(["scp/a.json#stmt:0", "scp/b.json#stmt:0"]);
    expect(merged.sources.get("scp/a.json#stmt:0")).toEqual({
      filePath: "/work/scp/a.json",
      ordinal: 0,
      lineRange: { start: 1, end: 1 },
      label: "First",
    });
  });

  it("drops non-IAM statement fields from each fragment", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/scp/a.json": '{"Statement":{"Effect":"Deny","Action":"s3:*","Resource":"*","Comment":"legacy"}}',
    });

    const merged = await mergeFragmentFiles(fileSystem, ["/work/scp/a.json"], "/work");

    expect(merged.document.Statement).toEqual([
      { Sid: "scp/a.json#stmt:0", Effect: "Deny", Action: "s3:*", Resource: "*" },
    ]);
  });

  it("names the fragment file and its own statement position in strict mode", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/scp/a.json": '{"Statement":[{"Effect":"Deny","Action":"s3:*","Resource":"*"}]}',
      "/work/scp/b.json":
        '{"Statement":[{"Effect":"Deny","Action":"iam:*","Resource":"*"},{"Effect":"Deny","Action":"kms:*","Resource":"*","Comment":"x"}]}',
    });

    await expect(
      mergeFragmentFiles(fileSystem, ["/work/scp/a.json", "/work/scp/b.json"], "/work", { strict: true }),
    ).rejects.toThrowError("Policy contains non-IAM fields: /work/scp/b.json\n  Statement[1]: Comment");
  });

  it("fails on a missing fragment with its path", async () => {
    await expect(mergeFragmentFiles(createMemoryFileSystem(), ["/work/scp/missing.json"], "/work")).rejects.toThrowError(
      "guardrail fragment not found: /work/scp/missing.json",
    );
  });
});

describe("non-IAM fields", () => {
  const annotated = {
    Version: "2012-10-17",
    Id: "bucket-guard",
    Description: "team notes",
    Statement: [{ Sid: "Read", Effect: "Allow", Action: "s3:GetObject", Resource: "*", Comment: "why" }, "raw"],
  };

  it("strips fields outside the IAM grammar", () => {
    expect(stripNonIamFields(annotated)).toEqual({
      Version: "2012-10-17",
      Id: "bucket-guard",
      Statement: [{ Sid: "Read", Effect: "Allow", Action: "s3:GetObject", Resource: "*" }, "raw"],
    });
    expect(stripNonIamFields({ Statement: { Effect: "Deny", Note: "x" } })).toEqual({ Statement: { Effect: "Deny" } });
  });

  it("lists each violation", () => {
    expect(findNonIamFields(annotated)).toEqual(["Top-level: Description", "Statement[0]: Comment"]);
  });

  it("rejects violations in strict mode and strips them otherwise", () => {
    expect(enforceIamFields(annotated, "policy.json", { strict: true })).toEqual({
      ok: false,
      error: {
        code: "policy.non_iam_fields",
        message: "Policy contains non-IAM fields: policy.json\n  Top-level: Description\n  Statement[0]: Comment",
        details: { source: "policy.json", violations: ["Top-level: Description", "Statement[0]: Comment"] },
      },
    });
    expect(enforceIamFields(annotated, "policy.json")).toEqual({ ok: true, value: stripNonIamFields(annotated) });
  });
});
