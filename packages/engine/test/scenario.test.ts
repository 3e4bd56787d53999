import { describe, expect, it } from "vitest";

import { loadScenario, mergeScenarioDocuments, parseContextKeyType, scenarioDocumentSchema } from "../src/index.js";
import { createMemoryFileSystem } from "../src/testing/index.js";

const doc = (input: Record<string, unknown>) => scenarioDocumentSchema.parse(input);

describe("mergeScenarioDocuments", () => {
  it("lets non-empty child scalars win and inherits empty ones", () => {
    const merged = mergeScenarioDocuments(
      doc({ caller_arn: "arn:aws:iam::111122223333:user/parent", vars_file: "/p/vars.yml" }),
      doc({ caller_arn: "arn:aws:iam::111122223333:user/child", vars_file: "" }),
    );

    expect(merged.caller_arn).toBe("arn:aws:iam::111122223333:user/child");
    expect(merged.vars_file).toBe("/p/vars.yml");
  });

  it("deep-merges vars and expect, child winning on conflict", () => {
    const merged = mergeScenarioDocuments(
      doc({ vars: { a: 1, nested: { x: 1, y: 2 } }, expect: { "s3:GetObject": "allowed" } }),
      doc({ vars: { b: 2, nested: { y: 3 } }, expect: { "s3:PutObject": "implicitDeny" } }),
    );

    expect(merged.vars).toEqual({ a: 1, b: 2, nested: { x: 1, y: 3 } });
    expect(merged.expect).toEqual({ "s3:GetObject": "allowed", "s3:PutObject": "implicitDeny" });
  });

  it("replaces lists wholesale only when the child list is non-empty", () => {
    const parent = doc({ actions: ["a:X", "a:Y"], scp_paths: ["/scp/*.json"] });

    const replaced = mergeScenarioDocuments(parent, doc({ actions: ["a:Z"] }));
    const inherited = mergeScenarioDocuments(parent, doc({ actions: [] }));

    expect(replaced.actions).toEqual(["a:Z"]);
    expect(replaced.scp_paths).toEqual(["/scp/*.json"]);
    expect(inherited.actions).toEqual(["a:X", "a:Y"]);
  });

  it("clears the inherited member of a policy pair when the child sets the other", () => {
    const merged = mergeScenarioDocuments(
      doc({ policy_json: "/p/policy.json", resource_policy_template: "/p/bucket.tpl" }),
      doc({ policy_template: "/c/policy.tpl" }),
    );

    expect(merged.policy_template).toBe("/c/policy.tpl");
    expect(merged.policy_json).toBeUndefined();
    expect(merged.resource_policy_template).toBe("/p/bucket.tpl");
  });

  it("is associative over a three-level chain", () => {
    const root = doc({
      vars: { a: 1, nested: { x: 1 } },
      policy_json: "/r/policy.json",
      caller_arn: "arn:root",
      actions: ["a:X"],
    });
    const middle = doc({ vars: { nested: { y: 2 } }, policy_template: "/m/policy.tpl", resource_owner: "owner" });
    const leaf = doc({ vars: { a: 3 }, caller_arn: "arn:leaf", policy_json: "/l/policy.json" });

    expect(mergeScenarioDocuments(mergeScenarioDocuments(root, middle), leaf)).toEqual(
      mergeScenarioDocuments(root, mergeScenarioDocuments(middle, leaf)),
    );
  });
});

describe("parseContextKeyType", () => {
  it("accepts the closed set of types case-insensitively", () => {
    expect(parseContextKeyType("STRINGLIST", "context[0].ContextKeyType")).toEqual({ ok: true, value: "stringList" });
    expect(parseContextKeyType("Boolean", "context[0].ContextKeyType")).toEqual({ ok: true, value: "boolean" });
  });

  it("rejects unknown types naming the field", () => {
    const result = parseContextKeyType("date", "tests[1].context[0].ContextKeyType");

    expect(result).toEqual({
      ok: false,
      error: {
        code: "config.invalid",
        message:
          "Unsupported context type 'date': must be one of string, stringList, numeric, numericList, boolean, booleanList",
        details: { field: "tests[1].context[0].ContextKeyType", value: "date" },
      },
    });
  });
});

const BASE_SCENARIO = [
  "vars_file: vars.yml",
  "policy_json: policy.json",
  "context:",
  "  - ContextKeyName: aws:SourceIp",
  "    ContextKeyValues: ['10.0.0.1']",
  "    ContextKeyType: string",
  "tests:",
  "  - name: read",
  "    action: s3:GetObject",
  '    resource: "arn:aws:s3:::${BUCKET}/*"',
  "    expect: allowed",
].join("\n");

const CHILD_SCENARIO = [
  "extends: ../base/base.yml",
  "vars:",
  "  BUCKET: child-bucket",
  'caller_arn: "arn:aws:iam::<ACCOUNT>:user/alice"',
  "vars_file: ''",
].join("\n");

describe("loadScenario", () => {
  it("resolves inheritance with paths relative to the declaring document", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/base/base.yml": BASE_SCENARIO,
      "/work/base/vars.yml": 'BUCKET: base-bucket\nACCOUNT: "111122223333"\n',
      "/work/child/scenario.yml": CHILD_SCENARIO,
    });

    const result = await loadScenario("/work/child/scenario.yml", { fileSystem });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    const scenario = result.value;
    expect(scenario.sourcePath).toBe("/work/child/scenario.yml");
    expect(scenario.inheritanceChain).toEqual(["/work/child/scenario.yml", "/work/base/base.yml"]);
    expect(scenario.varsFile).toBe("/work/base/vars.yml");
    expect(scenario.policy).toEqual({ kind: "document", path: "/work/base/policy.json" });
    expect(scenario.variables).toEqual({ BUCKET: "child-bucket", ACCOUNT: "111122223333" });
    expect(scenario.callerArn).toBe("arn:aws:iam::111122223333:user/alice");
    expect(scenario.context).toEqual([{ key: "aws:SourceIp", values: ["10.0.0.1"], type: "string" }]);
    expect(scenario.tests).toHaveLength(1);
    expect(scenario.tests[0]?.resource).toBe("arn:aws:s3:::child-bucket/*");
    expect(scenario.tests[0]?.expect).toBe("allowed");
  });

  it("fails on an inheritance cycle naming the chain", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/a.yml": "extends: b.yml\npolicy_json: p.json\n",
      "/work/b.yml": "extends: a.yml\n",
    });

    const result = await loadScenario("/work/a.yml", { fileSystem });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("config.cyclic_inheritance");
      expect(result.error.details?.["cycle"]).toEqual(["/work/a.yml", "/work/b.yml", "/work/a.yml"]);
    }
  });

  it("reports a missing scenario file with its path", async () => {
    const result = await loadScenario("/work/none.yml", { fileSystem: createMemoryFileSystem() });

    expect(result).toEqual({
      ok: false,
      error: {
        code: "source.not_found",
        message: "scenario not found: /work/none.yml",
        details: { path: "/work/none.yml", role: "scenario" },
      },
    });
  });

  it("rejects a document that declares both members of a policy pair", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": "policy_json: p.json\npolicy_template: p.tpl\ntests: []\n",
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("config.invalid");
      expect(result.error.message).toBe("Provide only one of 'policy_json' or 'policy_template'");
    }
  });

  it("requires a policy source after resolution", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": "tests:\n  - action: s3:GetObject\n    expect: allowed\n",
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Scenario must include 'policy_json' or 'policy_template'");
    }
  });

  it("requires an expectation on every authored test", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": "policy_json: p.json\ntests:\n  - action: s3:GetObject\n",
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid scenario document: /work/s.yml");
      expect(result.error.details?.["issues"]).toContain("tests.0.expect: Required");
    }
  });

  it("fails on a canonical reference to an undefined variable, naming the field", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": "policy_json: p.json\ntests:\n  - action: s3:GetObject\n    resource: '{{.NOPE}}'\n    expect: allowed\n",
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result).toEqual({
      ok: false,
      error: {
        code: "template.missing_variable",
        message: "Undefined variable(s): NOPE",
        details: { variables: ["NOPE"], source: "tests[0].resource" },
      },
    });
  });

  it("synthesizes one test per action and resource from the top-level form", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": [
        "policy_json: p.json",
        "actions: ['s3:GetObject', 's3:PutObject']",
        "resources: ['arn:aws:s3:::logs/a', 'arn:aws:s3:::logs/b']",
        "expect:",
        "  s3:GetObject: allowed",
      ].join("\n"),
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.tests.map((test) => [test.action, test.resource, test.expect])).toEqual([
        ["s3:GetObject", "arn:aws:s3:::logs/a", "allowed"],
        ["s3:GetObject", "arn:aws:s3:::logs/b", "allowed"],
        ["s3:PutObject", "arn:aws:s3:::logs/a", undefined],
        ["s3:PutObject", "arn:aws:s3:::logs/b", undefined],
      ]);
    }
  });

  it("looks up top-level expectations by the rendered action", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": [
        "policy_json: p.json",
        "vars:",
        "  SVC: s3",
        "actions: ['${SVC}:GetObject', '<SVC>:PutObject']",
        "expect:",
        "  s3:GetObject: allowed",
        "  '{{.SVC}}:PutObject': implicitDeny",
      ].join("\n"),
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.tests.map((test) => [test.action, test.resource, test.expect])).toEqual([
        ["s3:GetObject", undefined, "allowed"],
        ["s3:PutObject", undefined, "implicitDeny"],
      ]);
    }
  });

  it("rejects a top-level expectation that names no listed action", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/s.yml": [
        "policy_json: p.json",
        "actions: ['s3:GetObject']",
        "expect:",
        "  s3:GetObject: allowed",
        "  s3:DeleteObject: explicitDeny",
      ].join("\n"),
    });

    const result = await loadScenario("/work/s.yml", { fileSystem });

    expect(result).toEqual({
      ok: false,
      error: {
        code: "config.invalid",
        message: "'expect' names action(s) not listed in 'actions': s3:DeleteObject",
        details: { path: "/work/s.yml", field: "expect", actions: ["s3:DeleteObject"] },
      },
    });
  });

  it("rebases per-test resource policies and guardrail patterns", async () => {
    const fileSystem = createMemoryFileSystem({
      "/work/suite/s.yml": [
        "policy_template: policies/identity.json.tpl",
        "scp_paths: ['../scp/*.json']",
        "tests:",
        "  - action: s3:GetObject",
        "    resource_policy_json: policies/bucket.json",
        "    expect: allowed",
      ].join("\n"),
    });

    const result = await loadScenario("/work/suite/s.yml", { fileSystem });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.policy).toEqual({ kind: "template", path: "/work/suite/policies/identity.json.tpl" });
      expect(result.value.guardrailPatterns).toEqual(["/work/scp/*.json"]);
      expect(result.value.tests[0]?.resourcePolicy).toEqual({
        kind: "document",
        path: "/work/suite/policies/bucket.json",
      });
    }
  });
});
