import { describe, expect, it } from "vitest";

import type { Scenario, TestCase } from "@iamspec/contracts";

import { expandTestCase, expandTestCases } from "../src/index.js";

const scenarioWith = (tests: ReadonlyArray<TestCase>, overrides: Partial<Scenario> = {}): Scenario => ({
  sourcePath: "/work/scenario.yml",
  inheritanceChain: ["/work/scenario.yml"],
  variables: {},
  policy: { kind: "document", path: "/work/policy.json" },
  guardrailPatterns: [],
  context: [],
  tests,
  ...overrides,
});

describe("expandTestCase", () => {
  it("creates one execution per action, each with the full resource list", () => {
    const test: TestCase = { actions: ["a:X", "a:Y"], resource: "r1", context: [], expect: "allowed" };

    const result = expandTestCase(scenarioWith([test]), test, 0);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((execution) => [execution.action, execution.resources, execution.displayName])).toEqual([
        ["a:X", ["r1"], "a:X on r1"],
        ["a:Y", ["r1"], "a:Y on r1"],
      ]);
    }
  });

  it("rejects both action forms together", () => {
    const test: TestCase = { action: "a:X", actions: ["a:Y"], context: [], expect: "allowed" };

    const result = expandTestCase(scenarioWith([test]), test, 0);

    expect(result).toEqual({
      ok: false,
      error: {
        code: "config.invalid",
        message: "test 1: provide only one of 'action' or 'actions'",
        details: { test: 0, fields: ["action", "actions"] },
      },
    });
  });

  it("rejects both resource forms together and a test without any action", () => {
    const both: TestCase = { action: "a:X", resource: "r1", resources: ["r2"], context: [], expect: "allowed" };
    const none: TestCase = { name: "empty", context: [], expect: "allowed" };

    const bothResult = expandTestCase(scenarioWith([both]), both, 2);
    const noneResult = expandTestCase(scenarioWith([none]), none, 0);

    expect(bothResult.ok ? undefined : bothResult.error.message).toBe(
      "test 3: provide only one of 'resource' or 'resources'",
    );
    expect(noneResult.ok ? undefined : noneResult.error.message).toBe(
      "test 1 ('empty'): must specify either 'action' or 'actions'",
    );
  });

  it("defaults to the wildcard resource", () => {
    const test: TestCase = { action: "iam:ListUsers", context: [], expect: "allowed" };

    const result = expandTestCase(scenarioWith([test]), test, 0);

    expect(result.ok && result.value[0]?.resources).toEqual(["*"]);
    expect(result.ok && result.value[0]?.displayName).toBe("iam:ListUsers on *");
  });

  it("unions scenario and test context, scenario first", () => {
    const test: TestCase = {
      name: "with context",
      action: "s3:GetObject",
      context: [{ key: "aws:MultiFactorAuthPresent", values: ["true"], type: "boolean" }],
      expect: "allowed",
    };
    const scenario = scenarioWith([test], {
      context: [{ key: "aws:SourceIp", values: ["10.0.1.50"], type: "string" }],
    });

    const result = expandTestCase(scenario, test, 0);

    expect(result.ok && result.value[0]?.context.map((entry) => entry.key)).toEqual([
      "aws:SourceIp",
      "aws:MultiFactorAuthPresent",
    ]);
    expect(result.ok && result.value[0]?.displayName).toBe("with context");
  });

  it("resolves each override independently of the others", () => {
    const test: TestCase = {
      action: "s3:GetObject",
      context: [],
      callerArn: "arn:aws:iam::111122223333:user/test",
      resourceHandlingOption: "EC2-VPC-InstanceStore",
      expect: "allowed",
    };
    const scenario = scenarioWith([test], {
      callerArn: "arn:aws:iam::111122223333:user/scenario",
      resourceOwner: "arn:aws:iam::444455556666:root",
      resourcePolicy: { kind: "document", path: "/work/bucket.json" },
    });

    const result = expandTestCase(scenario, test, 0);

    expect(result.ok).toBe(true);
    if (result.ok) {
      const [execution] = result.value;
      expect(execution?.callerArn).toBe("arn:aws:iam::111122223333:user/test");
      expect(execution?.resourceOwner).toBe("arn:aws:iam::444455556666:root");
      expect(execution?.resourceHandlingOption).toBe("EC2-VPC-InstanceStore");
      expect(execution?.resourcePolicy).toEqual({ kind: "document", path: "/work/bucket.json" });
    }
  });
});

describe("expandTestCases", () => {
  it("keeps declaration order and test indexes", () => {
    const tests: ReadonlyArray<TestCase> = [
      { action: "a:X", context: [], expect: "allowed" },
      { actions: ["b:X", "b:Y"], context: [], expect: "implicitDeny" },
    ];

    const result = expandTestCases(scenarioWith(tests));

    expect(result.ok && result.value.map((execution) => [execution.testIndex, execution.action])).toEqual([
      [0, "a:X"],
      [1, "b:X"],
      [1, "b:Y"],
    ]);
  });
});
