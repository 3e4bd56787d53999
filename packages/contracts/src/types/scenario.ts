export type VariableBindings = Readonly<Record<string, unknown>>;

/**
 * Where a policy comes from. A template is rendered against the scenario variables,
 * a document is read as-is.
 */
export type PolicyRef =
  | { readonly kind: "template"; readonly path: string }
  | { readonly kind: "document"; readonly path: string };

export type PolicyRefKind = PolicyRef["kind"];

export const CONTEXT_KEY_TYPES = [
  "string",
  "stringList",
  "numeric",
  "numericList",
  "boolean",
  "booleanList",
] as const;

export type ContextKeyType = (typeof CONTEXT_KEY_TYPES)[number];

export interface ContextEntry {
  readonly key: string;
  readonly values: ReadonlyArray<string>;
  readonly type: ContextKeyType;
}

export interface TestCase {
  readonly name?: string;
  readonly action?: string;
  readonly actions?: ReadonlyArray<string>;
  readonly resource?: string;
  readonly resources?: ReadonlyArray<string>;
  readonly context: ReadonlyArray<ContextEntry>;
  readonly resourcePolicy?: PolicyRef;
  readonly callerArn?: string;
  readonly resourceOwner?: string;
  readonly resourceHandlingOption?: string;
  /** Undefined only for tests synthesized from the legacy top-level form. */
  readonly expect?: string;
}

export interface Scenario {
  /** Absolute path of the scenario the run was started from. */
  readonly sourcePath: string;
  /** Absolute paths from the loaded scenario up to its root ancestor. */
  readonly inheritanceChain: ReadonlyArray<string>;
  readonly varsFile?: string;
  readonly variables: VariableBindings;
  readonly policy: PolicyRef;
  readonly resourcePolicy?: PolicyRef;
  readonly guardrailPatterns: ReadonlyArray<string>;
  readonly context: ReadonlyArray<ContextEntry>;
  readonly callerArn?: string;
  readonly resourceOwner?: string;
  readonly resourceHandlingOption?: string;
  readonly tests: ReadonlyArray<TestCase>;
}
