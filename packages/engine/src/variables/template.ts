import { ErrorCodes, err, ok, type IamSpecError, type Result, type VariableBindings } from "@iamspec/contracts";

import { createError } from "../errors.js";
import { isRecord } from "../utils.js";
import { normalizeVariableNotation } from "./notation.js";

const REFERENCE_PATTERN = /\{\{\s*\.([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\s*\}\}/g;

export interface RenderOptions {
  /** Names the template in error details, usually a file path. */
  readonly source?: string;
}

type Lookup = { readonly found: true; readonly value: unknown } | { readonly found: false };

const lookup = (bindings: VariableBindings, path: string): Lookup => {
  let current: unknown = bindings;
  for (const segment of path.split(".")) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }
  return current === undefined ? { found: false } : { found: true, value: current };
};

const stringify = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
};

/**
 * Substitutes every `{{.name}}` / `{{.name.nested}}` reference. Every reference must
 * resolve: a missing variable fails the whole render and lists all missing names.
 */
export const renderCanonical = (
  text: string,
  bindings: VariableBindings,
  options: RenderOptions = {},
): Result<string, IamSpecError> => {
  const missing = new Set<string>();
  const rendered = text.replace(REFERENCE_PATTERN, (match: string, path: string) => {
    const resolved = lookup(bindings, path);
    if (!resolved.found) {
      missing.add(path);
      return match;
    }
    return stringify(resolved.value);
  });

  if (missing.size > 0) {
    const variables = [...missing];
    return err(
      createError(ErrorCodes.MISSING_VARIABLE, `Undefined variable(s): ${variables.join(", ")}`, {
        variables,
        source: options.source,
      }),
    );
  }
  return ok(rendered);
};

/** Normalizes all four notations against the binding names, then renders. */
export const renderTemplate = (
  text: string,
  bindings: VariableBindings,
  options: RenderOptions = {},
): Result<string, IamSpecError> =>
  renderCanonical(normalizeVariableNotation(text, Object.keys(bindings)), bindings, options);

export const minifyJson = (text: string, options: RenderOptions = {}): Result<string, IamSpecError> => {
  try {
    return ok(JSON.stringify(JSON.parse(text)));
  } catch (error) {
    return err(
      createError(ErrorCodes.MALFORMED_OUTPUT, "Rendered template is not valid JSON", {
        source: options.source,
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }
};

/** Renders a JSON-bearing template and returns its minified form. */
export const renderJsonTemplate = (
  text: string,
  bindings: VariableBindings,
  options: RenderOptions = {},
): Result<string, IamSpecError> => {
  const rendered = renderTemplate(text, bindings, options);
  if (!rendered.ok) {
    return rendered;
  }
  return minifyJson(rendered.value, options);
};

export const renderStrings = (
  values: ReadonlyArray<string>,
  bindings: VariableBindings,
  options: RenderOptions = {},
): Result<ReadonlyArray<string>, IamSpecError> => {
  const output: string[] = [];
  for (const value of values) {
    const rendered = renderTemplate(value, bindings, options);
    if (!rendered.ok) {
      return rendered;
    }
    output.push(rendered.value);
  }
  return ok(output);
};
