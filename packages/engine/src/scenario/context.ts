import {
  CONTEXT_KEY_TYPES,
  err,
  ok,
  type ContextEntry,
  type ContextKeyType,
  type IamSpecError,
  type Result,
  type VariableBindings,
} from "@iamspec/contracts";

import { configurationError } from "../errors.js";
import { renderStrings, renderTemplate } from "../variables/template.js";
import type { ContextEntryDocument } from "./schema.js";

const CONTEXT_TYPES_BY_LOWERCASE: ReadonlyMap<string, ContextKeyType> = new Map(
  CONTEXT_KEY_TYPES.map((type) => [type.toLowerCase(), type]),
);

export const parseContextKeyType = (value: string, field: string): Result<ContextKeyType, IamSpecError> => {
  const type = CONTEXT_TYPES_BY_LOWERCASE.get(value.trim().toLowerCase());
  if (!type) {
    return err(
      configurationError(`Unsupported context type '${value}': must be one of ${CONTEXT_KEY_TYPES.join(", ")}`, {
        field,
        value,
      }),
    );
  }
  return ok(type);
};

export const renderContextEntries = (
  entries: ReadonlyArray<ContextEntryDocument> | undefined,
  bindings: VariableBindings,
  field: string,
): Result<ReadonlyArray<ContextEntry>, IamSpecError> => {
  const output: ContextEntry[] = [];
  for (const [index, entry] of (entries ?? []).entries()) {
    const entryField = `${field}[${index}]`;
    const type = parseContextKeyType(entry.ContextKeyType, `${entryField}.ContextKeyType`);
    if (!type.ok) {
      return type;
    }
    const key = renderTemplate(entry.ContextKeyName, bindings, { source: `${entryField}.ContextKeyName` });
    if (!key.ok) {
      return key;
    }
    const values = renderStrings(entry.ContextKeyValues ?? [], bindings, { source: `${entryField}.ContextKeyValues` });
    if (!values.ok) {
      return values;
    }
    output.push({ key: key.value, values: values.value, type: type.value });
  }
  return ok(output);
};
