import type { FileSystemPort, PolicyRef, VariableBindings } from "@iamspec/contracts";

import { fail, sourceNotFound, unwrap } from "../errors.js";
import { renderJsonTemplate } from "../variables/template.js";
import { parsePolicyText } from "./provenance.js";

export interface LoadedPolicy {
  readonly ref: PolicyRef;
  /** The file as authored. */
  readonly sourceText: string;
  /** Parsed document, after rendering for templates. */
  readonly document: unknown;
}

export const policyRefKey = (ref: PolicyRef): string => `${ref.kind}:${ref.path}`;

export const loadPolicy = async (
  fileSystem: FileSystemPort,
  ref: PolicyRef,
  bindings: VariableBindings,
  role: string,
): Promise<LoadedPolicy> => {
  if (!(await fileSystem.exists(ref.path))) {
    return fail(sourceNotFound(ref.path, role));
  }
  const sourceText = await fileSystem.readText(ref.path);
  const text =
    ref.kind === "template" ? unwrap(renderJsonTemplate(sourceText, bindings, { source: ref.path })) : sourceText;
  return { ref, sourceText, document: parsePolicyText(text, ref.path) };
};
