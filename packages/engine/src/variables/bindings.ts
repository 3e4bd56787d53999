import { parse as parseYaml } from "yaml";

import { ErrorCodes, type FileSystemPort, type VariableBindings } from "@iamspec/contracts";

import { createError, fail, sourceNotFound } from "../errors.js";
import { isRecord } from "../utils.js";

const readVariablesFile = async (fileSystem: FileSystemPort, path: string): Promise<Record<string, unknown>> => {
  if (!(await fileSystem.exists(path))) {
    return fail(sourceNotFound(path, "variables file"));
  }
  const contents = await fileSystem.readText(path);
  let data: unknown;
  try {
    data = parseYaml(contents);
  } catch (error) {
    return fail(
      createError(ErrorCodes.CONFIGURATION, `Variables file is not valid YAML: ${path}`, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    return fail(
      createError(ErrorCodes.CONFIGURATION, `Variables file must contain a mapping: ${path}`, { path }),
    );
  }
  return data;
};

/** `vars_file` contents first, inline `vars` on top. */
export const buildVariableBindings = async (
  fileSystem: FileSystemPort,
  varsFile: string | undefined,
  inline: Readonly<Record<string, unknown>>,
): Promise<VariableBindings> => {
  const fromFile = varsFile ? await readVariablesFile(fileSystem, varsFile) : {};
  return { ...fromFile, ...inline };
};
