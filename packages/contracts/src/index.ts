export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/scenario.js";
export * from "./types/provenance.js";
export * from "./types/execution.js";

export * from "./ports/simulator/policy-simulator-port.js";
export * from "./ports/filesystem/file-system-port.js";
