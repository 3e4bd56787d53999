const IDENTIFIER = "[A-Za-z_][A-Za-z0-9_]*";

const ANGLE_PATTERN = new RegExp(`<(${IDENTIFIER})>`, "g");
const DOLLAR_BRACE_PATTERN = new RegExp(`\\$\\{(${IDENTIFIER})\\}`, "g");
// Greedy identifier plus lookahead: `$BUCKET_NAME` is one name, never `$BUCKET` + `_NAME`.
const BARE_DOLLAR_PATTERN = new RegExp(`\\$(${IDENTIFIER})(?![A-Za-z0-9_])`, "g");

export const canonicalReference = (name: string): string => `{{.${name}}}`;

const rewriteKnown =
  (known: ReadonlySet<string>) =>
  (match: string, name: string): string =>
    known.has(name) ? canonicalReference(name) : match;

/**
 * Rewrites `${NAME}`, `$NAME` and `<NAME>` into `{{.NAME}}` for every name in `known`.
 * Canonical references and references to unknown names pass through untouched.
 */
export const normalizeVariableNotation = (text: string, known: Iterable<string>): string => {
  const names = new Set(known);
  if (names.size === 0) {
    return text;
  }
  const replace = rewriteKnown(names);
  return text
    .replace(ANGLE_PATTERN, replace)
    .replace(DOLLAR_BRACE_PATTERN, replace)
    .replace(BARE_DOLLAR_PATTERN, replace);
};
