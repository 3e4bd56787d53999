import type { LineRange } from "@iamspec/contracts";

export interface StatementSpan {
  readonly ordinal: number;
  /** Offset of the statement's opening brace. */
  readonly startOffset: number;
  /** Offset just past the statement's closing brace. */
  readonly endOffset: number;
  readonly lineRange: LineRange;
}

const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);
const SCALAR_TERMINATORS = new Set([",", "]", "}", ":", " ", "\t", "\n", "\r"]);

/**
 * A forgiving cursor over policy source text. Besides plain JSON it steps over
 * `{{ ... }}` template actions wherever a value may appear, so unrendered templates
 * can be scanned too.
 */
class SourceCursor {
  private offset = 0;

  constructor(private readonly text: string) {}

  get position(): number {
    return this.offset;
  }

  peek(ahead = 0): string | undefined {
    return this.text[this.offset + ahead];
  }

  advance(): void {
    this.offset += 1;
  }

  atTemplateAction(): boolean {
    return this.peek() === "{" && this.peek(1) === "{";
  }

  skipWhitespace(): void {
    while (this.offset < this.text.length && WHITESPACE.has(this.text.charAt(this.offset))) {
      this.offset += 1;
    }
  }

  /** Reads a string literal and returns its raw body; undefined when unterminated. */
  readString(): string | undefined {
    const start = this.offset + 1;
    this.offset += 1;
    while (this.offset < this.text.length) {
      const char = this.text.charAt(this.offset);
      if (char === "\\") {
        this.offset += 2;
        continue;
      }
      if (char === '"') {
        const body = this.text.slice(start, this.offset);
        this.offset += 1;
        return body;
      }
      this.offset += 1;
    }
    return undefined;
  }

  skipTemplateAction(): boolean {
    const close = this.text.indexOf("}}", this.offset + 2);
    if (close === -1) {
      return false;
    }
    this.offset = close + 2;
    return true;
  }

  /** Skips one value of any kind. Returns false when the text ends first. */
  skipValue(): boolean {
    const char = this.peek();
    if (char === undefined) {
      return false;
    }
    if (this.atTemplateAction()) {
      return this.skipTemplateAction();
    }
    if (char === '"') {
      return this.readString() !== undefined;
    }
    if (char === "{" || char === "[") {
      return this.skipBalanced();
    }
    while (this.offset < this.text.length && !SCALAR_TERMINATORS.has(this.text.charAt(this.offset))) {
      if (this.atTemplateAction()) {
        if (!this.skipTemplateAction()) {
          return false;
        }
        continue;
      }
      this.offset += 1;
    }
    return true;
  }

  private skipBalanced(): boolean {
    let depth = 0;
    while (this.offset < this.text.length) {
      if (this.atTemplateAction()) {
        if (!this.skipTemplateAction()) {
          return false;
        }
        continue;
      }
      const char = this.text.charAt(this.offset);
      if (char === '"') {
        if (this.readString() === undefined) {
          return false;
        }
        continue;
      }
      if (char === "{" || char === "[") {
        depth += 1;
      } else if (char === "}" || char === "]") {
        depth -= 1;
        if (depth === 0) {
          this.offset += 1;
          return true;
        }
      }
      this.offset += 1;
    }
    return false;
  }
}

const lineStarts = (text: string): ReadonlyArray<number> => {
  const starts = [0];
  for (let index = 0; index < text.length; index += 1) {
    if (text.charAt(index) === "\n") {
      starts.push(index + 1);
    }
  }
  return starts;
};

const lineAt = (starts: ReadonlyArray<number>, offset: number): number => {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const middle = Math.ceil((low + high) / 2);
    if ((starts[middle] ?? 0) <= offset) {
      low = middle;
    } else {
      high = middle - 1;
    }
  }
  return low + 1;
};

interface RawSpan {
  readonly ordinal: number;
  readonly startOffset: number;
  readonly endOffset: number;
}

const isObjectStart = (cursor: SourceCursor): boolean => cursor.peek() === "{" && !cursor.atTemplateAction();

const scanStatementValue = (cursor: SourceCursor): ReadonlyArray<RawSpan> => {
  if (isObjectStart(cursor)) {
    const startOffset = cursor.position;
    return cursor.skipValue() ? [{ ordinal: 0, startOffset, endOffset: cursor.position }] : [];
  }
  if (cursor.peek() !== "[") {
    return [];
  }

  const spans: RawSpan[] = [];
  cursor.advance();
  for (let ordinal = 0; ; ordinal += 1) {
    cursor.skipWhitespace();
    if (cursor.peek() === undefined || cursor.peek() === "]") {
      return spans;
    }
    const startOffset = cursor.position;
    const objectElement = isObjectStart(cursor);
    if (!cursor.skipValue()) {
      return spans;
    }
    if (objectElement) {
      spans.push({ ordinal, startOffset, endOffset: cursor.position });
    }
    cursor.skipWhitespace();
    if (cursor.peek() === ",") {
      cursor.advance();
    }
  }
};

const scanDocument = (text: string): ReadonlyArray<RawSpan> => {
  const cursor = new SourceCursor(text);
  cursor.skipWhitespace();
  if (!isObjectStart(cursor)) {
    return [];
  }
  const documentStart = cursor.position;
  cursor.advance();

  for (;;) {
    cursor.skipWhitespace();
    const char = cursor.peek();
    if (char === "}") {
      // No Statement key: the document itself is the one statement.
      return [{ ordinal: 0, startOffset: documentStart, endOffset: cursor.position + 1 }];
    }
    if (char !== '"') {
      return [];
    }
    const key = cursor.readString();
    cursor.skipWhitespace();
    if (key === undefined || cursor.peek() !== ":") {
      return [];
    }
    cursor.advance();
    cursor.skipWhitespace();
    if (key === "Statement") {
      return scanStatementValue(cursor);
    }
    if (!cursor.skipValue()) {
      return [];
    }
    cursor.skipWhitespace();
    if (cursor.peek() === ",") {
      cursor.advance();
    }
  }
};

/**
 * Locates the textual span of every object statement in a policy's source text.
 * Elements that are not objects keep their ordinal but get no span.
 */
export const findStatementSpans = (text: string): ReadonlyArray<StatementSpan> => {
  const starts = lineStarts(text);
  return scanDocument(text).map((span) => ({
    ...span,
    lineRange: {
      start: lineAt(starts, span.startOffset),
      end: lineAt(starts, Math.max(span.startOffset, span.endOffset - 1)),
    },
  }));
};

/** The statement whose span covers the given 1-based line, if any. */
export const findStatementAtLine = (
  spans: ReadonlyArray<StatementSpan>,
  line: number,
): StatementSpan | undefined => spans.find((span) => span.lineRange.start <= line && line <= span.lineRange.end);

/** Lines `start..end` (1-based, inclusive) of `text`. */
export const sliceLines = (text: string, range: LineRange): ReadonlyArray<string> =>
  text.split(/\r?\n/).slice(range.start - 1, range.end);
