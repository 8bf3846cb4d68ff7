/**
 * Syntax errors raised while reading markup literals.
 *
 * Lexing, markup parsing and host-expression parsing all report through the
 * same class, so callers see one syntax-error category with a source position.
 * The `phase` field only records where the error was detected.
 */

/** Which part of the front end detected the error. */
export type SyntaxErrorPhase = "lex" | "parse" | "delegation";

/** Descriptive syntax error with position context. */
export class MarkupSyntaxError extends SyntaxError {
  /** Message without the location prefix. */
  readonly reason: string;
  /** Zero-based offset of the offending token. */
  readonly pos: number;
  /** 1-based line of the offending token. */
  readonly line: number;
  /** 1-based column of the offending token. */
  readonly column: number;
  readonly phase: SyntaxErrorPhase;
  readonly fileName: string | undefined;

  constructor(
    reason: string,
    source: string,
    pos: number,
    phase: SyntaxErrorPhase,
    fileName?: string
  ) {
    const { line, column } = lineCol(source, pos);
    super(`${fileName ?? "<input>"}:${line}:${column}: ${reason}`);
    this.name = "MarkupSyntaxError";
    this.reason = reason;
    this.pos = pos;
    this.line = line;
    this.column = column;
    this.phase = phase;
    this.fileName = fileName;
  }
}

/** Convert a zero-based offset to 1-based line/column. */
export function lineCol(source: string, pos: number): { line: number; column: number } {
  let line = 1;
  let column = 1;
  for (let i = 0; i < pos && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

export function isMarkupSyntaxError(error: unknown): error is MarkupSyntaxError {
  return error instanceof MarkupSyntaxError;
}
