/**
 * Parsing context shared by the markup and host-expression grammars
 *
 * Both grammars read from one cursor and one set of stacks, so a hole inside
 * markup inside a hole (and so on) needs no duplicated state. A context lives
 * for exactly one parse of one source text.
 */

import { MarkupSyntaxError, type SyntaxErrorPhase } from "./errors.js";
import type { LowerOptions } from "./lower.js";
import type { LexMode } from "./tokens.js";

export interface ParseOptions extends LowerOptions {
  /** File name used in error messages. */
  fileName?: string;
}

/** An open `{ ... }` expression hole. */
export interface HoleFrame {
  /** Mode to resume once the hole's closing `}` is read. */
  returnMode: LexMode;
  /** Unclosed `{` and `${` inside the hole's expression. */
  depth: number;
  /** Offset of the hole's `{`. */
  start: number;
  /** Size of the open-tag stack when the hole was opened. */
  tagDepth: number;
}

export class ParseContext {
  /** Offset where the next token will be read. */
  pos = 0;
  readonly holes: HoleFrame[] = [];
  /** Spellings of the elements currently open; `""` for a fragment. */
  readonly openTags: string[] = [];
  /** Set while the lexer is inside a `</name>` tag. */
  inClosingTag = false;

  constructor(
    readonly source: string,
    readonly options: ParseOptions = {}
  ) {}

  get fileName(): string | undefined {
    return this.options.fileName;
  }

  currentHole(): HoleFrame | undefined {
    return this.holes[this.holes.length - 1];
  }

  fail(message: string, pos: number, phase: SyntaxErrorPhase): never {
    throw new MarkupSyntaxError(message, this.source, pos, phase, this.options.fileName);
  }
}
