/**
 * Token model for the mode-switching lexer
 */

import * as ts from "typescript";

/**
 * Syntactic mode the lexer reads a token in.
 *
 * - `Code`: ordinary host expression tokens (TypeScript scanner kinds)
 * - `Tag`: inside `<...>` of an opening or closing tag
 * - `Text`: between the tags of an element or fragment
 */
export enum LexMode {
  Code = "code",
  Tag = "tag",
  Text = "text",
}

/** Token kinds that only exist in markup (`Tag` and `Text`) positions. */
export enum MarkupTokenKind {
  /** `<` */
  TagOpen = "TagOpen",
  /** `>` */
  TagClose = "TagClose",
  /** `</` */
  TagOpenClose = "TagOpenClose",
  /** `/>` */
  SelfClose = "SelfClose",
  /** `<>` */
  FragmentOpen = "FragmentOpen",
  /** `</>` */
  FragmentClose = "FragmentClose",
  Identifier = "Identifier",
  Dot = "Dot",
  StringLiteral = "StringLiteral",
  /** A backtick in text position; the template itself is read in `Code` mode. */
  TemplateStart = "TemplateStart",
  /** `{` opening an expression hole */
  BraceOpen = "BraceOpen",
  /** `}` closing an expression hole (emitted while in `Code` mode) */
  BraceClose = "BraceClose",
  Equals = "Equals",
  /** Unquoted text content, which the grammar rejects. */
  BareText = "BareText",
  EndOfFile = "EndOfFile",
}

interface TokenBase {
  text: string;
  /** Cooked value for string literals, otherwise the token text. */
  value: string;
  start: number;
  end: number;
  /** Mode that was active when the token was read. */
  mode: LexMode;
}

export interface CodeToken extends TokenBase {
  kind: ts.SyntaxKind;
}

export interface MarkupToken extends TokenBase {
  kind: MarkupTokenKind;
}

export type Token = CodeToken | MarkupToken;

/** Result of one lexer step: the token and the mode for the token after it. */
export interface ScanResult {
  token: Token;
  mode: LexMode;
}

export function isMarkupToken(token: Token): token is MarkupToken {
  return typeof token.kind === "string";
}

export function isCodeToken(token: Token): token is CodeToken {
  return typeof token.kind === "number";
}

/** Human-readable description of a token for error messages. */
export function describeToken(token: Token): string {
  if (isMarkupToken(token)) {
    if (token.kind === MarkupTokenKind.EndOfFile) return "end of input";
    return `'${token.text}'`;
  }
  if (token.kind === ts.SyntaxKind.EndOfFileToken) return "end of input";
  return `'${token.text}'`;
}
