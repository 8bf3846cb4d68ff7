/**
 * Entry points
 *
 * Every call builds a fresh {@link ParseContext}, lexer and parser pair, so
 * parses never share mutable state.
 */

import * as ts from "typescript";
import { ParseContext, type ParseOptions } from "./context.js";
import { ExpressionParser } from "./expression-parser.js";
import { lowerMarkup } from "./lower.js";
import type { MarkupLiteral } from "./markup-ast.js";
import { Lexer } from "./scanner.js";

export interface MarkupParseResult {
  markup: MarkupLiteral;
  /** The literal lowered to a call of the element constructor. */
  expression: ts.CallExpression;
  /** Offset just past the literal's final `>`. */
  end: number;
}

function createParser(source: string, options: ParseOptions): { ctx: ParseContext; parser: ExpressionParser } {
  const ctx = new ParseContext(source, options);
  const parser = new ExpressionParser(ctx, new Lexer(ctx));
  return { ctx, parser };
}

/**
 * Parse `source` as one host expression. Markup literals anywhere in it are
 * lowered in place.
 *
 * @example
 * ```typescript
 * printExpression(parseExpression(`<a href="/">"home"</a>`));
 * // h("a", { "href": "/" }, ["home"])
 * ```
 */
export function parseExpression(source: string, options: ParseOptions = {}): ts.Expression {
  return createParser(source, options).parser.parseRoot();
}

/**
 * Parse `source` as exactly one markup literal, surrounded by nothing but
 * whitespace, and return its markup AST.
 */
export function parseMarkup(source: string, options: ParseOptions = {}): MarkupLiteral {
  const start = source.length - source.trimStart().length;
  const { ctx, parser } = createParser(source, options);
  if (source[start] !== "<") {
    ctx.fail("expected a markup literal", start, "parse");
  }
  const markup = parser.markup.parseLiteral(start);
  if (source.slice(ctx.pos).trim() !== "") {
    const trailing = source.length - source.slice(ctx.pos).trimStart().length;
    ctx.fail("unexpected input after markup literal", trailing, "parse");
  }
  return markup;
}

/**
 * Parse the markup literal whose `<` is at `pos` inside a larger text. The
 * text after the literal is not looked at.
 */
export function parseMarkupAt(source: string, pos: number, options: ParseOptions = {}): MarkupParseResult {
  const { ctx, parser } = createParser(source, options);
  const markup = parser.markup.parseLiteral(pos);
  return { markup, expression: lowerMarkup(markup, options), end: ctx.pos };
}
