/**
 * Host expression parser
 *
 * Host expressions are parsed by the TypeScript parser. This module only finds
 * where an expression ends and which of its `<` tokens open markup literals.
 * It walks the expression's tokens with the shared {@link Lexer}, hands each
 * markup literal to the {@link MarkupParser}, and leaves a placeholder name in
 * its place. The text with placeholders is parsed as `( ... )`, and each
 * placeholder is then swapped for the literal's lowered call.
 *
 * Three kinds of region are read this way:
 * - the whole source, for {@link parseExpression}
 * - a `{ ... }` hole, up to the hole's closing brace
 * - a template literal used as text content
 */

import * as ts from "typescript";
import { parseDiagnostics, stripPositions } from "./ast-utils.js";
import type { ParseContext } from "./context.js";
import type { SyntaxErrorPhase } from "./errors.js";
import { lowerMarkup } from "./lower.js";
import type { TextLiteralValue } from "./markup-ast.js";
import { MarkupParser } from "./markup-parser.js";
import type { Lexer } from "./scanner.js";
import { LexMode, isCodeToken, type MarkupToken, type ScanResult } from "./tokens.js";

const SyntaxKind = ts.SyntaxKind;

/** Result of parsing one expression hole. */
export interface HoleResult {
  expression: ts.Expression;
  /** The hole's closing `}` and the mode the lexer returned to. */
  close: ScanResult;
}

/**
 * Whether `<` or `/` after a token of this kind begins an operand rather than
 * continuing an expression as an operator.
 */
export function startsExpression(previous: ts.SyntaxKind): boolean {
  switch (previous) {
    case SyntaxKind.Identifier:
    case SyntaxKind.PrivateIdentifier:
    case SyntaxKind.NumericLiteral:
    case SyntaxKind.BigIntLiteral:
    case SyntaxKind.StringLiteral:
    case SyntaxKind.NoSubstitutionTemplateLiteral:
    case SyntaxKind.TemplateTail:
    case SyntaxKind.RegularExpressionLiteral:
    case SyntaxKind.CloseParenToken:
    case SyntaxKind.CloseBracketToken:
    case SyntaxKind.CloseBraceToken:
    case SyntaxKind.ThisKeyword:
    case SyntaxKind.SuperKeyword:
    case SyntaxKind.TrueKeyword:
    case SyntaxKind.FalseKeyword:
    case SyntaxKind.NullKeyword:
    case SyntaxKind.PlusPlusToken:
    case SyntaxKind.MinusMinusToken:
      return false;
    case SyntaxKind.OfKeyword:
    case SyntaxKind.AwaitKeyword:
      return true;
    default:
      // other contextual keywords are usually plain names (`type`, `from`, ...)
      return !(previous >= SyntaxKind.AbstractKeyword && previous <= SyntaxKind.LastKeyword);
  }
}

type RegionKind = "root" | "hole" | "template";

interface MarkupSpan {
  start: number;
  end: number;
  expression: ts.Expression;
}

interface Region {
  start: number;
  /** Offset just past the region's last host token. */
  end: number;
  /** Where errors past the region's text are reported. */
  limit: number;
  markup: MarkupSpan[];
  /** The hole's closing `}`, for holes. */
  close?: ScanResult;
}

/** A run of the text handed to the TypeScript parser and where it came from. */
interface Segment {
  at: number;
  length: number;
  source: number;
  markup: boolean;
}

const SCRATCH_FILE = "hostmark-expression.ts";

/** `??` may not be mixed with these without parentheses. */
function isLogicalOperator(kind: ts.SyntaxKind): boolean {
  return kind === SyntaxKind.BarBarToken || kind === SyntaxKind.AmpersandAmpersandToken;
}

/** A placeholder name prefix that does not occur in `source`. */
function placeholderPrefix(source: string): string {
  let prefix = "__hostmark";
  while (source.includes(prefix)) prefix += "_";
  return prefix;
}

export class ExpressionParser {
  readonly markup: MarkupParser;

  constructor(
    private readonly ctx: ParseContext,
    private readonly lexer: Lexer
  ) {
    this.markup = new MarkupParser(ctx, lexer, this);
  }

  // ===========================================================================
  // Entry points
  // ===========================================================================

  /**
   * Parse the whole source as one expression.
   */
  parseRoot(): ts.Expression {
    const region = this.scanRegion("root", 0);
    return this.parseRegion(region, "parse");
  }

  /**
   * Parse the expression of a hole whose `{` was just read, up to and including
   * the hole's `}`.
   */
  parseHole(open: MarkupToken): HoleResult {
    const region = this.scanRegion("hole", open.end);
    if (!region.close) {
      this.ctx.fail("expected '}' to close expression hole", open.start, "delegation");
    }
    if (region.end === region.start) {
      this.ctx.fail("expected expression inside '{}'", open.start, "parse");
    }
    return { expression: this.parseRegion(region, "delegation"), close: region.close };
  }

  /**
   * Parse a template literal in text position. The cursor is left just past
   * its closing backtick and no further token is read.
   */
  parseTemplateAt(start: number): TextLiteralValue {
    const region = this.scanRegion("template", start);
    const expression = this.parseRegion(region, "delegation");
    if (!ts.isNoSubstitutionTemplateLiteral(expression) && !ts.isTemplateExpression(expression)) {
      this.ctx.fail("expected template literal", start, "delegation");
    }
    this.ctx.pos = region.end;
    return expression;
  }

  // ===========================================================================
  // Finding the region
  // ===========================================================================

  /**
   * Read host tokens from `start` to the end of the region, parsing every
   * markup literal met on the way.
   */
  private scanRegion(kind: RegionKind, start: number): Region {
    const markup: MarkupSpan[] = [];
    // brace depth at which each open template substitution started
    const templates: number[] = [];
    let braces = 0;
    let previous: ts.SyntaxKind = SyntaxKind.Unknown;
    let end = start;
    this.ctx.pos = start;

    for (;;) {
      const result = this.lexer.scan(LexMode.Code);
      const token = result.token;
      if (!isCodeToken(token)) {
        // only the hole's own closing brace comes back as a markup token
        return { start, end, limit: token.start, markup, close: result };
      }

      let tokenKind = token.kind;
      let tokenEnd = token.end;
      switch (tokenKind) {
        case SyntaxKind.EndOfFileToken:
          return { start, end, limit: this.ctx.source.length, markup };
        case SyntaxKind.OpenBraceToken:
          braces++;
          break;
        case SyntaxKind.CloseBraceToken:
          if (templates.length > 0 && templates[templates.length - 1] === braces) {
            const part = this.lexer.rescanTemplateContinuation(token);
            tokenKind = part.kind;
            tokenEnd = part.end;
            if (tokenKind === SyntaxKind.TemplateTail) templates.pop();
          } else {
            braces--;
          }
          break;
        case SyntaxKind.TemplateHead:
          templates.push(braces);
          break;
        case SyntaxKind.SlashToken:
        case SyntaxKind.SlashEqualsToken:
          if (startsExpression(previous)) {
            const regex = this.lexer.rescanSlash(token);
            tokenKind = regex.kind;
            tokenEnd = regex.end;
          }
          break;
        case SyntaxKind.LessThanToken:
          if (startsExpression(previous)) {
            const literal = this.markup.parseLiteral(token.start);
            markup.push({ start: token.start, end: this.ctx.pos, expression: lowerMarkup(literal, this.ctx.options) });
            tokenKind = SyntaxKind.CloseParenToken;
            tokenEnd = this.ctx.pos;
          }
          break;
      }

      previous = tokenKind;
      end = tokenEnd;
      this.ctx.pos = tokenEnd;

      if (
        kind === "template" &&
        templates.length === 0 &&
        (tokenKind === SyntaxKind.NoSubstitutionTemplateLiteral || tokenKind === SyntaxKind.TemplateTail)
      ) {
        return { start, end, limit: end, markup };
      }
    }
  }

  // ===========================================================================
  // Parsing the region
  // ===========================================================================

  private parseRegion(region: Region, phase: SyntaxErrorPhase): ts.Expression {
    const { source } = this.ctx;
    const prefix = placeholderPrefix(source);
    const replacements = new Map<string, ts.Expression>();
    const segments: Segment[] = [];

    let text = "(";
    const addText = (from: number, to: number): void => {
      segments.push({ at: text.length, length: to - from, source: from, markup: false });
      text += source.slice(from, to);
    };

    let cursor = region.start;
    region.markup.forEach((span, i) => {
      addText(cursor, span.start);
      // parenthesized so the placeholder can only stand where an operand can
      const name = `${prefix}${i}`;
      replacements.set(name, span.expression);
      segments.push({ at: text.length, length: name.length + 2, source: span.start, markup: true });
      text += `(${name})`;
      cursor = span.end;
    });
    addText(cursor, region.end);
    text += "\n)";

    const toSource = (offset: number): number => {
      for (const segment of segments) {
        if (offset >= segment.at && offset < segment.at + segment.length) {
          return segment.markup ? segment.source : segment.source + (offset - segment.at);
        }
      }
      return offset < 1 ? region.start : region.limit;
    };

    const file = ts.createSourceFile(SCRATCH_FILE, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
    const [diagnostic] = parseDiagnostics(file);
    if (diagnostic) {
      this.ctx.fail(ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"), toSource(diagnostic.start), phase);
    }

    const statement = file.statements.length === 1 ? file.statements[0] : undefined;
    if (
      !statement ||
      !ts.isExpressionStatement(statement) ||
      !ts.isParenthesizedExpression(statement.expression) ||
      statement.expression.end !== text.length
    ) {
      this.ctx.fail("expected a single expression", region.start, phase);
    }
    const parsed = statement.expression.expression;

    this.checkOperatorMixing(parsed, file, toSource, phase);
    return stripPositions(this.substitute(parsed, file, replacements));
  }

  /**
   * The TypeScript parser leaves `a ?? b || c` to the type checker; a bare
   * expression has no checker, so the rule is applied here.
   */
  private checkOperatorMixing(
    node: ts.Node,
    file: ts.SourceFile,
    toSource: (offset: number) => number,
    phase: SyntaxErrorPhase
  ): void {
    if (ts.isBinaryExpression(node)) {
      const operator = node.operatorToken.kind;
      for (const operand of [node.left, node.right]) {
        if (!ts.isBinaryExpression(operand)) continue;
        const inner = operand.operatorToken.kind;
        const mixed =
          (operator === SyntaxKind.QuestionQuestionToken && isLogicalOperator(inner)) ||
          (isLogicalOperator(operator) && inner === SyntaxKind.QuestionQuestionToken);
        if (mixed) {
          const logical = isLogicalOperator(inner) ? inner : operator;
          this.ctx.fail(
            `'${ts.tokenToString(logical)}' and '??' operations cannot be mixed without parentheses.`,
            toSource(operand.getStart(file)),
            phase
          );
        }
      }
    }
    ts.forEachChild(node, (child) => this.checkOperatorMixing(child, file, toSource, phase));
  }

  /**
   * Swap the placeholders for the lowered markup. String and numeric literals
   * are rebuilt so they print with their original spelling once detached from
   * the scratch file.
   */
  private substitute(
    expression: ts.Expression,
    file: ts.SourceFile,
    replacements: ReadonlyMap<string, ts.Expression>
  ): ts.Expression {
    const result = ts.transform(expression, [
      (context) => {
        const visit = (node: ts.Node): ts.Node => {
          if (ts.isParenthesizedExpression(node) && ts.isIdentifier(node.expression)) {
            const lowered = replacements.get(node.expression.text);
            if (lowered) return lowered;
          }
          if (ts.isStringLiteral(node)) {
            return ts.factory.createStringLiteral(node.text, file.text[node.getStart(file)] === "'");
          }
          if (ts.isNumericLiteral(node)) {
            return ts.factory.createNumericLiteral(node.getText(file));
          }
          return ts.visitEachChild(node, visit, context);
        };
        return (root) => ts.visitNode(root, visit, ts.isExpression);
      },
    ]);
    const [transformed] = result.transformed;
    return transformed ?? expression;
  }
}
