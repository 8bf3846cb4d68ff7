/**
 * Recursive-descent parser for markup literals
 *
 * ```
 * Element        := '<' TagName Attribute* ( '/>' | '>' Children '</' TagName '>' )
 * Fragment       := '<>' Children '</>'
 * Children       := ( Element | Fragment | TextLiteral | ExpressionHole )*
 * Attribute      := Identifier '=' ( StringLiteral | '{' HostExpr '}' )
 * TextLiteral    := StringLiteral | TemplateLiteral
 * ExpressionHole := '{' HostExpr '}'
 * ```
 *
 * Holes are handed to the {@link ExpressionParser}, which may come back here
 * for markup nested inside the hole's expression. The first error aborts the
 * whole literal; there is no recovery.
 */

import * as ts from "typescript";
import type { ParseContext } from "./context.js";
import type { ExpressionParser } from "./expression-parser.js";
import {
  tagRefFromPath,
  tagSpelling,
  type Attribute,
  type ElementNode,
  type ExpressionHoleNode,
  type FragmentNode,
  type MarkupLiteral,
  type MarkupNode,
  type TagRef,
  type TextLiteralNode,
} from "./markup-ast.js";
import type { Lexer } from "./scanner.js";
import {
  LexMode,
  MarkupTokenKind,
  describeToken,
  isMarkupToken,
  type MarkupToken,
  type Token,
} from "./tokens.js";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export class MarkupParser {
  /** Current token; parse methods leave it on the last token they consume. */
  private token: Token;
  /** Mode the lexer reported for the token after {@link token}. */
  private mode: LexMode = LexMode.Code;

  constructor(
    private readonly ctx: ParseContext,
    private readonly lexer: Lexer,
    private readonly expressions: ExpressionParser
  ) {
    this.token = {
      kind: MarkupTokenKind.EndOfFile,
      text: "",
      value: "",
      start: 0,
      end: 0,
      mode: LexMode.Code,
    };
  }

  /**
   * Parse the markup literal whose `<` is at `start`. On return the context
   * cursor sits just past the literal's final `>`.
   */
  parseLiteral(start: number): MarkupLiteral {
    this.ctx.pos = start;
    const open = this.advanceIn(LexMode.Tag);
    if (open.kind === MarkupTokenKind.FragmentOpen) {
      return this.parseFragment(open);
    }
    if (open.kind === MarkupTokenKind.TagOpen) {
      return this.parseElement(open);
    }
    this.fail(`expected a markup literal but found ${describeToken(open)}`, open);
  }

  // ---------------------------------------------------------------------------
  // Elements and fragments
  // ---------------------------------------------------------------------------

  private parseElement(open: MarkupToken): ElementNode {
    this.advance();
    const tag = this.parseTagName("<");
    const spelling = tagSpelling(tag);
    this.ctx.openTags.push(spelling);

    const attributes = this.parseAttributes();

    if (this.is(MarkupTokenKind.SelfClose)) {
      this.ctx.openTags.pop();
      return {
        kind: "Element",
        tag,
        attributes,
        children: [],
        selfClosing: true,
        start: open.start,
        end: this.token.end,
      };
    }
    if (!this.is(MarkupTokenKind.TagClose)) {
      if (this.is(MarkupTokenKind.EndOfFile)) {
        this.fail(`unterminated <${spelling}> tag: expected '>' or '/>'`, open);
      }
      this.fail(`expected '>' or '/>' to end <${spelling}> but found ${describeToken(this.token)}`);
    }

    const children = this.parseChildren();
    const close = this.token;

    if (this.is(MarkupTokenKind.FragmentClose)) {
      this.fail(`mismatched closing tag: expected </${spelling}> but found </>`, close);
    }
    if (!this.is(MarkupTokenKind.TagOpenClose)) {
      this.fail(`unterminated markup literal: missing </${spelling}>`);
    }

    this.advance();
    const closeSpelling = tagSpelling(this.parseTagName("</"));
    if (closeSpelling !== spelling) {
      this.fail(
        `mismatched closing tag: expected </${spelling}> but found </${closeSpelling}>`,
        close
      );
    }
    if (!this.is(MarkupTokenKind.TagClose)) {
      this.fail(`expected '>' to end </${spelling}> but found ${describeToken(this.token)}`);
    }
    this.ctx.openTags.pop();

    return {
      kind: "Element",
      tag,
      attributes,
      children,
      selfClosing: false,
      start: open.start,
      end: this.token.end,
    };
  }

  private parseFragment(open: MarkupToken): FragmentNode {
    this.ctx.openTags.push("");
    const children = this.parseChildren();
    const close = this.token;

    if (this.is(MarkupTokenKind.TagOpenClose)) {
      this.advance();
      const found = tagSpelling(this.parseTagName("</"));
      this.fail(`mismatched closing tag: expected </> but found </${found}>`, close);
    }
    if (!this.is(MarkupTokenKind.FragmentClose)) {
      this.fail("unterminated markup literal: missing </>");
    }
    this.ctx.openTags.pop();

    return { kind: "Fragment", children, start: open.start, end: close.end };
  }

  /**
   * Read children up to (and including) the `</` or `</>` that ends them.
   */
  private parseChildren(): MarkupNode[] {
    const children: MarkupNode[] = [];
    for (;;) {
      const token = this.advance();
      if (!isMarkupToken(token)) {
        this.fail(`unexpected ${describeToken(token)} in markup content`);
      }
      switch (token.kind) {
        case MarkupTokenKind.StringLiteral:
          children.push(this.textFromToken(token));
          break;
        case MarkupTokenKind.TemplateStart:
          children.push(this.parseTemplateText(token));
          break;
        case MarkupTokenKind.BraceOpen:
          children.push(this.parseHole(token));
          break;
        case MarkupTokenKind.TagOpen:
          children.push(this.parseElement(token));
          break;
        case MarkupTokenKind.FragmentOpen:
          children.push(this.parseFragment(token));
          break;
        case MarkupTokenKind.TagOpenClose:
        case MarkupTokenKind.FragmentClose:
        case MarkupTokenKind.EndOfFile:
          return children;
        case MarkupTokenKind.BareText:
          this.fail(`text content must be a quoted string literal, found '${token.text}'`);
        default:
          this.fail(`unexpected ${describeToken(token)} in markup content`);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Tag names and attributes
  // ---------------------------------------------------------------------------

  /**
   * Read `Identifier ('.' Identifier)*`, leaving the token after the name
   * current.
   */
  private parseTagName(opener: "<" | "</"): TagRef {
    if (!this.is(MarkupTokenKind.Identifier)) {
      this.fail(`expected a tag name after '${opener}' but found ${describeToken(this.token)}`);
    }
    const first = this.token;
    const path = [first.text];
    this.advance();
    while (this.is(MarkupTokenKind.Dot)) {
      this.advance();
      if (!this.is(MarkupTokenKind.Identifier)) {
        this.fail(`expected a name after '.' but found ${describeToken(this.token)}`);
      }
      path.push(this.token.text);
      this.advance();
    }

    const tag = tagRefFromPath(path);
    if (tag.kind === "component") {
      const bad = tag.path.find((segment) => !IDENTIFIER.test(segment));
      if (bad !== undefined) {
        this.fail(`invalid component name '${bad}'`, first);
      }
    }
    return tag;
  }

  /**
   * Read attributes, leaving the first non-attribute token current. A repeated
   * name is kept; the props object literal gives the last one its value.
   */
  private parseAttributes(): Attribute[] {
    const attributes: Attribute[] = [];

    while (this.is(MarkupTokenKind.Identifier)) {
      const nameToken = this.token;
      const name = nameToken.text;

      this.advance();
      if (!this.is(MarkupTokenKind.Equals)) {
        this.fail(`expected '=' after attribute '${name}' but found ${describeToken(this.token)}`);
      }

      const valueToken = this.advance();
      let value: TextLiteralNode | ExpressionHoleNode;
      if (valueToken.kind === MarkupTokenKind.StringLiteral) {
        value = this.textFromToken(valueToken);
      } else if (valueToken.kind === MarkupTokenKind.BraceOpen) {
        value = this.parseHole(valueToken);
      } else {
        this.fail(
          `invalid value for attribute '${name}': expected a string literal or {expression}`
        );
      }

      attributes.push({ name, value, start: nameToken.start, end: value.end });
      this.advance();
    }
    return attributes;
  }

  // ---------------------------------------------------------------------------
  // Text and holes
  // ---------------------------------------------------------------------------

  private textFromToken(token: MarkupToken): TextLiteralNode {
    return {
      kind: "TextLiteral",
      value: ts.factory.createStringLiteral(token.value, token.text.startsWith("'")),
      start: token.start,
      end: token.end,
    };
  }

  private parseTemplateText(token: MarkupToken): TextLiteralNode {
    const value = this.expressions.parseTemplateAt(token.start);
    this.token = { ...token, end: this.ctx.pos };
    this.mode = LexMode.Text;
    return { kind: "TextLiteral", value, start: token.start, end: this.ctx.pos };
  }

  private parseHole(open: MarkupToken): ExpressionHoleNode {
    const { expression, close } = this.expressions.parseHole(open);
    this.token = close.token;
    this.mode = close.mode;
    return { kind: "ExpressionHole", expr: expression, start: open.start, end: close.token.end };
  }

  // ---------------------------------------------------------------------------
  // Token plumbing
  // ---------------------------------------------------------------------------

  private advance(): Token {
    return this.advanceIn(this.mode);
  }

  private advanceIn(mode: LexMode): Token {
    const result = this.lexer.scan(mode);
    this.token = result.token;
    this.mode = result.mode;
    return result.token;
  }

  private is(kind: MarkupTokenKind): boolean {
    return this.token.kind === kind;
  }

  private fail(message: string, at: Token = this.token): never {
    this.ctx.fail(message, at.start, "parse");
  }
}
