/**
 * Mode-switching lexer for markup literals
 *
 * `Code` tokens come from TypeScript's scanner unchanged; `Tag` and `Text`
 * tokens are read here. String literals in markup positions are also handed to
 * TypeScript's scanner so they follow the host grammar exactly.
 *
 * The lexer holds no mode of its own: every call to {@link Lexer.scan} takes
 * the mode to read in and returns the mode for the following token. The hole
 * stack and the open-tag stack live in the shared {@link ParseContext}.
 */

import * as ts from "typescript";
import type { ParseContext } from "./context.js";
import {
  LexMode,
  MarkupTokenKind,
  type CodeToken,
  type MarkupToken,
  type ScanResult,
} from "./tokens.js";

const enum Char {
  Tab = 0x09,
  LineFeed = 0x0a,
  VerticalTab = 0x0b,
  FormFeed = 0x0c,
  CarriageReturn = 0x0d,
  Space = 0x20,
  DoubleQuote = 0x22,
  Dollar = 0x24,
  SingleQuote = 0x27,
  Asterisk = 0x2a,
  Minus = 0x2d,
  Dot = 0x2e,
  Slash = 0x2f,
  Colon = 0x3a,
  LessThan = 0x3c,
  Equals = 0x3d,
  GreaterThan = 0x3e,
  Underscore = 0x5f,
  Backtick = 0x60,
  OpenBrace = 0x7b,
  CloseBrace = 0x7d,
  NonBreakingSpace = 0xa0,
  ByteOrderMark = 0xfeff,
}

function isWhiteSpace(ch: number): boolean {
  return (
    ch === Char.Space ||
    ch === Char.Tab ||
    ch === Char.LineFeed ||
    ch === Char.CarriageReturn ||
    ch === Char.VerticalTab ||
    ch === Char.FormFeed ||
    ch === Char.NonBreakingSpace ||
    ch === Char.ByteOrderMark
  );
}

function isAsciiLetter(ch: number): boolean {
  return (ch >= 0x41 && ch <= 0x5a) || (ch >= 0x61 && ch <= 0x7a);
}

function isDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

/** First character of a tag or attribute name. */
export function isNameStart(ch: number): boolean {
  return isAsciiLetter(ch) || ch === Char.Underscore || ch === Char.Dollar;
}

/** Tag and attribute names may also contain `-` and `:` (`aria-label`, `xlink:href`). */
export function isNamePart(ch: number): boolean {
  return isNameStart(ch) || isDigit(ch) || ch === Char.Minus || ch === Char.Colon;
}

export class Lexer {
  private readonly scanner: ts.Scanner;
  private scanError: string | undefined;

  constructor(private readonly ctx: ParseContext) {
    this.scanner = ts.createScanner(
      ts.ScriptTarget.Latest,
      true,
      ts.LanguageVariant.Standard,
      ctx.source,
      (message, _length, arg0) => {
        this.scanError ??= message.message.replace("{0}", String(arg0));
      }
    );
  }

  /**
   * Read the next token at the context cursor in the given mode.
   */
  scan(mode: LexMode): ScanResult {
    if (mode === LexMode.Code) {
      return this.scanCode();
    }
    return this.scanMarkup(mode);
  }

  /**
   * Re-read a `/` or `/=` in operand position as a regular expression literal.
   */
  rescanSlash(token: CodeToken): CodeToken {
    this.resetTo(token.start);
    this.scanner.scan();
    this.scanner.reScanSlashToken();
    return this.finishCodeToken();
  }

  /**
   * Re-read the `}` that ends a template substitution as the template's
   * continuation (`TemplateMiddle` or `TemplateTail`).
   */
  rescanTemplateContinuation(token: CodeToken): CodeToken {
    this.resetTo(token.start);
    this.scanner.scan();
    this.scanner.reScanTemplateToken(false);
    const result = this.finishCodeToken();
    const hole = this.ctx.currentHole();
    if (hole && result.kind === ts.SyntaxKind.TemplateMiddle) {
      hole.depth++;
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Code mode
  // ---------------------------------------------------------------------------

  private scanCode(): ScanResult {
    this.resetTo(this.ctx.pos);
    this.scanner.scan();
    const token = this.finishCodeToken();
    const hole = this.ctx.currentHole();
    if (!hole) {
      return { token, mode: LexMode.Code };
    }

    switch (token.kind) {
      case ts.SyntaxKind.OpenBraceToken:
      case ts.SyntaxKind.TemplateHead:
        hole.depth++;
        break;
      case ts.SyntaxKind.CloseBraceToken:
        if (hole.depth === 0) {
          this.ctx.holes.pop();
          if (hole.returnMode === LexMode.Tag) {
            // holes only occur in opening tags
            this.ctx.inClosingTag = false;
          }
          return {
            token: this.markupToken(MarkupTokenKind.BraceClose, token.start, token.end, LexMode.Code),
            mode: hole.returnMode,
          };
        }
        hole.depth--;
        break;
      case ts.SyntaxKind.EndOfFileToken:
        this.ctx.fail("unterminated expression hole: missing '}'", hole.start, "lex");
    }
    return { token, mode: LexMode.Code };
  }

  private resetTo(pos: number): void {
    this.scanError = undefined;
    this.scanner.resetTokenState(pos);
  }

  private finishCodeToken(): CodeToken {
    const start = this.scanner.getTokenStart();
    if (this.scanError !== undefined) {
      this.ctx.fail(this.scanError, start, "lex");
    }
    const end = this.scanner.getTokenEnd();
    this.ctx.pos = end;
    return {
      kind: this.scanner.getToken(),
      text: this.scanner.getTokenText(),
      value: this.scanner.getTokenValue(),
      start,
      end,
      mode: LexMode.Code,
    };
  }

  // ---------------------------------------------------------------------------
  // Tag and Text modes
  // ---------------------------------------------------------------------------

  private scanMarkup(mode: LexMode.Tag | LexMode.Text): ScanResult {
    const { source } = this.ctx;
    const start = this.skipTrivia(this.ctx.pos, mode === LexMode.Text);
    if (start >= source.length) {
      return this.emit(MarkupTokenKind.EndOfFile, start, start, mode, mode);
    }

    const ch = source.charCodeAt(start);
    const next = source.charCodeAt(start + 1);

    if (ch === Char.LessThan) {
      if (next === Char.Slash) {
        if (source.charCodeAt(start + 2) === Char.GreaterThan) {
          return this.emit(MarkupTokenKind.FragmentClose, start, start + 3, mode, this.modeAfterClose());
        }
        this.ctx.inClosingTag = true;
        return this.emit(MarkupTokenKind.TagOpenClose, start, start + 2, mode, LexMode.Tag);
      }
      if (next === Char.GreaterThan) {
        return this.emit(MarkupTokenKind.FragmentOpen, start, start + 2, mode, LexMode.Text);
      }
      this.ctx.inClosingTag = false;
      return this.emit(MarkupTokenKind.TagOpen, start, start + 1, mode, LexMode.Tag);
    }

    if (ch === Char.OpenBrace) {
      this.ctx.holes.push({
        returnMode: mode,
        depth: 0,
        start,
        tagDepth: this.ctx.openTags.length,
      });
      return this.emit(MarkupTokenKind.BraceOpen, start, start + 1, mode, LexMode.Code);
    }

    if (ch === Char.DoubleQuote || ch === Char.SingleQuote) {
      return this.scanStringLiteral(start, mode);
    }

    if (mode === LexMode.Tag) {
      return this.scanTagToken(start, ch, next);
    }

    if (ch === Char.Backtick) {
      return this.emit(MarkupTokenKind.TemplateStart, start, start + 1, mode, LexMode.Code);
    }
    if (ch === Char.CloseBrace) {
      this.ctx.fail("unexpected '}' in markup content", start, "lex");
    }

    let end = start + 1;
    while (end < source.length) {
      const c = source.charCodeAt(end);
      if (isWhiteSpace(c) || c === Char.LessThan || c === Char.OpenBrace) break;
      end++;
    }
    return this.emit(MarkupTokenKind.BareText, start, end, mode, mode);
  }

  private scanTagToken(start: number, ch: number, next: number): ScanResult {
    const mode = LexMode.Tag;
    switch (ch) {
      case Char.GreaterThan:
        return this.emit(
          MarkupTokenKind.TagClose,
          start,
          start + 1,
          mode,
          this.ctx.inClosingTag ? this.modeAfterClose() : LexMode.Text
        );
      case Char.Slash:
        if (next !== Char.GreaterThan) {
          this.ctx.fail("expected '>' after '/' in tag", start, "lex");
        }
        return this.emit(MarkupTokenKind.SelfClose, start, start + 2, mode, this.modeAfterClose());
      case Char.Equals:
        return this.emit(MarkupTokenKind.Equals, start, start + 1, mode, mode);
      case Char.Dot:
        return this.emit(MarkupTokenKind.Dot, start, start + 1, mode, mode);
    }

    if (isNameStart(ch)) {
      const { source } = this.ctx;
      let end = start + 1;
      while (end < source.length && isNamePart(source.charCodeAt(end))) {
        end++;
      }
      return this.emit(MarkupTokenKind.Identifier, start, end, mode, mode);
    }

    this.ctx.fail(`unexpected character '${String.fromCharCode(ch)}' in tag`, start, "lex");
  }

  private scanStringLiteral(start: number, mode: LexMode): ScanResult {
    this.resetTo(start);
    this.scanner.scan();
    if (this.scanError !== undefined) {
      this.ctx.fail(this.scanError, start, "lex");
    }
    const end = this.scanner.getTokenEnd();
    this.ctx.pos = end;
    return {
      token: {
        ...this.markupToken(MarkupTokenKind.StringLiteral, start, end, mode),
        value: this.scanner.getTokenValue(),
      },
      mode,
    };
  }

  /**
   * Mode after a token that completes an element (`/>`, the `>` of a closing
   * tag, or `</>`). The completed element is still on the open-tag stack; when
   * it is the outermost element of the literal, control returns to `Code`.
   */
  private modeAfterClose(): LexMode {
    const base = this.ctx.currentHole()?.tagDepth ?? 0;
    return this.ctx.openTags.length - 1 > base ? LexMode.Text : LexMode.Code;
  }

  private skipTrivia(pos: number, allowComments: boolean): number {
    const { source } = this.ctx;
    while (pos < source.length) {
      const ch = source.charCodeAt(pos);
      if (isWhiteSpace(ch)) {
        pos++;
        continue;
      }
      if (allowComments && ch === Char.Slash) {
        const next = source.charCodeAt(pos + 1);
        if (next === Char.Slash) {
          while (pos < source.length && source.charCodeAt(pos) !== Char.LineFeed) pos++;
          continue;
        }
        if (next === Char.Asterisk) {
          const close = source.indexOf("*/", pos + 2);
          if (close === -1) {
            this.ctx.fail("unterminated comment", pos, "lex");
          }
          pos = close + 2;
          continue;
        }
      }
      break;
    }
    return pos;
  }

  private markupToken(kind: MarkupTokenKind, start: number, end: number, mode: LexMode): MarkupToken {
    const text = this.ctx.source.slice(start, end);
    return { kind, text, value: text, start, end, mode };
  }

  private emit(
    kind: MarkupTokenKind,
    start: number,
    end: number,
    mode: LexMode,
    nextMode: LexMode
  ): ScanResult {
    this.ctx.pos = end;
    return { token: this.markupToken(kind, start, end, mode), mode: nextMode };
  }
}
