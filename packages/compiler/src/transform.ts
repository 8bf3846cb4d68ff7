/**
 * Module transformer
 *
 * Finds the markup literals in a whole module and replaces each with its
 * lowered call, leaving every other byte of the module untouched. The module is
 * scanned (not parsed) with TypeScript's scanner; a `<` opens a markup literal
 * exactly where an expression may start, which is decided from the previous
 * significant token.
 *
 * @example
 * ```typescript
 * const { code } = transform(`export const link = <a href="/">"home"</a>;`);
 * // export const link = h("a", { "href": "/" }, ["home"]);
 * ```
 */

import * as ts from "typescript";
import MagicString, { type SourceMap } from "magic-string";
import {
  DEFAULT_FACTORY,
  parseMarkupAt,
  printExpression,
  startsExpression,
  type LowerOptions,
} from "@hostmark/syntax";

export interface TransformOptions extends LowerOptions {
  /** File name for error messages and the source map. */
  fileName?: string;
  /**
   * Module to import the element constructor (and fragment) from. The import
   * is only added when the module contained markup.
   */
  importSource?: string;
  verbose?: boolean;
}

export interface TransformResult {
  code: string;
  changed: boolean;
  /** v3 source map, or null if no changes */
  map: SourceMap | null;
  /** Number of top-level markup literals lowered. */
  literals: number;
}

const SyntaxKind = ts.SyntaxKind;

/**
 * Replace every markup literal in `source` with a call of the element
 * constructor. Throws a `MarkupSyntaxError` for the first malformed literal.
 */
export function transform(source: string, options: TransformOptions = {}): TransformResult {
  const { fileName, verbose = false } = options;
  const lowerOptions: LowerOptions = { factory: options.factory, fragment: options.fragment };

  const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, ts.LanguageVariant.Standard, source);
  const s = new MagicString(source);

  // brace depth at which each open template substitution started
  const templates: number[] = [];
  let braceDepth = 0;
  let previous: ts.SyntaxKind = SyntaxKind.Unknown;
  let literals = 0;

  for (;;) {
    let kind = scanner.scan();
    if (kind === SyntaxKind.EndOfFileToken) break;

    switch (kind) {
      case SyntaxKind.OpenBraceToken:
        braceDepth++;
        break;
      case SyntaxKind.CloseBraceToken:
        if (templates.length > 0 && templates[templates.length - 1] === braceDepth) {
          kind = scanner.reScanTemplateToken(false);
          if (kind === SyntaxKind.TemplateTail) templates.pop();
        } else {
          braceDepth--;
        }
        break;
      case SyntaxKind.TemplateHead:
        templates.push(braceDepth);
        break;
      case SyntaxKind.SlashToken:
      case SyntaxKind.SlashEqualsToken:
        if (startsExpression(previous)) {
          kind = scanner.reScanSlashToken();
        }
        break;
      case SyntaxKind.LessThanToken:
        if (startsExpression(previous)) {
          const start = scanner.getTokenStart();
          const result = parseMarkupAt(source, start, { ...lowerOptions, fileName });
          s.overwrite(start, result.end, printExpression(result.expression));
          literals++;
          scanner.resetTokenState(result.end);
          // the call that replaced the literal ends an expression
          kind = SyntaxKind.CloseParenToken;
        }
        break;
    }
    previous = kind;
  }

  if (literals === 0) {
    if (verbose) {
      console.log(`[hostmark] No markup in ${fileName ?? "<input>"}`);
    }
    return { code: source, changed: false, map: null, literals: 0 };
  }

  if (options.importSource) {
    const names = importedNames(options);
    if (names.length > 0) {
      const at = source.startsWith("#!") ? source.indexOf("\n") + 1 : 0;
      s.appendLeft(at, `import { ${names.join(", ")} } from "${options.importSource}";\n`);
    }
  }

  if (verbose) {
    console.log(`[hostmark] Lowered ${literals} markup literal(s) in ${fileName ?? "<input>"}`);
  }

  const map = s.generateMap({
    hires: true,
    includeContent: true,
    source: fileName,
    file: fileName ? `${fileName}.map` : undefined,
  });

  return { code: s.toString(), changed: true, map, literals };
}

/** Plain identifiers to import; dotted paths are left to the module. */
function importedNames(options: LowerOptions): string[] {
  const names = [options.factory ?? DEFAULT_FACTORY];
  if (options.fragment) names.push(options.fragment);
  return names.filter((name) => !name.includes("."));
}
