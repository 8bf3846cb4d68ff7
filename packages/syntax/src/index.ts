/**
 * @hostmark/syntax - Markup literals for JavaScript expressions
 *
 * Reads element and fragment literals embedded in host expressions and lowers
 * them to plain calls of an element constructor.
 *
 * @example
 * ```typescript
 * import { parseExpression, printExpression } from "@hostmark/syntax";
 *
 * const expr = parseExpression(`<ul>{items.map(i => <li>{i}</li>)}</ul>`);
 * printExpression(expr);
 * // h("ul", {}, [items.map(i => h("li", {}, [i]))])
 * ```
 *
 * @packageDocumentation
 */

// Entry points
export { parseExpression, parseMarkup, parseMarkupAt, type MarkupParseResult } from "./parse.js";
export { printExpression } from "./printer.js";

// Errors
export {
  MarkupSyntaxError,
  isMarkupSyntaxError,
  lineCol,
  type SyntaxErrorPhase,
} from "./errors.js";

// Lexer
export { Lexer, isNameStart, isNamePart } from "./scanner.js";
export {
  LexMode,
  MarkupTokenKind,
  isMarkupToken,
  isCodeToken,
  describeToken,
  type Token,
  type CodeToken,
  type MarkupToken,
  type ScanResult,
} from "./tokens.js";

// Parsers
export { ParseContext, type ParseOptions, type HoleFrame } from "./context.js";
export { MarkupParser } from "./markup-parser.js";
export { ExpressionParser, startsExpression, type HoleResult } from "./expression-parser.js";

// Markup AST
export {
  createElement,
  createFragment,
  createText,
  createHole,
  createAttribute,
  tagSpelling,
  tagRefFromPath,
  type TagRef,
  type TextLiteralValue,
  type ElementNode,
  type FragmentNode,
  type TextLiteralNode,
  type ExpressionHoleNode,
  type Attribute,
  type MarkupNode,
  type MarkupLiteral,
} from "./markup-ast.js";

// Lowering
export { lowerMarkup, lowerNode, DEFAULT_FACTORY, type LowerOptions } from "./lower.js";
