/**
 * Lowering: markup AST → host call expressions
 *
 * ```
 * <a href="x">"hi"</a>   →   h("a", { "href": "x" }, ["hi"])
 * <>{a}{b}</>            →   h(null, {}, [a, b])
 * <ui.Card />            →   h(ui.Card, {}, [])
 * ```
 *
 * Lowering is total over the markup AST: every failure was already reported by
 * the parser.
 */

import * as ts from "typescript";
import type { Attribute, MarkupLiteral, MarkupNode, TagRef } from "./markup-ast.js";

export interface LowerOptions {
  /** Element constructor, an identifier or dotted path. Default: `h`. */
  factory?: string;
  /**
   * Tag passed for fragments. `null` (the default) lowers to the `null`
   * literal; a string lowers to a reference to that identifier or path.
   */
  fragment?: string | null;
}

export const DEFAULT_FACTORY = "h";

/**
 * Lower a markup literal to a call of the element constructor.
 */
export function lowerMarkup(node: MarkupLiteral, options: LowerOptions = {}): ts.CallExpression {
  const factory = ts.factory;
  const callee = referenceTo((options.factory ?? DEFAULT_FACTORY).split("."));

  const tag =
    node.kind === "Fragment"
      ? options.fragment
        ? referenceTo(options.fragment.split("."))
        : factory.createNull()
      : tagExpression(node.tag);
  const attributes = node.kind === "Element" ? node.attributes : [];

  return factory.createCallExpression(callee, undefined, [
    tag,
    factory.createObjectLiteralExpression(attributes.map(lowerAttribute)),
    factory.createArrayLiteralExpression(node.children.map((child) => lowerNode(child, options))),
  ]);
}

/**
 * Lower any markup node to the expression that takes its place in a children
 * array.
 */
export function lowerNode(node: MarkupNode, options: LowerOptions = {}): ts.Expression {
  switch (node.kind) {
    case "Element":
    case "Fragment":
      return lowerMarkup(node, options);
    case "TextLiteral":
      return node.value;
    case "ExpressionHole":
      return node.expr;
  }
}

function lowerAttribute(attribute: Attribute): ts.PropertyAssignment {
  const value = attribute.value.kind === "TextLiteral" ? attribute.value.value : attribute.value.expr;
  return ts.factory.createPropertyAssignment(ts.factory.createStringLiteral(attribute.name), value);
}

function tagExpression(tag: TagRef): ts.Expression {
  return tag.kind === "intrinsic" ? ts.factory.createStringLiteral(tag.name) : referenceTo(tag.path);
}

function referenceTo(path: readonly string[]): ts.Expression {
  let expr: ts.Expression = ts.factory.createIdentifier(path[0]);
  for (const segment of path.slice(1)) {
    expr = ts.factory.createPropertyAccessExpression(expr, segment);
  }
  return expr;
}
