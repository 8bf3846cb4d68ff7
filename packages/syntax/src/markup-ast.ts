/**
 * Markup AST
 *
 * Nodes live for a single parse: the markup parser builds them and lowering
 * consumes them straight away. Text and hole payloads are already host AST
 * (`ts` nodes), so lowering only has to arrange them.
 *
 * The `create*` helpers build nodes by hand (tests, tools generating markup);
 * hand-built nodes carry the position `-1`.
 */

import * as ts from "typescript";

/** A lower-case intrinsic (`div`) or a component reference (`Card`, `ui.Button`). */
export type TagRef =
  | { kind: "intrinsic"; name: string }
  | { kind: "component"; path: readonly string[] };

/** String-literal payload of a text child or attribute value. */
export type TextLiteralValue =
  | ts.StringLiteral
  | ts.NoSubstitutionTemplateLiteral
  | ts.TemplateExpression;

interface NodeBase {
  start: number;
  end: number;
}

export interface ElementNode extends NodeBase {
  kind: "Element";
  tag: TagRef;
  attributes: readonly Attribute[];
  children: readonly MarkupNode[];
  selfClosing: boolean;
}

export interface FragmentNode extends NodeBase {
  kind: "Fragment";
  children: readonly MarkupNode[];
}

export interface TextLiteralNode extends NodeBase {
  kind: "TextLiteral";
  value: TextLiteralValue;
}

export interface ExpressionHoleNode extends NodeBase {
  kind: "ExpressionHole";
  expr: ts.Expression;
}

export interface Attribute extends NodeBase {
  name: string;
  value: TextLiteralNode | ExpressionHoleNode;
}

export type MarkupNode = ElementNode | FragmentNode | TextLiteralNode | ExpressionHoleNode;

/** What a markup literal in expression position can be. */
export type MarkupLiteral = ElementNode | FragmentNode;

/** The source spelling of a tag, compared between open and close tags. */
export function tagSpelling(tag: TagRef): string {
  return tag.kind === "intrinsic" ? tag.name : tag.path.join(".");
}

/**
 * Classify a tag name. Dotted paths and names starting with an upper-case
 * letter, `_` or `$` are component references.
 */
export function tagRefFromPath(path: readonly string[]): TagRef {
  if (path.length === 1 && !/^[A-Z_$]/.test(path[0])) {
    return { kind: "intrinsic", name: path[0] };
  }
  return { kind: "component", path };
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function createElement(
  tag: string | TagRef,
  attributes: readonly Attribute[] = [],
  children: readonly MarkupNode[] = []
): ElementNode {
  return {
    kind: "Element",
    tag: typeof tag === "string" ? tagRefFromPath(tag.split(".")) : tag,
    attributes,
    children,
    selfClosing: children.length === 0,
    start: -1,
    end: -1,
  };
}

export function createFragment(children: readonly MarkupNode[] = []): FragmentNode {
  return { kind: "Fragment", children, start: -1, end: -1 };
}

export function createText(value: string | TextLiteralValue): TextLiteralNode {
  return {
    kind: "TextLiteral",
    value: typeof value === "string" ? ts.factory.createStringLiteral(value) : value,
    start: -1,
    end: -1,
  };
}

export function createHole(expr: ts.Expression): ExpressionHoleNode {
  return { kind: "ExpressionHole", expr, start: -1, end: -1 };
}

export function createAttribute(
  name: string,
  value: string | TextLiteralNode | ExpressionHoleNode
): Attribute {
  return {
    name,
    value: typeof value === "string" ? createText(value) : value,
    start: -1,
    end: -1,
  };
}
