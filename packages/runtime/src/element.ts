/**
 * The element constructor
 *
 * Lowered markup calls `h(tag, props, children)`; hand-written code may also
 * pass children as rest arguments.
 */

import { renderToString } from "./render.js";
import type { MarkupChild, Props, Tag } from "./types.js";
import { flatten } from "./util.js";

export class MarkupElement {
  readonly tag: Tag;
  readonly props: Props;
  readonly children: readonly MarkupChild[];

  constructor(tag: Tag, props: Props, children: readonly MarkupChild[]) {
    this.tag = tag;
    this.props = props;
    this.children = children;
  }

  toString(): string {
    return renderToString(this);
  }
}

/**
 * Create an element. Child arrays at any depth are flattened.
 *
 * @example
 * ```typescript
 * h("a", { href: "/" }, ["home"]);
 * h("ul", null, h("li", null, "one"), h("li", null, "two"));
 * ```
 */
export function h(tag: Tag, props?: Props | null, ...children: MarkupChild[]): MarkupElement {
  return new MarkupElement(tag, props ?? {}, flatten(children));
}

export function isMarkupElement(value: unknown): value is MarkupElement {
  return value instanceof MarkupElement;
}
