/**
 * @hostmark/runtime - Element constructor and renderer for markup literals
 *
 * Lowered markup calls `h(tag, props, children)`. Bring `h` (and `Fragment`
 * if fragments are lowered to it) into scope in every module that uses markup.
 *
 * @example
 * ```typescript
 * import { h, renderToString } from "@hostmark/runtime";
 *
 * renderToString(h("a", { href: "/" }, ["home"]));
 * // <a href="/">
 * //     home
 * // </a>
 * ```
 *
 * @packageDocumentation
 */

export { h, MarkupElement, isMarkupElement } from "./element.js";
export { Component, Fragment } from "./component.js";
export { renderToString, renderAttributes, VOID_ELEMENTS } from "./render.js";
export { flatten, indent, dashCase, escapeHtml, isChildList } from "./util.js";
export type {
  Props,
  MarkupChild,
  FlatChild,
  ComponentProps,
  Renderable,
  ComponentType,
  Tag,
} from "./types.js";
