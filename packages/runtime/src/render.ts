/**
 * Rendering markup values to indented HTML text
 *
 * ```
 * <a href="/">          h("a", { href: "/" }, [
 *     <b>                 h("b", {}, ["home"]),
 *         home          ])
 *     </b>
 * </a>
 * ```
 */

import { MarkupElement } from "./element.js";
import type { MarkupChild, Props } from "./types.js";
import { dashCase, escapeHtml, flatten, indent, isChildList } from "./util.js";

/** Elements that never have content and render as `<tag />`. */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

/**
 * Render any markup value. `null`, `undefined` and booleans render as nothing;
 * arrays render their items one per line.
 */
export function renderToString(value: MarkupChild): string {
  if (value === null || value === undefined || typeof value === "boolean") {
    return "";
  }
  if (isChildList(value)) {
    return renderChildren(value).join("\n");
  }
  if (value instanceof MarkupElement) {
    return renderElement(value);
  }
  return escapeHtml(String(value));
}

function renderElement(element: MarkupElement): string {
  const { tag, props, children } = element;
  if (tag === null) {
    return renderToString(children);
  }
  if (typeof tag === "string") {
    return renderIntrinsic(tag, props, children);
  }
  const component = new tag({ ...props, children });
  return renderToString(component.render());
}

function renderIntrinsic(tag: string, props: Props, children: readonly MarkupChild[]): string {
  const attributes = renderAttributes(props);
  const open = attributes ? `<${tag} ${attributes}` : `<${tag}`;
  const body = renderChildren(children);

  if (body.length === 0) {
    return VOID_ELEMENTS.has(tag) ? `${open} />` : `${open}></${tag}>`;
  }
  return `${open}>\n${body.map((child) => indent(child)).join("\n")}\n</${tag}>`;
}

function renderChildren(children: readonly MarkupChild[]): string[] {
  return flatten(children)
    .map(renderToString)
    .filter((text) => text !== "");
}

/**
 * Render props as HTML attributes.
 *
 * - `true` → bare attribute; `false`, `null`, `undefined` and functions are omitted
 * - objects → inline CSS (`{ marginTop: "1px" }` → `margin-top: 1px`)
 * - arrays → space-separated (`class={["a", "b"]}`)
 */
export function renderAttributes(props: Props): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(props)) {
    if (name === "children" || value === false || value === null || value === undefined) continue;
    if (typeof value === "function") continue;
    if (value === true) {
      parts.push(name);
      continue;
    }
    parts.push(`${name}="${escapeHtml(attributeText(value))}"`);
  }
  return parts.join(" ");
}

function attributeText(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(String).join(" ");
  }
  if (typeof value === "object" && value !== null) {
    return Object.entries(value)
      .filter(([, v]) => v !== null && v !== undefined)
      .map(([k, v]) => `${dashCase(k)}: ${String(v)}`)
      .join("; ");
  }
  return String(value);
}
