import type { FlatChild, MarkupChild } from "./types.js";

export function isChildList(child: MarkupChild): child is readonly MarkupChild[] {
  return Array.isArray(child);
}

/**
 * Flatten nested child arrays, keeping order.
 */
export function flatten(children: readonly MarkupChild[]): FlatChild[] {
  const result: FlatChild[] = [];
  for (const child of children) {
    if (isChildList(child)) {
      result.push(...flatten(child));
    } else {
      result.push(child);
    }
  }
  return result;
}

/** Indent every line of `text`. */
export function indent(text: string, spaces = 4): string {
  const pad = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => pad + line)
    .join("\n");
}

const CAMEL_CASE = /(?<!^)(?=[A-Z])/g;

/** `backgroundColor` → `background-color` */
export function dashCase(name: string): string {
  return name.replace(CAMEL_CASE, "-").toLowerCase();
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
