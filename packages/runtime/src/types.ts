/**
 * Types shared by the element constructor and the renderer
 */

import type { MarkupElement } from "./element.js";

/** Attribute or component properties, keyed by attribute name. */
export type Props = Record<string, unknown>;

/**
 * Anything that can appear as a child. Nested arrays (from holes such as
 * `{items.map(...)}`) are flattened by the element constructor.
 */
export type MarkupChild =
  | MarkupElement
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | readonly MarkupChild[];

/** A child after flattening. */
export type FlatChild = Exclude<MarkupChild, readonly MarkupChild[]>;

/** Properties a component is constructed with; `children` is always present. */
export type ComponentProps<P extends Props = Props> = P & { children: readonly MarkupChild[] };

/**
 * Capability of a component instance: readable props and a `render()` that
 * produces further markup.
 */
export interface Renderable {
  readonly props: ComponentProps;
  render(): MarkupChild;
}

export type ComponentType<P extends Props = Props> = new (props: ComponentProps<P>) => Renderable;

/**
 * Element tag: an intrinsic name, a component, or `null` for a fragment.
 */
export type Tag = string | ComponentType | null;
