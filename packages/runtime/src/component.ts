import type { ComponentProps, MarkupChild, Props, Renderable } from "./types.js";

/**
 * Base class for components. The renderer constructs the class with the
 * element's props plus `children`, then renders whatever `render()` returns.
 *
 * @example
 * ```typescript
 * class Greeting extends Component<{ name: string }> {
 *   render() {
 *     return h("p", {}, [`Hello, ${this.props.name}`]);
 *   }
 * }
 * ```
 */
export abstract class Component<P extends Props = Props> implements Renderable {
  constructor(readonly props: ComponentProps<P>) {}

  abstract render(): MarkupChild;
}

/** Renders its children with no wrapper element. */
export class Fragment extends Component {
  render(): MarkupChild {
    return this.props.children;
  }
}
