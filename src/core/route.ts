import type { HandlerFunction, MethodKey } from "../types/index.js";
import type { MethodSet } from "./methods.js";
import type { RouteNode } from "./node.js";
import type { RouteTrie } from "./trie.js";

/**
 * Handle to the node a registration call landed on.
 *
 * Only annotates that node; it never creates new ones. Registering the empty
 * pattern yields a detached handle whose setters do nothing.
 */
export class Route {
  constructor(
    private readonly trie: RouteTrie<HandlerFunction>,
    private readonly node: RouteNode<HandlerFunction> | undefined
  ) {}

  get attached(): boolean {
    return this.node !== undefined;
  }

  /** Pattern text of this route, e.g. `/users/{id}`; `""` when detached. */
  get pattern(): string {
    return this.node?.pattern ?? "";
  }

  /** Methods accepted when a request reaches this route. */
  get methods(): MethodKey[] {
    return this.node ? [...this.node.allowedMethods] : [];
  }

  /**
   * Serves requests for `methods` that reach this route but match nothing
   * more specific beneath it.
   */
  catchAll(methods: MethodSet, handler: HandlerFunction): this {
    if (this.node) {
      this.trie.setFallback(this.node, methods, handler);
    }
    return this;
  }

  /** Like `catchAll`, reusing the handler registered on this route. */
  matchAny(methods: MethodSet): this {
    if (this.node) {
      this.trie.setFallback(this.node, methods);
    }
    return this;
  }
}
