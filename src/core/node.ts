import { ANY_METHOD, type MethodKey } from "../types/index.js";
import { MethodSet } from "./methods.js";

export type RouteNodeKind = "root" | "literal" | "slash" | "param";

/**
 * Catch-all entry stored per method on a node.
 * `endpoint` reuses the node's own handler; `handler` carries its own.
 */
export type FallbackEntry<THandler> =
  | { kind: "endpoint" }
  | { kind: "handler"; handler: THandler };

/**
 * One position in the routing trie.
 *
 * Literal and slash children share `children`, keyed by segment text (`""` for
 * a slash child). The parameter child, if any, is kept apart and is only tried
 * after the literal lookup misses.
 */
export class RouteNode<THandler> {
  readonly children = new Map<string, RouteNode<THandler>>();
  paramChild: RouteNode<THandler> | undefined;

  readonly handlers = new Map<MethodKey, THandler>();
  readonly fallbacks = new Map<MethodKey, FallbackEntry<THandler>>();

  constructor(
    readonly kind: RouteNodeKind,
    readonly name: string,
    readonly allowedMethods: MethodSet,
    readonly parent?: RouteNode<THandler>
  ) {}

  static root<THandler>(): RouteNode<THandler> {
    return new RouteNode<THandler>("root", "/", new MethodSet());
  }

  get slashChild(): RouteNode<THandler> | undefined {
    return this.children.get("");
  }

  /** True when at least one handler is attached directly to this node. */
  get isEndpoint(): boolean {
    return this.handlers.size > 0;
  }

  getHandler(method: string): THandler | undefined {
    return this.handlers.get(method) ?? this.handlers.get(ANY_METHOD);
  }

  /**
   * Resolves this node's catch-all for `method`, method-specific entry first.
   * An `endpoint` entry on a node without a matching handler resolves to nothing.
   */
  getFallback(method: string): THandler | undefined {
    const entry = this.fallbacks.get(method) ?? this.fallbacks.get(ANY_METHOD);
    if (!entry) {
      return undefined;
    }
    return entry.kind === "handler" ? entry.handler : this.getHandler(method);
  }

  /** Pattern text leading to this node, e.g. `/users/{id}/`. */
  get pattern(): string {
    const labels: string[] = [];
    let node: RouteNode<THandler> = this;
    while (node.parent) {
      labels.unshift(node.kind === "param" ? `{${node.name}}` : node.name);
      node = node.parent;
    }
    return `/${labels.join("/")}`;
  }
}
