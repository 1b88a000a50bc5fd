import type { MethodKey, Params } from "../types/index.js";
import type { MethodSet } from "./methods.js";
import { RouteNode, type FallbackEntry } from "./node.js";
import { compilePattern, RouteDefinitionError, type PatternSegment } from "./pattern.js";

export type RouteTrieOptions = {
  /** Percent-decode captured segments. Defaults to `true`. */
  decodeParams?: boolean;
};

export type TrieMatch<THandler> =
  | {
      outcome: "endpoint" | "fallback";
      handler: THandler;
      params: Params;
      node: RouteNode<THandler>;
    }
  | {
      outcome: "miss";
      params: Params;
    };

/**
 * Where the walk stopped relative to the node handed to the fallback resolver:
 * - `exact`: the request ends at that node.
 * - `beneath`: the request continues below that node.
 * - `trailing`: the only segment left was the request's trailing empty one.
 */
type StopPosition = "exact" | "beneath" | "trailing";

/**
 * Segment trie holding route patterns and their handlers.
 *
 * Registration builds nodes lazily; lookup is read-only and allocates a fresh
 * params object per call.
 */
export class RouteTrie<THandler> {
  readonly root: RouteNode<THandler> = RouteNode.root<THandler>();
  private readonly decodeParams: boolean;

  constructor(options: RouteTrieOptions = {}) {
    this.decodeParams = options.decodeParams ?? true;
  }

  /**
   * Registers `handler` for every method in `methods` at the node for `pattern`.
   * Returns that node, or `undefined` for the ignored empty pattern.
   */
  insert(pattern: string, methods: MethodSet, handler: THandler): RouteNode<THandler> | undefined {
    const compiled = compilePattern(pattern);
    if (compiled.kind === "ignored") {
      return undefined;
    }

    let node = this.root;
    if (compiled.kind === "root") {
      node.allowedMethods.merge(methods);
    } else {
      for (const segment of compiled.segments) {
        node = this.descend(pattern, node, segment, methods);
      }
    }

    for (const method of methods) {
      node.handlers.set(method, handler);
    }
    return node;
  }

  /**
   * Marks `node` as a catch-all for `methods`. Without a handler the node's own
   * endpoint handler serves the fallback.
   */
  setFallback(node: RouteNode<THandler>, methods: Iterable<MethodKey>, handler?: THandler): void {
    const entry: FallbackEntry<THandler> =
      handler === undefined ? { kind: "endpoint" } : { kind: "handler", handler };
    for (const method of methods) {
      node.fallbacks.set(method, entry);
    }
  }

  /** Resolves `method` + `path` to an endpoint, a catch-all, or a miss. */
  lookup(method: string, path: string): TrieMatch<THandler> {
    const params: Params = {};
    const rest = path.startsWith("/") ? path.slice(1) : path;
    const segments = rest === "" ? [] : rest.split("/");
    const lastIndex = segments.length - 1;

    let node = this.root;
    for (const [index, segment] of segments.entries()) {
      const literal = node.children.get(segment);
      if (literal) {
        if (!literal.allowedMethods.hasOrAny(method)) {
          return this.fallback(literal, method, params, index === lastIndex ? "exact" : "beneath");
        }
        node = literal;
        continue;
      }

      // Empty segments only ever match slash nodes.
      const param = segment === "" ? undefined : node.paramChild;
      if (param && param.allowedMethods.hasOrAny(method)) {
        params[param.name] = this.decode(segment);
        node = param;
        continue;
      }

      const trailing = index === lastIndex && segment === "";
      return this.fallback(node, method, params, trailing ? "trailing" : "beneath");
    }

    const handler = node.getHandler(method);
    if (handler !== undefined) {
      return { outcome: "endpoint", handler, params, node };
    }
    return this.fallback(node, method, params, "exact");
  }

  /** Yields every endpoint node, parents before children. */
  *endpoints(): Generator<RouteNode<THandler>> {
    const stack: RouteNode<THandler>[] = [this.root];
    let current = stack.pop();
    while (current) {
      if (current.isEndpoint) {
        yield current;
      }
      const next = [...current.children.values()];
      if (current.paramChild) {
        next.push(current.paramChild);
      }
      stack.push(...next.reverse());
      current = stack.pop();
    }
  }

  private descend(
    pattern: string,
    parent: RouteNode<THandler>,
    segment: PatternSegment,
    methods: MethodSet
  ): RouteNode<THandler> {
    if (segment.kind === "param") {
      const existing = parent.paramChild;
      if (existing && existing.name !== segment.name) {
        throw new RouteDefinitionError(
          pattern,
          `Parameter {${segment.name}} conflicts with {${existing.name}} at the same position`
        );
      }
      if (existing) {
        existing.allowedMethods.merge(methods);
        return existing;
      }
      const created = new RouteNode<THandler>("param", segment.name, methods.copy(), parent);
      parent.paramChild = created;
      return created;
    }

    const key = segment.kind === "slash" ? "" : segment.text;
    const existing = parent.children.get(key);
    if (existing) {
      existing.allowedMethods.merge(methods);
      return existing;
    }
    const created = new RouteNode<THandler>(segment.kind, key, methods.copy(), parent);
    parent.children.set(key, created);
    return created;
  }

  /**
   * Walks from `start` up to the root looking for a catch-all.
   *
   * A slash child (`/x/`) owns everything nested under `/x/`, so it is asked
   * before `/x` itself unless the request ends exactly at `/x`. Once the walk
   * is at or under a slash node, the parent `/x` is never asked.
   */
  private fallback(
    start: RouteNode<THandler>,
    method: string,
    params: Params,
    position: StopPosition
  ): TrieMatch<THandler> {
    let node: RouteNode<THandler> | undefined = start;
    let previous: RouteNode<THandler> | undefined;
    let stop = position;

    while (node) {
      const skip = stop === "trailing" || previous?.kind === "slash";
      if (!skip) {
        const candidates =
          stop === "exact" ? [node, node.slashChild] : [node.slashChild, node];
        for (const candidate of candidates) {
          const handler = candidate?.getFallback(method);
          if (candidate && handler !== undefined) {
            return { outcome: "fallback", handler, params, node: candidate };
          }
        }
      }

      previous = node;
      node = node.parent;
      stop = "beneath";
    }

    return { outcome: "miss", params: {} };
  }

  private decode(segment: string): string {
    if (!this.decodeParams) {
      return segment;
    }
    try {
      return decodeURIComponent(segment);
    } catch {
      // Malformed escapes are captured as-is.
      return segment;
    }
  }
}
