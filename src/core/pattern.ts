/**
 * Thrown while registering a route whose pattern cannot be compiled.
 * Registration is the only place this can happen; dispatch never throws it.
 */
export class RouteDefinitionError extends Error {
  public readonly pattern: string;

  constructor(pattern: string, message: string) {
    super(`${message}: ${pattern}`);
    this.name = "RouteDefinitionError";
    this.pattern = pattern;
  }
}

export type PatternSegment =
  | { kind: "literal"; text: string }
  | { kind: "slash" }
  | { kind: "param"; name: string };

export type CompiledPattern =
  | { kind: "ignored" }
  | { kind: "root" }
  | { kind: "path"; segments: PatternSegment[] };

/**
 * Compiles a route pattern such as `/users/{id}/posts/` into segments.
 *
 * - `""` compiles to `ignored`; `"/"` to the root itself.
 * - one leading slash is dropped, the rest is split on `/`.
 * - an empty segment (`//` or a trailing slash) is a `slash` segment, so
 *   `/a` and `/a/` compile differently.
 */
export function compilePattern(pattern: string): CompiledPattern {
  if (pattern === "") {
    return { kind: "ignored" };
  }
  if (pattern === "/") {
    return { kind: "root" };
  }

  const body = pattern.startsWith("/") ? pattern.slice(1) : pattern;
  const segments = body.split("/").map((segment) => compileSegment(pattern, segment));
  return { kind: "path", segments };
}

function compileSegment(pattern: string, segment: string): PatternSegment {
  if (segment === "") {
    return { kind: "slash" };
  }
  if (!segment.startsWith("{")) {
    return { kind: "literal", text: segment };
  }
  if (!segment.endsWith("}")) {
    throw new RouteDefinitionError(pattern, "Missing closing brace in pattern");
  }

  const name = segment.slice(1, -1);
  if (name === "") {
    throw new RouteDefinitionError(pattern, "Empty parameter name in pattern");
  }
  return { kind: "param", name };
}
