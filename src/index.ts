// Types
export {
  ANY_METHOD,
  type MethodKey,
  type Params,
  type RouteOutcome,
  type HandlerFunction,
  type FetchHandler,
  type RouteMatch,
  type RouteInfo,
} from "./types/index.js";

// Core
export { MethodSet } from "./core/methods.js";
export { compilePattern, RouteDefinitionError, type PatternSegment, type CompiledPattern } from "./core/pattern.js";
export { RouteNode, type RouteNodeKind, type FallbackEntry } from "./core/node.js";
export { RouteTrie, type RouteTrieOptions, type TrieMatch } from "./core/trie.js";
export { Route } from "./core/route.js";
export {
  createRouter,
  Router,
  type RouterHooks,
  type RouterOptions,
  type RequestEvent,
  type ResponseEvent,
  type ErrorEvent,
} from "./core/router.js";
export { wrapFetch, routeParams, toFetchHandler } from "./core/handler.js";
export {
  Context,
  HttpError,
  type ContextInit,
  type ErrorResponse,
  type HttpErrorOptions,
} from "./core/context.js";

// Zod re-export for readJson schemas
export { z } from "zod";
