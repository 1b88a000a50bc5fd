import type { FetchHandler, HandlerFunction, Params } from "../types/index.js";
import type { Router } from "./router.js";

const paramsByRequest = new WeakMap<Request, Params>();

/**
 * Adapts a plain Fetch handler to the router's handler signature.
 * The wrapped handler can read its captures with `routeParams(request)`.
 */
export function wrapFetch(handler: FetchHandler): HandlerFunction {
  return (ctx) => {
    paramsByRequest.set(ctx.request, ctx.params);
    return handler(ctx.request);
  };
}

/** Captures bound for `request` by a handler built with `wrapFetch`. */
export function routeParams(request: Request): Params {
  return paramsByRequest.get(request) ?? {};
}

/** Exposes a router as a plain Fetch handler. */
export function toFetchHandler(router: Router): FetchHandler {
  return (request) => router.fetch(request);
}
