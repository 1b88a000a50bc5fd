import type { Context } from "../core/context.js";

/**
 * Wildcard member of a method set. A symbol, so no request method string can
 * ever be mistaken for it.
 */
export const ANY_METHOD: unique symbol = Symbol("slugroute.any-method");

export type MethodKey = string | typeof ANY_METHOD;

export type Params = Record<string, string>;

/**
 * Which step of the resolution chain produced the handler for a request.
 */
export type RouteOutcome = "endpoint" | "fallback" | "default" | "not_found";

/**
 * Runtime handler signature used by the router.
 */
export type HandlerFunction = (ctx: Context) => Promise<Response> | Response;

/**
 * Generic Fetch API handler, as served by most JavaScript runtimes.
 */
export type FetchHandler = (request: Request) => Promise<Response> | Response;

export type RouteMatch =
  | {
      outcome: "endpoint" | "fallback" | "default";
      handler: HandlerFunction;
      params: Params;
    }
  | {
      outcome: "not_found";
      params: Params;
    };

export type RouteInfo = {
  pattern: string;
  methods: MethodKey[];
};
