import {
  ANY_METHOD,
  type HandlerFunction,
  type MethodKey,
  type Params,
  type RouteInfo,
  type RouteMatch,
  type RouteOutcome,
} from "../types/index.js";
import { Context, HttpError, type ErrorResponse } from "./context.js";
import { MethodSet } from "./methods.js";
import { Route } from "./route.js";
import { RouteTrie } from "./trie.js";

export type RequestEvent = {
  request: Request;
  method: string;
  path: string;
  startedAt: number;
  outcome?: RouteOutcome;
  params?: Params;
};

export type ResponseEvent = RequestEvent & {
  response: Response;
  durationMs: number;
};

export type ErrorEvent = RequestEvent & {
  error: unknown;
  durationMs: number;
};

export type RouterHooks = {
  onRequest?: (event: RequestEvent) => void | Promise<void>;
  onResponse?: (event: ResponseEvent) => void | Promise<void>;
  onError?: (event: ErrorEvent) => void | Promise<void>;
};

export type RouterOptions = {
  /** Percent-decode captured path segments. Defaults to `true`. */
  decodeParams?: boolean;
  hooks?: RouterHooks;
};

type ErrorBody = {
  status: number;
  message: string;
  code?: string | undefined;
  details?: unknown;
};

const BODY_MEMBERS = new Set<PropertyKey>([
  "body",
  "bodyUsed",
  "text",
  "json",
  "arrayBuffer",
  "blob",
  "formData",
  "bytes",
]);

/**
 * Wraps a request or response so that hooks reading its body read a lazily
 * made clone instead, leaving the original stream to the handler or caller.
 */
function createHookView<TMessage extends Request | Response>(
  message: TMessage,
  clone: (message: TMessage) => TMessage
): TMessage {
  if (!message.body) {
    return message;
  }

  let copy: TMessage | undefined;
  return new Proxy(message, {
    get: (target, prop) => {
      let source = target;
      if (BODY_MEMBERS.has(prop)) {
        if (!copy) {
          copy = clone(target);
        }
        source = copy;
      }
      const value: unknown = Reflect.get(source, prop, source);
      return typeof value === "function" ? value.bind(source) : value;
    },
  });
}

function cloneRequestForHook(request: Request): Request {
  try {
    return request.clone();
  } catch {
    // The body is already consumed; hooks still see the request line and headers.
    return new Request(request.url, { method: request.method, headers: request.headers });
  }
}

function cloneResponseForHook(response: Response): Response {
  try {
    return response.clone();
  } catch {
    return new Response(null, { status: response.status, headers: response.headers });
  }
}

function isValidStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 599;
}

/**
 * Trie-backed request router.
 *
 * Resolution order for a request:
 * - the handler registered on the node the path ends at
 * - the nearest catch-all on the way back up to `/`
 * - the router default for the method, then the wildcard default
 * - a built-in 404
 */
export class Router {
  private readonly trie: RouteTrie<HandlerFunction>;
  private readonly defaultHandlers = new Map<MethodKey, HandlerFunction>();
  private readonly hooks: RouterHooks;

  constructor(options: RouterOptions = {}) {
    this.trie = new RouteTrie({ decodeParams: options.decodeParams ?? true });
    this.hooks = options.hooks ?? {};
  }

  /**
   * Registers `handler` at `pattern` for every method in `methods`.
   * Throws `RouteDefinitionError` for malformed patterns; `""` is ignored.
   */
  handle(pattern: string, methods: MethodSet, handler: HandlerFunction): Route {
    return new Route(this.trie, this.trie.insert(pattern, methods, handler));
  }

  get(pattern: string, handler: HandlerFunction): Route {
    return this.handle(pattern, MethodSet.get(), handler);
  }

  post(pattern: string, handler: HandlerFunction): Route {
    return this.handle(pattern, MethodSet.post(), handler);
  }

  put(pattern: string, handler: HandlerFunction): Route {
    return this.handle(pattern, MethodSet.put(), handler);
  }

  delete(pattern: string, handler: HandlerFunction): Route {
    return this.handle(pattern, MethodSet.delete(), handler);
  }

  /** Registers `handler` for any method. */
  all(pattern: string, handler: HandlerFunction): Route {
    return this.handle(pattern, MethodSet.any(), handler);
  }

  /** Sets the handler used when nothing in the trie resolves a request. */
  default(methods: MethodSet, handler: HandlerFunction): this {
    for (const method of methods) {
      this.defaultHandlers.set(method, handler);
    }
    return this;
  }

  /** Resolves the single handler to run for `method` + `path`. */
  find(method: string, path: string): RouteMatch {
    const match = this.trie.lookup(method, path);
    if (match.outcome !== "miss") {
      return { outcome: match.outcome, handler: match.handler, params: match.params };
    }

    const fallback = this.defaultHandlers.get(method) ?? this.defaultHandlers.get(ANY_METHOD);
    if (fallback) {
      return { outcome: "default", handler: fallback, params: {} };
    }
    return { outcome: "not_found", params: {} };
  }

  /** Lists every endpoint with the method keys it has handlers for. */
  routes(): RouteInfo[] {
    return Array.from(this.trie.endpoints(), (node) => ({
      pattern: node.pattern,
      methods: [...node.handlers.keys()],
    }));
  }

  /**
   * Handles a Fetch API request end-to-end and returns a response.
   *
   * Hooks receive views of the request and response whose bodies are read
   * from clones, and a copy of the captures.
   */
  async fetch(request: Request): Promise<Response> {
    const trace: RequestEvent = {
      request: createHookView(request, cloneRequestForHook),
      method: request.method,
      path: request.url,
      startedAt: Date.now(),
    };

    try {
      const url = new URL(request.url);
      trace.path = url.pathname;
      await this.invokeHook(this.hooks.onRequest, { ...trace });

      const match = this.find(request.method, url.pathname);
      trace.outcome = match.outcome;
      trace.params = { ...match.params };

      if (match.outcome === "not_found") {
        const response = this.errorResponse({ status: 404, message: "Not Found", code: "ROUTE_NOT_FOUND" });
        await this.invokeResponseHook(trace, response);
        return response;
      }

      const ctx = new Context(request, {
        method: request.method,
        path: url.pathname,
        params: match.params,
        outcome: match.outcome,
      });
      const response = await match.handler(ctx);
      await this.invokeResponseHook(trace, response);
      return response;
    } catch (error: unknown) {
      await this.invokeHook(this.hooks.onError, {
        ...trace,
        error,
        durationMs: Date.now() - trace.startedAt,
      });

      const response = this.errorResponse(this.toErrorBody(error));
      await this.invokeResponseHook(trace, response);
      return response;
    }
  }

  private async invokeResponseHook(trace: RequestEvent, response: Response): Promise<void> {
    await this.invokeHook(this.hooks.onResponse, {
      ...trace,
      response: createHookView(response, cloneResponseForHook),
      durationMs: Date.now() - trace.startedAt,
    });
  }

  private async invokeHook<TEvent>(
    hook: ((event: TEvent) => void | Promise<void>) | undefined,
    event: TEvent
  ): Promise<void> {
    if (!hook) {
      return;
    }

    try {
      await hook(event);
    } catch {
      // Hook failures must never break request processing.
    }
  }

  private errorResponse({ status, message, code, details }: ErrorBody): Response {
    const payload: ErrorResponse = { error: message };
    if (code !== undefined) {
      payload.code = code;
    }
    if (details !== undefined) {
      payload.details = details;
    }
    return new Response(JSON.stringify(payload), {
      status: isValidStatus(status) ? status : 500,
      headers: { "content-type": "application/json" },
    });
  }

  /** Maps anything a handler throws onto the body of an error response. */
  private toErrorBody(error: unknown): ErrorBody {
    const fallbackMessage = "Internal Server Error";
    if (error instanceof HttpError) {
      return {
        status: error.status,
        message: error.message || fallbackMessage,
        code: error.code,
        details: error.details,
      };
    }
    return {
      status: 500,
      message: error instanceof Error && error.message ? error.message : fallbackMessage,
    };
  }
}

/** Creates a new router instance. */
export function createRouter(options?: RouterOptions): Router {
  return new Router(options);
}
