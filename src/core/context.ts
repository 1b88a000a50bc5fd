import { z } from "zod";
import type { Params, RouteOutcome } from "../types/index.js";

export type ErrorResponse<TDetails = unknown> = {
  error: string;
  code?: string;
  details?: TDetails;
};

export type HttpErrorOptions<TDetails = unknown> = {
  code?: string;
  details?: TDetails;
};

export class HttpError<TDetails = unknown> extends Error {
  public readonly status: number;
  public readonly code: string | undefined;
  public readonly details: TDetails | undefined;

  constructor(status: number, message: string, options: HttpErrorOptions<TDetails> = {}) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = options.code;
    this.details = options.details;
  }
}

export type ContextInit = {
  method: string;
  path: string;
  params: Params;
  outcome: RouteOutcome;
};

/**
 * Request/response context passed to route handlers.
 *
 * `params` holds the captures bound while walking the trie; it is empty for
 * requests served by a default or the built-in not-found response.
 */
export class Context {
  public readonly method: string;
  public readonly path: string;
  public readonly params: Params;
  public readonly outcome: RouteOutcome;

  private responseHeaders: Headers = new Headers();

  constructor(
    public readonly request: Request,
    init: ContextInit
  ) {
    this.method = init.method;
    this.path = init.path;
    this.params = init.params;
    this.outcome = init.outcome;
  }

  /** Sets/overwrites a header to be included in helper-generated responses. */
  setHeader(name: string, value: string): void {
    this.responseHeaders.set(name, value);
  }

  json<T>(status: number, data: T): Response {
    return this.respond(status, JSON.stringify(data), "application/json");
  }

  text(status: number, text: string): Response {
    return this.respond(status, text, "text/plain; charset=utf-8");
  }

  html(status: number, html: string): Response {
    return this.respond(status, html, "text/html; charset=utf-8");
  }

  /** Status-only response, e.g. `ctx.empty(204)`. */
  empty(status: number): Response {
    return new Response(null, { status, headers: new Headers(this.responseHeaders) });
  }

  redirect(url: string, status: number = 302): Response {
    const headers = new Headers(this.responseHeaders);
    headers.set("location", url);
    return new Response(null, { status, headers });
  }

  readText(): Promise<string> {
    return this.request.text();
  }

  /**
   * Reads the body as JSON. With a zod schema the payload is validated and
   * the parsed output returned; failures surface as 400 `HttpError`s.
   */
  async readJson(): Promise<unknown>;
  async readJson<TSchema extends z.ZodType>(schema: TSchema): Promise<z.output<TSchema>>;
  async readJson(schema?: z.ZodType): Promise<unknown> {
    const data = parseJson(await this.request.text());
    if (!data.success) {
      throw this.error(400, "Invalid JSON", { code: "INVALID_JSON" });
    }
    if (!schema) {
      return data.value;
    }

    const result = schema.safeParse(data.value);
    if (!result.success) {
      throw this.error(400, "Invalid body", { code: "INVALID_BODY", details: result.error.issues });
    }
    return result.data;
  }

  /** Creates an Error object carrying an HTTP status for upstream catch handling. */
  error<TDetails = unknown>(
    status: number,
    message: string,
    options?: HttpErrorOptions<TDetails>
  ): HttpError<TDetails> {
    return new HttpError(status, message, options);
  }

  /** Throws an HttpError for concise early exits from handlers. */
  fail<TDetails = unknown>(
    status: number,
    message: string,
    options?: HttpErrorOptions<TDetails>
  ): never {
    throw this.error(status, message, options);
  }

  private respond(status: number, body: string, contentType: string): Response {
    const headers = new Headers(this.responseHeaders);
    headers.set("content-type", contentType);
    return new Response(body, { status, headers });
  }
}

function parseJson(raw: string): { success: true; value: unknown } | { success: false } {
  try {
    return { success: true, value: JSON.parse(raw) };
  } catch {
    return { success: false };
  }
}
