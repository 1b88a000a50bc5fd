import http from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import type { Router } from "../core/router.js";

export type NodeServeOptions = {
  port?: number | string;
  hostname?: string;
};

const nodeServeOptionsSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  hostname: z.string().min(1).default("0.0.0.0"),
});

/** Converts a Node incoming request into a Web Standard Request. */
async function toRequest(req: IncomingMessage): Promise<Request> {
  const host = req.headers.host || "localhost";
  const url = `http://${host}${req.url ?? "/"}`;

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const body = Buffer.concat(chunks);

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach((v) => headers.append(key, v));
    } else if (typeof value === "string") {
      headers.set(key, value);
    }
  }

  const method = req.method || "GET";
  const requestInit: RequestInit = { method, headers };
  // GET/HEAD must not include a body.
  if (body.length > 0 && method !== "GET" && method !== "HEAD") {
    requestInit.body = new Uint8Array(body);
  }
  return new Request(url, requestInit);
}

/** Copies a Web Standard Response onto Node's response object. */
async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  res.statusMessage = response.statusText;

  // Repeated headers (set-cookie) are appended instead of overwritten.
  response.headers.forEach((value, key) => {
    const existing = res.getHeader(key);
    if (existing === undefined) {
      res.setHeader(key, value);
      return;
    }
    const values = Array.isArray(existing) ? existing : [String(existing)];
    res.setHeader(key, [...values, value]);
  });

  if (!response.body) {
    res.end();
    return;
  }

  const reader = response.body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      res.write(Buffer.from(value));
    }
    res.end();
  } finally {
    reader.releaseLock();
  }
}

/** Request listener that dispatches every Node request through `router`. */
export function createRequestListener(router: Router) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    try {
      const response = await router.fetch(await toRequest(req));
      await writeResponse(res, response);
    } catch (error) {
      console.error("Error handling request:", error);
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader("content-type", "application/json");
      }
      res.end(JSON.stringify({ error: "Internal Server Error" }));
    }
  };
}

/**
 * Starts a `node:http` server for `router`.
 * Throws a `ZodError` when the port or hostname is invalid.
 */
export function serve(router: Router, options: NodeServeOptions = {}): http.Server {
  const { port, hostname } = nodeServeOptionsSchema.parse(options);
  const listener = createRequestListener(router);

  const server = http.createServer((req, res) => {
    void listener(req, res);
  });

  server.listen(port, hostname, () => {
    const address = server.address();
    const boundPort = typeof address === "object" && address !== null ? address.port : port;
    console.log(`slugroute listening on http://${hostname}:${boundPort}`);
  });

  return server;
}
