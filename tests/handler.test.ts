import test from "node:test";
import assert from "node:assert/strict";
import { createRouter, routeParams, toFetchHandler, wrapFetch } from "../src/index.js";

test("wrapped fetch handlers read captures through routeParams", async () => {
  const router = createRouter();
  router.get(
    "/files/{name}",
    wrapFetch((request) => new Response(`${request.method} file ${routeParams(request)["name"]}`))
  );

  const response = await router.fetch(new Request("http://localhost/files/a.txt"));
  assert.equal(await response.text(), "GET file a.txt");
});

test("routeParams is empty for requests the router never saw", () => {
  assert.deepEqual(routeParams(new Request("http://localhost/elsewhere")), {});
});

test("router exposed as a fetch handler dispatches like router.fetch", async () => {
  const router = createRouter();
  router.post("/ping", (ctx) => ctx.text(200, "pong"));
  const handler = toFetchHandler(router);

  const ok = await handler(new Request("http://localhost/ping", { method: "POST" }));
  const missing = await handler(new Request("http://localhost/ping"));
  assert.equal(await ok.text(), "pong");
  assert.equal(missing.status, 404);
});
