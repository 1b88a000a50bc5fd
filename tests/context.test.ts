import test from "node:test";
import assert from "node:assert/strict";
import { Context, HttpError, z } from "../src/index.js";

function createContext(init: RequestInit = {}): Context {
  return new Context(new Request("http://localhost/users", init), {
    method: init.method ?? "GET",
    path: "/users",
    params: {},
    outcome: "endpoint",
  });
}

test("response helpers apply content type and queued headers", async () => {
  const ctx = createContext();
  ctx.setHeader("x-trace", "abc");

  const json = ctx.json(201, { ok: true });
  assert.equal(json.status, 201);
  assert.equal(json.headers.get("content-type"), "application/json");
  assert.equal(json.headers.get("x-trace"), "abc");
  assert.equal(await json.text(), '{"ok":true}');

  const html = ctx.html(200, "<p>hi</p>");
  assert.equal(html.headers.get("content-type"), "text/html; charset=utf-8");
  assert.equal(await html.text(), "<p>hi</p>");
});

test("empty and redirect responses carry no body", async () => {
  const ctx = createContext();

  const empty = ctx.empty(204);
  assert.equal(empty.status, 204);
  assert.equal(empty.body, null);

  const redirect = ctx.redirect("/login");
  assert.equal(redirect.status, 302);
  assert.equal(redirect.headers.get("location"), "/login");
});

test("readJson validates the body with a zod schema", async () => {
  const schema = z.object({ name: z.string(), age: z.number() });
  const ctx = createContext({ method: "POST", body: JSON.stringify({ name: "ada", age: 36 }) });

  assert.deepEqual(await ctx.readJson(schema), { name: "ada", age: 36 });
});

test("readJson rejects payloads the schema does not accept", async () => {
  const schema = z.object({ name: z.string(), age: z.number() });
  const ctx = createContext({ method: "POST", body: JSON.stringify({ name: "ada", age: "old" }) });

  await assert.rejects(ctx.readJson(schema), (error: unknown) => {
    assert.ok(error instanceof HttpError);
    assert.equal(error.status, 400);
    assert.equal(error.code, "INVALID_BODY");
    assert.ok(Array.isArray(error.details));
    assert.deepEqual(error.details[0]?.path, ["age"]);
    return true;
  });
});

test("readJson rejects malformed JSON", async () => {
  const ctx = createContext({ method: "POST", body: "{nope" });

  await assert.rejects(ctx.readJson(), { name: "HttpError", status: 400, code: "INVALID_JSON" });
});

test("readText returns the raw body", async () => {
  const ctx = createContext({ method: "POST", body: "plain body" });

  assert.equal(await ctx.readText(), "plain body");
});

test("fail throws an HttpError with status and code", () => {
  const ctx = createContext();

  assert.throws(() => ctx.fail(403, "Forbidden", { code: "NO_ACCESS" }), {
    name: "HttpError",
    message: "Forbidden",
    status: 403,
    code: "NO_ACCESS",
  });
});
