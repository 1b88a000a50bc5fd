import test from "node:test";
import assert from "node:assert/strict";
import { compilePattern, RouteDefinitionError } from "../src/index.js";

test("empty pattern is ignored and a lone slash is the root", () => {
  assert.deepEqual(compilePattern(""), { kind: "ignored" });
  assert.deepEqual(compilePattern("/"), { kind: "root" });
});

test("literal and parameter segments compile in order", () => {
  assert.deepEqual(compilePattern("/a/{b}/c"), {
    kind: "path",
    segments: [
      { kind: "literal", text: "a" },
      { kind: "param", name: "b" },
      { kind: "literal", text: "c" },
    ],
  });
});

test("leading slash is optional", () => {
  assert.deepEqual(compilePattern("a/b"), compilePattern("/a/b"));
});

test("trailing and doubled slashes become slash segments", () => {
  assert.deepEqual(compilePattern("/slug1/"), {
    kind: "path",
    segments: [{ kind: "literal", text: "slug1" }, { kind: "slash" }],
  });
  assert.deepEqual(compilePattern("/slug1//slug1.1"), {
    kind: "path",
    segments: [
      { kind: "literal", text: "slug1" },
      { kind: "slash" },
      { kind: "literal", text: "slug1.1" },
    ],
  });
});

test("unclosed parameter brace is rejected with the offending pattern", () => {
  assert.throws(
    () => compilePattern("/users/{id"),
    (error: unknown) =>
      error instanceof RouteDefinitionError &&
      error.pattern === "/users/{id" &&
      error.message === "Missing closing brace in pattern: /users/{id"
  );
});

test("empty parameter name is rejected", () => {
  assert.throws(() => compilePattern("/{}"), {
    name: "RouteDefinitionError",
    message: "Empty parameter name in pattern: /{}",
  });
});
