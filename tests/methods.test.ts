import test from "node:test";
import assert from "node:assert/strict";
import { ANY_METHOD, MethodSet } from "../src/index.js";

test("presets hold exactly their own method", () => {
  const methods = MethodSet.get();

  assert.equal(methods.size, 1);
  assert.equal(methods.has("GET"), true);
  assert.equal(methods.has("POST"), false);
  assert.equal(MethodSet.delete().has("DELETE"), true);
});

test("constructing from a list collapses duplicates", () => {
  const methods = new MethodSet(["GET", "GET", "POST"]);

  assert.equal(methods.size, 2);
  assert.deepEqual(new Set(methods), new Set(["GET", "POST"]));
});

test("wildcard member accepts every method only through hasOrAny", () => {
  const methods = MethodSet.any();

  assert.equal(methods.has(ANY_METHOD), true);
  assert.equal(methods.has("PATCH"), false);
  assert.equal(methods.hasOrAny("PATCH"), true);
  assert.equal(MethodSet.get().hasOrAny("PATCH"), false);
});

test("builders chain on the same instance", () => {
  const methods = MethodSet.get().post().put();
  methods.remove("GET");

  assert.deepEqual(new Set(methods), new Set(["POST", "PUT"]));
});

test("copy is independent of its source", () => {
  const source = MethodSet.get();
  const copy = source.copy().add("POST");

  assert.equal(source.has("POST"), false);
  assert.equal(copy.has("GET"), true);
  assert.equal(copy.has("POST"), true);
});

test("merge unions another set in place", () => {
  const methods = MethodSet.get();
  const returned = methods.merge(MethodSet.of("POST", "GET", ANY_METHOD));

  assert.equal(returned, methods);
  assert.deepEqual(new Set(methods), new Set(["GET", "POST", ANY_METHOD]));
});
