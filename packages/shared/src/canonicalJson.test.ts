import { test } from "node:test";
import assert from "node:assert/strict";
import { canonicalizeJson, canonicalJsonEquals } from "./canonicalJson.js";

test("canonical JSON sorts keys at every depth", () => {
  assert.equal(
    canonicalizeJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: true } }),
    '{"a":{"c":true,"d":[{"y":2,"z":1}]},"b":1}'
  );
});

test("canonical JSON equality ignores key order but not array order", () => {
  assert.equal(canonicalJsonEquals({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 }), true);
  assert.equal(canonicalJsonEquals({ a: 1, b: [1, 2] }, { a: 1, b: [2, 1] }), false);
});
