import { test } from "node:test";
import assert from "node:assert/strict";
import { toHttpsUrl } from "../types.js";
import { createFetchHttpGet } from "./httpGet.js";

const url = toHttpsUrl("https://issuer.example.com/.well-known/openid-credential-issuer");

test("fetch http get returns the body of a successful response", async (t) => {
  const requests: Array<{ url: string; headers: RequestInit["headers"]; hasSignal: boolean }> = [];
  t.mock.method(globalThis, "fetch", async (input: string, init: RequestInit) => {
    requests.push({
      url: input,
      headers: init.headers,
      hasSignal: init.signal instanceof AbortSignal
    });
    return new Response('{"credential_issuer":"https://issuer.example.com"}', { status: 200 });
  });

  const httpGet = createFetchHttpGet({ headers: { "accept-language": "en-US" } });
  const body = await httpGet.get(url);

  assert.equal(body, '{"credential_issuer":"https://issuer.example.com"}');
  assert.deepEqual(requests, [
    {
      url: "https://issuer.example.com/.well-known/openid-credential-issuer",
      headers: { accept: "application/json", "accept-language": "en-US" },
      hasSignal: true
    }
  ]);
});

test("fetch http get rejects on a non-success status", async (t) => {
  t.mock.method(globalThis, "fetch", async () => new Response("unavailable", { status: 503 }));
  const httpGet = createFetchHttpGet();
  await assert.rejects(httpGet.get(url), { message: "HTTP 503" });
});

test("fetch http get propagates network failures", async (t) => {
  t.mock.method(globalThis, "fetch", async () => {
    throw new TypeError("fetch failed");
  });
  const httpGet = createFetchHttpGet();
  await assert.rejects(httpGet.get(url), { name: "TypeError", message: "fetch failed" });
});

test("fetch http get validates its options", () => {
  assert.throws(() => createFetchHttpGet({ timeoutMs: 0 }));
  assert.throws(() => createFetchHttpGet({ timeoutMs: 1.5 }));
});
