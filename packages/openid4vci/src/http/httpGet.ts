import { z } from "zod";
import type { HttpsUrl } from "../types.js";

// The only network seam of the library. A rejected promise is a failed fetch.
export type HttpGet = {
  get(url: HttpsUrl): Promise<string>;
};

const FetchHttpGetOptionsSchema = z.object({
  timeoutMs: z.number().int().positive().default(10_000),
  headers: z.record(z.string(), z.string()).default({})
});

export type FetchHttpGetOptions = z.input<typeof FetchHttpGetOptionsSchema>;

export const createFetchHttpGet = (input: FetchHttpGetOptions = {}): HttpGet => {
  const options = FetchHttpGetOptionsSchema.parse(input);
  return {
    async get(url) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort("http_get_timeout"), options.timeoutMs);
      timeout.unref?.();
      try {
        const response = await fetch(url, {
          method: "GET",
          headers: { accept: "application/json", ...options.headers },
          signal: controller.signal
        });
        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }
        return await response.text();
      } finally {
        clearTimeout(timeout);
      }
    }
  };
};
