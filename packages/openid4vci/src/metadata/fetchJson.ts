import type { z } from "zod";
import { MetadataResolutionError } from "../errors.js";
import type { HttpGet } from "../http/httpGet.js";
import type { HttpsUrl } from "../types.js";

export const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

// Fetches a metadata document and validates it against `schema`.
export const fetchMetadata = async <S extends z.ZodTypeAny>(
  httpGet: HttpGet,
  url: HttpsUrl,
  schema: S
): Promise<z.output<S>> => {
  let body: string;
  try {
    body = await httpGet.get(url);
  } catch (error) {
    throw new MetadataResolutionError("fetch_failed", url, { cause: error });
  }
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MetadataResolutionError("malformed_json", url, { cause: error });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new MetadataResolutionError("invalid_metadata", url, {
      cause: parsed.error,
      details: formatIssues(parsed.error)
    });
  }
  return parsed.data;
};
