// src/batch.ts
import { z } from "zod";
import { GraphApiError } from "./errors.js";
import type { GraphParams, JsonValue } from "./types.js";
import { JsonValueSchema, toGraphParams } from "./utils.js";

// Upstream ceiling on sub-requests per batch call.
export const BATCH_SIZE_LIMIT = 50;

export type BatchItem = {
  method: "GET" | "POST";
  relative_url: string;
  /** Form-encoded fields of a POST sub-request. */
  body?: string;
};

export type BatchHeader = { name: string; value: string };

export type BatchResponse = {
  code: number;
  headers: BatchHeader[];
  /** Upstream JSON as delivered, a string body re-parsed when it parses, otherwise the raw string. */
  body: JsonValue;
};

/** The slice of MetaApi the coordinator needs; chunk calls go through its retry policy. */
export interface BatchPoster {
  post(path: string, data: GraphParams): Promise<JsonValue>;
}

const batchEntrySchema = z
  .object({
    code: z.number(),
    headers: z.array(z.object({ name: z.string(), value: z.string() })).nullish(),
    body: JsonValueSchema.optional(),
  })
  .nullable();

export function buildRelativePath(objectId: string, endpoint: string, params: GraphParams = {}): string {
  const path = endpoint ? `${objectId}/${endpoint}` : objectId;
  const { access_token: _token, ...rest } = toGraphParams(params);
  const query = new URLSearchParams(rest).toString();
  return query ? `${path}?${query}` : path;
}

export const batchGet = (objectId: string, endpoint: string, params: GraphParams = {}): BatchItem => ({
  method: "GET",
  relative_url: buildRelativePath(objectId, endpoint, params),
});

/** POST sub-request; like relative paths, the body never carries the credential. */
export function batchPost(objectId: string, endpoint: string, data: GraphParams): BatchItem {
  const { access_token: _token, ...rest } = toGraphParams(data);
  return {
    method: "POST",
    relative_url: buildRelativePath(objectId, endpoint),
    body: new URLSearchParams(rest).toString(),
  };
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export function parseBatchBody(body: string): JsonValue {
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

export const isBatchSuccess = (res: BatchResponse | null): res is BatchResponse =>
  res != null && res.code >= 200 && res.code < 300;

function toBatchResponse(entry: NonNullable<z.infer<typeof batchEntrySchema>>): BatchResponse {
  const body = entry.body ?? null;
  return {
    code: entry.code,
    headers: entry.headers ?? [],
    body: typeof body === "string" ? parseBatchBody(body) : body,
  };
}

/**
 * Sends `items` in positional chunks of BATCH_SIZE_LIMIT, one after another.
 * The Nth result answers the Nth item; a `null` result is a sub-request the
 * API did not complete. Non-2xx sub-responses are returned, not thrown. A
 * failed chunk call fails the whole operation.
 */
export async function executeBatch(api: BatchPoster, items: readonly BatchItem[]): Promise<(BatchResponse | null)[]> {
  const results: (BatchResponse | null)[] = [];

  for (const group of chunk(items, BATCH_SIZE_LIMIT)) {
    const batch = JSON.stringify(
      group.map(({ method, relative_url, body }) => (body != null ? { method, relative_url, body } : { method, relative_url }))
    );
    const raw = await api.post("/", { batch });

    if (!Array.isArray(raw) || raw.length !== group.length) {
      const got = Array.isArray(raw) ? `${raw.length}` : raw === null ? "null" : typeof raw;
      throw new GraphApiError(
        "GenericApiError",
        `Unexpected batch response: expected ${group.length} entries, got ${got}`,
        raw
      );
    }

    raw.forEach((item, i) => {
      const entry = batchEntrySchema.safeParse(item);
      if (!entry.success) {
        throw new GraphApiError("GenericApiError", `Unexpected batch response: malformed entry at index ${i}`, raw);
      }
      results.push(entry.data && toBatchResponse(entry.data));
    });
  }

  return results;
}
