import { z } from "zod";
import { buildErrorTable } from "./errors.js";
import type { MetaConfig } from "./types.js";
import { normalizeAccountId } from "./utils.js";

const codeList = z
  .string()
  .default("")
  .transform((raw, ctx) => {
    const codes: number[] = [];
    for (const part of raw.split(",").map((p) => p.trim()).filter(Boolean)) {
      const n = Number(part);
      if (!Number.isInteger(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an integer error code: ${part}` });
        return z.NEVER;
      }
      codes.push(n);
    }
    return codes;
  });

// dotenv leaves unset keys from a copied .env.example as ""
const blank = (v: unknown) => (v === "" ? undefined : v);

const envSchema = z.object({
  META_ACCESS_TOKEN: z.string().min(1, "META_ACCESS_TOKEN is required"),
  META_API_VERSION: z.preprocess(blank, z.string().default("v22.0")),
  META_GRAPH_URL: z.preprocess(blank, z.string().url().default("https://graph.facebook.com")),
  META_AD_ACCOUNT_ID: z.string().default(""),
  META_MAX_RETRIES: z.preprocess(blank, z.coerce.number().int().positive().default(3)),
  META_RETRY_UNIT_MS: z.preprocess(blank, z.coerce.number().int().nonnegative().default(1000)),
  META_REQUEST_TIMEOUT_MS: z.preprocess(blank, z.coerce.number().int().positive().default(30_000)),
  META_SERVER_ERROR_CODES: codeList,
});

export type ConfigResult = { ok: true; config: MetaConfig } | { ok: false; problems: string[] };

export function loadConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      problems: parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`),
    };
  }

  const e = parsed.data;
  return {
    ok: true,
    config: {
      accessToken: e.META_ACCESS_TOKEN,
      adAccountId: e.META_AD_ACCOUNT_ID ? normalizeAccountId(e.META_AD_ACCOUNT_ID) : "",
      apiVersion: e.META_API_VERSION,
      graphUrl: e.META_GRAPH_URL,
      maxRetries: e.META_MAX_RETRIES,
      retryUnitMs: e.META_RETRY_UNIT_MS,
      requestTimeoutMs: e.META_REQUEST_TIMEOUT_MS,
      errorTable: buildErrorTable(e.META_SERVER_ERROR_CODES),
    },
  };
}
