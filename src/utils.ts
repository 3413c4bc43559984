// src/utils.ts
import { z } from "zod";
import type { GraphParams, JsonObject, JsonValue } from "./types.js";

// Simple async sleep/backoff
export const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Flattens tool parameters into the string form the Graph API reads:
 * arrays and objects are JSON-encoded, null/undefined are dropped.
 * Insertion order is kept.
 */
export function toGraphParams(params: GraphParams): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(params)) {
    if (v == null) continue;
    if (typeof v === "object") out[k] = JSON.stringify(v);
    else out[k] = String(v);
  }
  return out;
}

/** Copy of `params` without null/undefined entries. */
export function compact<T extends GraphParams>(params: T): GraphParams {
  const out: GraphParams = {};
  for (const [k, v] of Object.entries(params)) {
    if (v != null) out[k] = v;
  }
  return out;
}

export const joinFields = (fields: readonly string[] | undefined, defaults: readonly string[]): string =>
  (fields?.length ? fields : defaults).join(",");

export const normalizeAccountId = (id: string): string => {
  const trimmed = id.trim();
  return trimmed.startsWith("act_") ? trimmed : `act_${trimmed}`;
};

export const DATE_PRESETS = [
  "today",
  "yesterday",
  "this_month",
  "last_month",
  "this_quarter",
  "lifetime",
  "last_3d",
  "last_7d",
  "last_14d",
  "last_28d",
  "last_30d",
  "last_90d",
  "last_week_mon_sun",
  "last_week_sun_sat",
  "last_quarter",
  "last_year",
  "this_week_mon_today",
  "this_week_sun_today",
  "this_year",
] as const;

export const isValidDatePreset = (preset: string | undefined): boolean =>
  preset != null && DATE_PRESETS.some((p) => p === preset);

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/** Turns literal "\uXXXX" sequences left in API strings into characters. */
export function decodeUnicodeEscapes(value: JsonValue): JsonValue {
  if (typeof value === "string") {
    return value.replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
  }
  if (Array.isArray(value)) return value.map(decodeUnicodeEscapes);
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) out[k] = decodeUnicodeEscapes(v);
    return out;
  }
  return value;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export const isJsonObject = (v: JsonValue | undefined): v is { [key: string]: JsonValue } =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** `data` array of a Graph list response, objects only. */
export function dataRows(body: JsonValue): { [key: string]: JsonValue }[] {
  if (!isJsonObject(body) || !Array.isArray(body.data)) return [];
  return body.data.filter(isJsonObject);
}
