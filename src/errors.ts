// src/errors.ts
import type { ErrorPayload, GraphParams } from "./types.js";

export type FailureKind =
  | "ServerError"
  | "RateLimited"
  | "AuthenticationError"
  | "NotFound"
  | "GenericApiError";

/** The `error` object of a Graph API error response. */
export type GraphErrorBody = {
  message?: string;
  type?: string;
  code?: number;
  error_subcode?: number;
  error_user_title?: string;
  error_user_msg?: string;
  fbtrace_id?: string;
};

export type ErrorCodeTable = ReadonlyMap<number, FailureKind>;

export const DEFAULT_ERROR_TABLE: ErrorCodeTable = new Map<number, FailureKind>([
  [4, "RateLimited"],
  [17, "RateLimited"],
  [190, "AuthenticationError"],
  [102, "AuthenticationError"],
  [104, "AuthenticationError"],
  [803, "NotFound"],
]);

// Codes some API revisions report for transient faults. Off unless configured.
export const SERVER_ERROR_CODES: readonly number[] = [1, 2, 3, 100];

/**
 * Default table plus the given codes mapped to ServerError.
 * Codes already in the default table keep their kind.
 */
export function buildErrorTable(serverErrorCodes: readonly number[] = []): ErrorCodeTable {
  const table = new Map(DEFAULT_ERROR_TABLE);
  for (const code of serverErrorCodes) {
    if (!table.has(code)) table.set(code, "ServerError");
  }
  return table;
}

export const classify = (code: number | undefined, table: ErrorCodeTable = DEFAULT_ERROR_TABLE): FailureKind =>
  (code != null ? table.get(code) : undefined) ?? "GenericApiError";

export class GraphApiError extends Error {
  /** Attempts made before this failure surfaced; set by withRetry. */
  attempts = 1;

  constructor(
    readonly kind: FailureKind,
    message: string,
    /** Parsed upstream body, or the raw text when it was not JSON. */
    readonly response: unknown,
    readonly status?: number
  ) {
    super(message);
    this.name = kind;
  }

  get errorBody(): GraphErrorBody | undefined {
    return extractErrorBody(this.response);
  }

  get code(): number | undefined {
    return this.errorBody?.code;
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function extractErrorBody(body: unknown): GraphErrorBody | undefined {
  if (!isRecord(body) || !isRecord(body.error)) return undefined;
  const e = body.error;
  const str = (v: unknown) => (typeof v === "string" ? v : undefined);
  const num = (v: unknown) => (typeof v === "number" ? v : undefined);
  return {
    message: str(e.message),
    type: str(e.type),
    code: num(e.code),
    error_subcode: num(e.error_subcode),
    error_user_title: str(e.error_user_title),
    error_user_msg: str(e.error_user_msg),
    fbtrace_id: str(e.fbtrace_id),
  };
}

/**
 * Classifies a non-2xx JSON body. Returns undefined when the body carries no
 * `error` key; such responses are handed back to the caller as-is.
 */
export function failureFromResponse(
  status: number,
  body: unknown,
  table: ErrorCodeTable = DEFAULT_ERROR_TABLE
): GraphApiError | undefined {
  if (!isRecord(body) || !("error" in body)) return undefined;
  const info = extractErrorBody(body);
  const kind = classify(info?.code, table);
  const detail = info?.message ?? "Unknown error";
  const code = info?.code != null ? ` (code ${info.code})` : "";
  return new GraphApiError(kind, `${kind}: ${detail}${code}`, body, status);
}

export function nonJsonFailure(status: number, text: string): GraphApiError {
  const ok = status >= 200 && status < 300;
  const message = ok
    ? `Graph API returned a non-JSON response (status ${status})`
    : `HTTP error occurred: status ${status} with non-JSON response`;
  return new GraphApiError("GenericApiError", message, text, status);
}

export const isTransient = (error: unknown): boolean =>
  error instanceof GraphApiError && (error.kind === "ServerError" || error.kind === "RateLimited");

export function toErrorPayload(label: string, error: unknown, paramsSent?: GraphParams): ErrorPayload {
  let details: unknown;
  if (error instanceof GraphApiError) details = error.errorBody ?? error.message;
  else details = error instanceof Error ? error.message : String(error);

  const payload: ErrorPayload = { error: label, details };
  if (paramsSent) payload.params_sent = paramsSent;
  return payload;
}
