import type { ErrorCodeTable } from "./errors.js";

export type MetaConfig = {
accessToken: string;
adAccountId: string; // "act_123..."
apiVersion: string; // e.g., "v22.0"
graphUrl: string;
maxRetries: number;
retryUnitMs: number;
requestTimeoutMs: number;
errorTable: ErrorCodeTable;
};


export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };


// Values a tool may hand to the client; serialized by toGraphParams.
export type ParamValue = JsonValue | undefined;
export type GraphParams = Record<string, ParamValue>;


export type TimeRange = { since: string; until: string }; // YYYY-MM-DD


export type ErrorPayload = {
error: string;
details?: unknown;
params_sent?: GraphParams;
};


// Anything a tool hands back; the server pretty-prints it as JSON text.
export type ToolOutput = JsonValue | ErrorPayload | Record<string, unknown>;
