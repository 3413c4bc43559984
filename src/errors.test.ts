import { describe, expect, it } from "vitest";
import {
  DEFAULT_ERROR_TABLE,
  GraphApiError,
  SERVER_ERROR_CODES,
  buildErrorTable,
  classify,
  failureFromResponse,
  isTransient,
  nonJsonFailure,
  toErrorPayload,
} from "./errors.js";

describe("classify", () => {
  it("maps every code in the default table to its kind", () => {
    const expected: Record<number, string> = {
      4: "RateLimited",
      17: "RateLimited",
      190: "AuthenticationError",
      102: "AuthenticationError",
      104: "AuthenticationError",
      803: "NotFound",
    };
    for (const [code, kind] of Object.entries(expected)) {
      expect(classify(Number(code))).toBe(kind);
    }
    expect(DEFAULT_ERROR_TABLE.size).toBe(6);
  });

  it("falls back to GenericApiError for unknown or missing codes", () => {
    for (const code of [1, 2, 3, 100, 200, 999]) expect(classify(code)).toBe("GenericApiError");
    expect(classify(undefined)).toBe("GenericApiError");
  });

  it("treats configured server error codes as ServerError", () => {
    const table = buildErrorTable(SERVER_ERROR_CODES);
    for (const code of [1, 2, 3, 100]) expect(classify(code, table)).toBe("ServerError");
    expect(classify(190, table)).toBe("AuthenticationError");
  });

  it("keeps the default kind when a configured code is already mapped", () => {
    expect(classify(4, buildErrorTable([4, 500]))).toBe("RateLimited");
    expect(classify(500, buildErrorTable([4, 500]))).toBe("ServerError");
  });
});

describe("failureFromResponse", () => {
  it("builds a typed failure carrying the upstream body", () => {
    const body = { error: { message: "Invalid OAuth access token.", code: 190, fbtrace_id: "abc" } };
    const failure = failureFromResponse(400, body);

    expect(failure).toBeInstanceOf(GraphApiError);
    expect(failure?.kind).toBe("AuthenticationError");
    expect(failure?.message).toBe("AuthenticationError: Invalid OAuth access token. (code 190)");
    expect(failure?.status).toBe(400);
    expect(failure?.code).toBe(190);
    expect(failure?.response).toBe(body);
    expect(failure?.errorBody?.fbtrace_id).toBe("abc");
  });

  it("returns undefined when the body has no error key", () => {
    expect(failureFromResponse(500, { success: false })).toBeUndefined();
    expect(failureFromResponse(500, [1, 2])).toBeUndefined();
  });

  it("classifies a malformed error value as generic", () => {
    const failure = failureFromResponse(400, { error: "boom" });
    expect(failure?.kind).toBe("GenericApiError");
    expect(failure?.message).toBe("GenericApiError: Unknown error");
  });
});

describe("nonJsonFailure", () => {
  it("keeps the raw text and mentions the non-JSON condition", () => {
    const failure = nonJsonFailure(502, "<html>Bad Gateway</html>");
    expect(failure.kind).toBe("GenericApiError");
    expect(failure.message).toBe("HTTP error occurred: status 502 with non-JSON response");
    expect(failure.response).toBe("<html>Bad Gateway</html>");
    expect(isTransient(failure)).toBe(false);
  });

  it("does not call a success status an HTTP error", () => {
    expect(nonJsonFailure(200, "OK").message).toBe("Graph API returned a non-JSON response (status 200)");
  });
});

describe("isTransient", () => {
  it("is true only for server errors and throttling", () => {
    expect(isTransient(new GraphApiError("ServerError", "x", {}))).toBe(true);
    expect(isTransient(new GraphApiError("RateLimited", "x", {}))).toBe(true);
    expect(isTransient(new GraphApiError("AuthenticationError", "x", {}))).toBe(false);
    expect(isTransient(new GraphApiError("NotFound", "x", {}))).toBe(false);
    expect(isTransient(new Error("socket hang up"))).toBe(false);
  });
});

describe("toErrorPayload", () => {
  it("uses the upstream error body as details", () => {
    const failure = failureFromResponse(400, { error: { message: "Invalid parameter", code: 100 } });
    expect(toErrorPayload("Failed to create CBO campaign", failure, { name: "Spring" })).toEqual({
      error: "Failed to create CBO campaign",
      details: { message: "Invalid parameter", code: 100 },
      params_sent: { name: "Spring" },
    });
  });

  it("falls back to the message for other errors", () => {
    expect(toErrorPayload("Tool failed", new Error("boom"))).toEqual({ error: "Tool failed", details: "boom" });
    expect(toErrorPayload("Tool failed", nonJsonFailure(500, "oops"))).toEqual({
      error: "Tool failed",
      details: "HTTP error occurred: status 500 with non-JSON response",
    });
  });
});
