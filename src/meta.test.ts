import { describe, expect, it } from "vitest";
import { GraphApiError, buildErrorTable, SERVER_ERROR_CODES } from "./errors.js";
import { MetaApi } from "./meta.js";
import { FakeTransport, graphError, json, testConfig } from "./testing/fakeTransport.js";
import type { MetaConfig } from "./types.js";

const apiWith = (transport: FakeTransport, cfg: Partial<MetaConfig> = {}) =>
  new MetaApi(testConfig(cfg), { transport, onRetry: () => {} });

describe("MetaApi.get", () => {
  it("sends params as a query string with the credential", async () => {
    const transport = FakeTransport.sequence(json(200, { data: ["foo", "bar"] }));
    const api = apiWith(transport);

    const result = await api.get("/123/insights", {
      fields: "impressions,clicks",
      time_range: { since: "2024-01-01", until: "2024-01-31" },
      limit: 25,
      after: undefined,
    });

    expect(result).toEqual({ data: ["foo", "bar"] });
    expect(transport.calls).toHaveLength(1);
    const call = transport.calls[0];
    expect(call.method).toBe("GET");
    expect(call.body).toBeUndefined();

    const url = new URL(call.url);
    expect(url.origin + url.pathname).toBe("https://graph.facebook.com/v22.0/123/insights");
    expect(url.searchParams.get("fields")).toBe("impressions,clicks");
    expect(url.searchParams.get("time_range")).toBe('{"since":"2024-01-01","until":"2024-01-31"}');
    expect(url.searchParams.get("limit")).toBe("25");
    expect(url.searchParams.has("after")).toBe(false);
    expect(url.searchParams.get("access_token")).toBe("test-token");
  });

  it("retries transient failures and returns the eventual success", async () => {
    const transport = FakeTransport.sequence(
      graphError(400, 4, "User request limit reached"),
      graphError(500, 17),
      json(200, { id: "123" })
    );

    await expect(apiWith(transport).get("/123")).resolves.toEqual({ id: "123" });
    expect(transport.calls).toHaveLength(3);
  });

  it("surfaces the final failure after max attempts", async () => {
    const transport = FakeTransport.sequence(graphError(400, 4));

    const err = await apiWith(transport).get("/123").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GraphApiError);
    expect(err).toMatchObject({ kind: "RateLimited", status: 400, attempts: 3 });
    expect(transport.calls).toHaveLength(3);
  });

  it("honours the configured attempt ceiling", async () => {
    const transport = FakeTransport.sequence(graphError(500, 2));
    const api = apiWith(transport, { maxRetries: 5, errorTable: buildErrorTable(SERVER_ERROR_CODES) });

    await expect(api.get("/123")).rejects.toMatchObject({ kind: "ServerError" });
    expect(transport.calls).toHaveLength(5);
  });

  it("retries a configured server error code and returns the eventual success", async () => {
    const transport = FakeTransport.sequence(graphError(500, 1, "An unknown error occurred"), json(200, { id: "123" }));
    const api = apiWith(transport, { errorTable: buildErrorTable(SERVER_ERROR_CODES) });

    await expect(api.get("/123")).resolves.toEqual({ id: "123" });
    expect(transport.calls).toHaveLength(2);
  });

  it.each<{ code: number; kind: string }>([
    { code: 190, kind: "AuthenticationError" },
    { code: 102, kind: "AuthenticationError" },
    { code: 803, kind: "NotFound" },
    { code: 100, kind: "GenericApiError" },
  ])("fails immediately on code $code", async ({ code, kind }) => {
    const transport = FakeTransport.sequence(graphError(400, code));

    const err = await apiWith(transport).get("/123").catch((e: unknown) => e);
    expect(err).toMatchObject({ kind });
    expect(err instanceof GraphApiError ? err.code : undefined).toBe(code);
    expect(transport.calls).toHaveLength(1);
  });

  it("does not retry a non-JSON error body", async () => {
    const transport = FakeTransport.sequence({ status: 502, text: "<html>Bad Gateway</html>" });

    const err = await apiWith(transport).get("/123").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GraphApiError);
    expect(err).toMatchObject({ kind: "GenericApiError", status: 502 });
    expect(err instanceof Error && err.message).toContain("non-JSON response");
    expect(transport.calls).toHaveLength(1);
  });

  it("reports a non-JSON success body without retrying", async () => {
    const transport = FakeTransport.sequence({ status: 200, text: "true-ish" });

    await expect(apiWith(transport).get("/123")).rejects.toMatchObject({
      kind: "GenericApiError",
      status: 200,
      message: "Graph API returned a non-JSON response (status 200)",
    });
    expect(transport.calls).toHaveLength(1);
  });

  it("passes through an error status whose body has no error key", async () => {
    const transport = FakeTransport.sequence(json(500, { success: false }));

    await expect(apiWith(transport).get("/123")).resolves.toEqual({ success: false });
    expect(transport.calls).toHaveLength(1);
  });

  it("accepts absolute URLs", async () => {
    const transport = FakeTransport.sequence(json(200, {}));
    await apiWith(transport).get("https://graph.facebook.com/v22.0/me", { fields: "id" });
    expect(transport.calls[0].url).toBe(
      "https://graph.facebook.com/v22.0/me?fields=id&access_token=test-token"
    );
  });
});

describe("MetaApi.post", () => {
  it("sends a form-encoded body", async () => {
    const transport = FakeTransport.sequence(json(200, { id: "987" }));

    const result = await apiWith(transport).post("act_100/campaigns", {
      name: "Spring Sale",
      campaign_budget_optimization: true,
      daily_budget: 5000,
      special_ad_categories: [],
    });

    expect(result).toEqual({ id: "987" });
    const call = transport.calls[0];
    expect(call.method).toBe("POST");
    expect(call.url).toBe("https://graph.facebook.com/v22.0/act_100/campaigns");
    expect(call.headers).toEqual({ "content-type": "application/x-www-form-urlencoded" });
    expect(Object.fromEntries(transport.form(0))).toEqual({
      name: "Spring Sale",
      campaign_budget_optimization: "true",
      daily_budget: "5000",
      special_ad_categories: "[]",
      access_token: "test-token",
    });
  });

  it("applies the same retry policy", async () => {
    const transport = FakeTransport.sequence(graphError(500, 17), json(200, { success: true }));

    await expect(apiWith(transport).post("/123", { status: "PAUSED" })).resolves.toEqual({ success: true });
    expect(transport.calls).toHaveLength(2);
  });

  it("does not retry authentication failures", async () => {
    const transport = FakeTransport.sequence(graphError(401, 190));

    await expect(apiWith(transport).post("/123", {})).rejects.toMatchObject({ kind: "AuthenticationError" });
    expect(transport.calls).toHaveLength(1);
  });
});

describe("MetaApi.getAllPages", () => {
  it("follows paging cursors and concatenates data", async () => {
    const next = "https://graph.facebook.com/v22.0/act_100/campaigns?after=abc&access_token=test-token";
    const transport = FakeTransport.sequence(
      json(200, { data: [{ id: "1" }, { id: "2" }], paging: { next } }),
      json(200, { data: [{ id: "3" }], paging: {} })
    );

    const rows = await apiWith(transport).getAllPages("/act_100/campaigns", { fields: "id" });

    expect(rows).toEqual([{ id: "1" }, { id: "2" }, { id: "3" }]);
    expect(transport.calls.map((c) => c.url)).toEqual([
      "https://graph.facebook.com/v22.0/act_100/campaigns?fields=id&access_token=test-token",
      next,
    ]);
  });
});
