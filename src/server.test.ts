import { afterEach, describe, expect, it, vi } from "vitest";
import { GraphApiError } from "./errors.js";
import { createServer, runTool, wrap } from "./server.js";
import { FakeTransport, json, testConfig } from "./testing/fakeTransport.js";

describe("wrap", () => {
  it("renders JSON as a single text block", () => {
    expect(wrap({ id: "1" })).toEqual({ content: [{ type: "text", text: '{\n  "id": "1"\n}' }] });
    expect(wrap("nope", true)).toEqual({ content: [{ type: "text", text: '"nope"' }], isError: true });
  });
});

describe("runTool", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("wraps a successful result", async () => {
    const result = await runTool("list_pixels", async () => [{ id: "9" }]);
    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([{ type: "text", text: JSON.stringify([{ id: "9" }], null, 2) }]);
  });

  it("turns a Graph failure into an error result with the upstream details", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = new GraphApiError(
      "NotFound",
      "NotFound: Object does not exist (code 803)",
      { error: { message: "Object does not exist", code: 803 } },
      400
    );

    const result = await runTool("get_adset_details", async () => {
      throw failure;
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: "text",
        text: JSON.stringify(
          { error: "Tool get_adset_details failed", details: { message: "Object does not exist", code: 803 } },
          null,
          2
        ),
      },
    ]);
    expect(log).toHaveBeenCalledWith("Tool get_adset_details failed:", "NotFound: Object does not exist (code 803)");
  });

  it("reports plain errors by message", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    const result = await runTool("list_ad_accounts", async () => {
      throw new Error("An ad account id is required.");
    });

    expect(result).toEqual(
      wrap({ error: "Tool list_ad_accounts failed", details: "An ad account id is required." }, true)
    );
  });
});

describe("createServer", () => {
  it("builds without touching the network", () => {
    const transport = FakeTransport.sequence(json(200, {}));
    expect(() => createServer(testConfig(), { transport })).not.toThrow();
    expect(transport.calls).toHaveLength(0);
  });
});
