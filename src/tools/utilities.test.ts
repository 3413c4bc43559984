import { describe, expect, it } from "vitest";
import { MetaApi } from "../meta.js";
import { FakeTransport, json, testConfig } from "../testing/fakeTransport.js";
import { InterestSearchSchema, RegionKeySchema, UtilityTools } from "./utilities.js";

const toolsWith = (transport: FakeTransport) => {
  const cfg = testConfig();
  return new UtilityTools(new MetaApi(cfg, { transport, onRetry: () => {} }), cfg);
};

describe("search_ad_interests", () => {
  it("refuses more than two terms", async () => {
    const transport = FakeTransport.sequence(json(200, {}));

    const result = await toolsWith(transport).search_ad_interests(
      InterestSearchSchema.parse({ keywords: "running, yoga | chess" })
    );

    expect(result).toEqual({
      error: "You can search at most two interest terms.",
      received_terms: ["running", "yoga", "chess"],
    });
    expect(transport.calls).toHaveLength(0);
  });

  it("sends two terms as a list and decodes escaped names", async () => {
    const transport = FakeTransport.sequence(json(200, { data: [{ id: "6003", name: "Caf\\u00e9" }] }));

    const result = await toolsWith(transport).search_ad_interests(
      InterestSearchSchema.parse({ keywords: ["running", "yoga"] })
    );

    expect(result).toEqual({ data: [{ id: "6003", name: "Café" }] });
    const query = new URL(transport.calls[0].url).searchParams;
    expect(query.get("type")).toBe("adinterest");
    expect(query.get("q")).toBe('["running","yoga"]');
    expect(query.get("locale")).toBe("pt_BR");
  });
});

describe("get_region_key_for_adsets", () => {
  it("batches one lookup per distinct region", async () => {
    const transport = FakeTransport.sequence(
      json(200, [
        { code: 200, body: JSON.stringify({ data: [{ key: "460", name: "São Paulo" }] }) },
        { code: 200, body: JSON.stringify({ data: [] }) },
      ])
    );

    const result = await toolsWith(transport).get_region_key_for_adsets(
      RegionKeySchema.parse({ query: "sao paulo|Rio|rio" })
    );

    const batch: { relative_url: string }[] = JSON.parse(transport.form(0).get("batch") ?? "[]");
    expect(batch.map((b) => b.relative_url)).toEqual([
      "search?type=adgeolocation&location_types=%5B%22region%22%5D&country_code=BR&q=sao+paulo&limit=5&locale=pt_BR",
      "search?type=adgeolocation&location_types=%5B%22region%22%5D&country_code=BR&q=Rio&limit=5&locale=pt_BR",
    ]);
    expect(result).toEqual({
      regions: [
        { name: "São Paulo", key: "460" },
        { name: "Rio", key: null },
      ],
    });
  });

  it("title-cases names it could not resolve", async () => {
    const transport = FakeTransport.sequence(
      json(200, [{ code: 400, body: JSON.stringify({ error: { message: "Invalid country" } }) }])
    );

    const result = await toolsWith(transport).get_region_key_for_adsets(
      RegionKeySchema.parse({ query: "espírito santo", country_code: "XX" })
    );

    expect(result).toEqual({ regions: [{ name: "Espírito Santo", key: null, error: "Invalid country" }] });
  });
});
