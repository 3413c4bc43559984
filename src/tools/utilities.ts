import { z } from "zod";
import { batchGet, isBatchSuccess } from "../batch.js";
import type { JsonValue, ToolOutput } from "../types.js";
import { dataRows, decodeUnicodeEscapes } from "../utils.js";
import { ToolGroup } from "./base.js";
import { batchErrorMessage } from "./batchQueries.js";

export const PixelsSchema = z.object({
  account_id: z.string().describe("Ad account (act_<ID>) or business id"),
});

export const InterestSearchSchema = z.object({
  keywords: z.union([z.string(), z.array(z.string())]).describe("One or two terms, comma or pipe separated"),
  locale: z.string().default("pt_BR"),
});

export const RegionKeySchema = z.object({
  query: z.string().describe('Region names separated by comma or pipe, e.g. "sao paulo|rio"'),
  country_code: z.string().length(2).default("BR"),
  locale: z.string().default("pt_BR"),
});

const splitTerms = (raw: string): string[] =>
  raw
    .split(/[,|]/)
    .map((t) => t.trim())
    .filter(Boolean);

const titleCase = (s: string) =>
  s.replace(/(^|\s)(\p{L})/gu, (_, space: string, c: string) => space + c.toUpperCase());

export class UtilityTools extends ToolGroup {
  async list_pixels(input: z.infer<typeof PixelsSchema>): Promise<ToolOutput> {
    const body = await this.api.get(`/${input.account_id}/adspixels`, { fields: "id,name" });
    return dataRows(body);
  }

  async search_ad_interests(input: z.infer<typeof InterestSearchSchema>): Promise<ToolOutput> {
    const terms =
      typeof input.keywords === "string"
        ? splitTerms(input.keywords)
        : input.keywords.map((t) => t.trim()).filter(Boolean);
    if (terms.length === 0) return { error: "No search terms provided" };
    if (terms.length > 2) {
      return { error: "You can search at most two interest terms.", received_terms: terms };
    }

    const body = await this.api.get("/search", {
      type: "adinterest",
      q: terms.length === 1 ? terms[0] : terms,
      limit: 5,
      locale: input.locale,
    });
    return decodeUnicodeEscapes(body);
  }

  /** Resolves region geo keys, one batched lookup per distinct token. */
  async get_region_key_for_adsets(input: z.infer<typeof RegionKeySchema>): Promise<ToolOutput> {
    const seen = new Set<string>();
    const tokens = splitTerms(input.query).filter((t) => {
      const key = t.toLowerCase();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    const responses = await this.api.batch(
      tokens.map((q) =>
        batchGet("search", "", {
          type: "adgeolocation",
          location_types: ["region"],
          country_code: input.country_code,
          q,
          limit: 5,
          locale: input.locale,
        })
      )
    );

    const regions = tokens.map((token, i): { [key: string]: JsonValue } => {
      const res = responses[i];
      if (!isBatchSuccess(res)) return { name: titleCase(token), key: null, error: batchErrorMessage(res) };
      const top = dataRows(res.body)[0];
      if (!top) return { name: titleCase(token), key: null };
      return { name: top.name ?? titleCase(token), key: top.key ?? null };
    });

    return { regions };
  }
}
