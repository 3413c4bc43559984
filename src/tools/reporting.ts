import { z } from "zod";
import { batchGet, isBatchSuccess } from "../batch.js";
import { toErrorPayload } from "../errors.js";
import type { GraphParams, JsonValue, ToolOutput } from "../types.js";
import { DATE_PRESETS, isIsoDate, isValidDatePreset } from "../utils.js";
import { ToolGroup } from "./base.js";
import { batchErrorMessage } from "./batchQueries.js";

const InsightsShape = {
  date_preset: z.string().default("last_30d").describe(`One of: ${DATE_PRESETS.join(", ")}`),
  time_range_start: z.string().optional().describe("YYYY-MM-DD; needs time_range_end"),
  time_range_end: z.string().optional().describe("YYYY-MM-DD; needs time_range_start"),
  fields: z.array(z.string()).optional(),
  breakdowns: z.array(z.string()).optional(),
  time_increment: z.string().optional().describe("Days per row (1-90), 'monthly' or 'all_days'"),
};

export const AccountInsightsSchema = z.object({
  account_id: z.string(),
  level: z.enum(["account", "campaign", "adset", "ad"]).default("account"),
  filtering: z.array(z.object({ field: z.string(), operator: z.string(), value: z.unknown() })).optional(),
  limit: z.number().int().positive().default(100),
  ...InsightsShape,
});

export const CampaignInsightsSchema = z.object({
  campaign_id: z.string(),
  level: z.enum(["campaign", "adset", "ad"]).default("campaign"),
  ...InsightsShape,
});

export const AdSetInsightsSchema = z.object({
  adset_id: z.string(),
  level: z.enum(["adset", "ad"]).default("adset"),
  ...InsightsShape,
});

export const AdInsightsSchema = z.object({
  ad_id: z.string(),
  ...InsightsShape,
});

export const DEFAULT_COMPARISON_FIELDS = ["campaign_name", "impressions", "clicks", "spend", "ctr", "cpc", "cpm"];

export const CompareCampaignsSchema = z.object({
  campaign_ids: z.array(z.string()).describe("Campaigns to compare side by side"),
  date_preset: InsightsShape.date_preset,
  time_range_start: InsightsShape.time_range_start,
  time_range_end: InsightsShape.time_range_end,
  fields: InsightsShape.fields,
});

type InsightsInput = z.infer<z.ZodObject<typeof InsightsShape>>;

/**
 * Date window for an insights query: an explicit range when both ends are
 * given, the preset otherwise. Returns a message when the input is invalid.
 */
export function insightsWindow(input: InsightsInput): GraphParams | string {
  const { time_range_start: start, time_range_end: end } = input;
  if (start || end) {
    if (!start || !end) {
      return "Both time_range_start and time_range_end must be provided when using custom date range";
    }
    if (!isIsoDate(start) || !isIsoDate(end)) return "Dates must be in YYYY-MM-DD format";
    return { time_range: { since: start, until: end } };
  }
  if (!isValidDatePreset(input.date_preset)) {
    return `Invalid date_preset: ${input.date_preset}. Must be one of: ${DATE_PRESETS.join(", ")}`;
  }
  return { date_preset: input.date_preset };
}

export function insightsParams(input: InsightsInput & { level: string }): GraphParams | string {
  const window = insightsWindow(input);
  if (typeof window === "string") return window;

  const params: GraphParams = { level: input.level, ...window };
  if (input.fields?.length) params.fields = input.fields.join(",");
  if (input.breakdowns?.length) params.breakdowns = input.breakdowns.join(",");
  if (input.time_increment) params.time_increment = input.time_increment;
  return params;
}

export class ReportingTools extends ToolGroup {
  async get_account_insights(input: z.infer<typeof AccountInsightsSchema>): Promise<ToolOutput> {
    const params = insightsParams(input);
    if (typeof params === "string") return { error: params };
    params.limit = input.limit;
    if (input.filtering?.length) params.filtering = JSON.stringify(input.filtering);

    const accountId = this.accountIdOrThrow(input.account_id);
    return this.fetch(`/${accountId}/insights`, params, "Failed to fetch account insights");
  }

  async get_campaign_insights(input: z.infer<typeof CampaignInsightsSchema>): Promise<ToolOutput> {
    const params = insightsParams(input);
    if (typeof params === "string") return { error: params };
    return this.fetch(`/${input.campaign_id}/insights`, params, "Failed to fetch campaign insights");
  }

  async get_adset_insights(input: z.infer<typeof AdSetInsightsSchema>): Promise<ToolOutput> {
    const params = insightsParams(input);
    if (typeof params === "string") return { error: params };
    return this.fetch(`/${input.adset_id}/insights`, params, "Failed to fetch ad set insights");
  }

  async get_ad_insights(input: z.infer<typeof AdInsightsSchema>): Promise<ToolOutput> {
    const params = insightsParams({ ...input, level: "ad" });
    if (typeof params === "string") return { error: params };
    return this.fetch(`/${input.ad_id}/insights`, params, "Failed to fetch ad insights");
  }

  /** Insights for several campaigns in one batch; a failing campaign does not hide the others. */
  async compare_campaign_performance(input: z.infer<typeof CompareCampaignsSchema>): Promise<ToolOutput> {
    const ids = input.campaign_ids.map((id) => id.trim()).filter(Boolean);
    if (ids.length === 0) return { error: "At least one campaign_id must be provided" };

    const window = insightsWindow(input);
    if (typeof window === "string") return { error: window };

    const fields = input.fields?.length ? input.fields : DEFAULT_COMPARISON_FIELDS;
    const responses = await this.api.batch(
      ids.map((id) => batchGet(id, "insights", { level: "campaign", fields: fields.join(","), ...window }))
    );

    const comparison = ids.map((campaign_id, i): { [key: string]: JsonValue } => {
      const res = responses[i];
      if (isBatchSuccess(res)) return { campaign_id, insights: res.body };
      return { campaign_id, error: `Failed to fetch insights: ${batchErrorMessage(res)}` };
    });

    const dateRange: JsonValue =
      input.time_range_start && input.time_range_end
        ? { since: input.time_range_start, until: input.time_range_end }
        : input.date_preset;
    return { comparison, date_range: dateRange };
  }

  private async fetch(path: string, params: GraphParams, label: string): Promise<ToolOutput> {
    try {
      return await this.api.get(path, params);
    } catch (e) {
      return toErrorPayload(label, e, params);
    }
  }
}
