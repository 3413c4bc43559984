import { z } from "zod";
import { batchGet, isBatchSuccess, type BatchResponse } from "../batch.js";
import type { GraphParams, JsonValue, ToolOutput } from "../types.js";
import { dataRows, isJsonObject } from "../utils.js";
import { TimeRangeSchema, ToolGroup } from "./base.js";

const ObjectTypeSchema = z.enum(["campaign", "adset", "ad"]);
type ObjectType = z.infer<typeof ObjectTypeSchema>;

const ENDPOINTS: Record<ObjectType, string> = {
  campaign: "campaigns",
  adset: "adsets",
  ad: "ads",
};

const DateShape = {
  date_preset: z.string().optional().describe("e.g. last_7d, last_30d; ignored when time_range is set"),
  time_range: TimeRangeSchema.optional(),
};

export const ObjectsByNameSchema = z.object({
  act_id: z.string(),
  object_type: ObjectTypeSchema,
  object_names: z.array(z.string()).describe("Exact names; an empty list returns no results"),
  metrics: z.array(z.string()).min(1).describe("Insights fields, e.g. impressions, clicks, spend"),
  ...DateShape,
});

export const InsightsBatchSchema = z.object({
  object_ids: z.array(z.string()).min(1),
  fields: z.array(z.string()).min(1),
  level: ObjectTypeSchema.or(z.literal("account")).optional(),
  breakdowns: z.array(z.string()).optional(),
  ...DateShape,
});

type DateInput = z.infer<z.ZodObject<typeof DateShape>>;

const dateParams = (input: DateInput): GraphParams =>
  input.time_range ? { time_range: input.time_range } : { date_preset: input.date_preset };

/** Message of a failed sub-response, from its Graph error body when there is one. */
export function batchErrorMessage(res: BatchResponse | null): string {
  if (res == null) return "Sub-request did not complete";
  const body = res.body;
  if (isJsonObject(body) && isJsonObject(body.error) && typeof body.error.message === "string") {
    return body.error.message;
  }
  return `Sub-request failed with status ${res.code}`;
}

type Matched = { [key: string]: JsonValue } & { id: string };

type NameLookup = {
  data: { [key: string]: JsonValue }[];
  matchedCount: number;
  withInsights: number;
  unmatched: string[];
  nameMappings: Record<string, string[]>;
  lookupErrors: Record<string, string>;
};

const NamesShape = {
  act_id: z.string(),
  metrics: z.array(z.string()).min(1).describe("Insights fields, e.g. impressions, clicks, spend"),
  ...DateShape,
};

export const CampaignsByNameSchema = z.object({
  campaign_names: z.array(z.string()).describe("Exact names; an empty list returns no results"),
  ...NamesShape,
});

export const AdSetsByNameSchema = z.object({
  adset_names: z.array(z.string()).describe("Exact names; an empty list returns no results"),
  ...NamesShape,
});

export class BatchQueryTools extends ToolGroup {
  /**
   * Looks up campaigns, ad sets or ads by exact name in one batch, then pulls
   * insights for every match in a second batch.
   */
  async fetch_meta_objects_by_name(input: z.infer<typeof ObjectsByNameSchema>): Promise<ToolOutput> {
    const found = await this.lookupByName(input.act_id, input.object_type, input.object_names, input.metrics, input);
    return {
      data: found.data,
      summary: {
        requested_names: input.object_names,
        object_type: input.object_type,
        total_matched_objects: found.matchedCount,
        objects_with_insights: found.withInsights,
        unmatched_requests: found.unmatched,
        name_mappings: found.nameMappings,
        ...(Object.keys(found.lookupErrors).length ? { lookup_errors: found.lookupErrors } : {}),
      },
    };
  }

  async fetch_meta_campaigns_by_name(input: z.infer<typeof CampaignsByNameSchema>): Promise<ToolOutput> {
    const found = await this.lookupByName(input.act_id, "campaign", input.campaign_names, input.metrics, input);
    return {
      data: found.data,
      summary: {
        requested_names: input.campaign_names,
        total_matched_campaigns: found.matchedCount,
        campaigns_with_insights: found.withInsights,
        unmatched_requests: found.unmatched,
        name_mappings: found.nameMappings,
        ...(Object.keys(found.lookupErrors).length ? { lookup_errors: found.lookupErrors } : {}),
      },
    };
  }

  async fetch_meta_ad_sets_by_name(input: z.infer<typeof AdSetsByNameSchema>): Promise<ToolOutput> {
    const found = await this.lookupByName(input.act_id, "adset", input.adset_names, input.metrics, input);
    return {
      data: found.data,
      summary: {
        requested_names: input.adset_names,
        total_matched_adsets: found.matchedCount,
        adsets_with_insights: found.withInsights,
        unmatched_requests: found.unmatched,
        name_mappings: found.nameMappings,
        ...(Object.keys(found.lookupErrors).length ? { lookup_errors: found.lookupErrors } : {}),
      },
    };
  }

  /** Insights for many objects at once; results keep the order of object_ids. */
  async get_insights_batch(input: z.infer<typeof InsightsBatchSchema>): Promise<ToolOutput> {
    const params: GraphParams = {
      fields: input.fields.join(","),
      level: input.level,
      breakdowns: input.breakdowns?.length ? input.breakdowns.join(",") : undefined,
      ...dateParams(input),
    };

    const responses = await this.api.batch(input.object_ids.map((id) => batchGet(id, "insights", params)));

    return responses.map((res, i) =>
      isBatchSuccess(res)
        ? { id: input.object_ids[i], code: res.code, insights: dataRows(res.body) }
        : { id: input.object_ids[i], code: res?.code ?? null, error: batchErrorMessage(res) }
    );
  }

  private async lookupByName(
    actId: string,
    objectType: ObjectType,
    requested: string[],
    metrics: string[],
    dates: DateInput
  ): Promise<NameLookup> {
    const accountId = this.accountIdOrThrow(actId);
    const names = Array.from(new Set(requested.map((n) => n.trim()).filter(Boolean)));

    const lookups = await this.api.batch(
      names.map((name) =>
        batchGet(accountId, ENDPOINTS[objectType], {
          fields: "id,name,effective_status",
          filtering: [{ field: "name", operator: "EQUAL", value: name }],
          limit: 500,
        })
      )
    );

    const matched: Matched[] = [];
    const unmatched: string[] = [];
    const lookupErrors: Record<string, string> = {};
    const nameMappings: Record<string, string[]> = {};

    lookups.forEach((res, i) => {
      const name = names[i];
      if (!isBatchSuccess(res)) {
        lookupErrors[name] = batchErrorMessage(res);
        unmatched.push(name);
        return;
      }
      const rows = dataRows(res.body).filter((r): r is Matched => typeof r.id === "string");
      if (rows.length === 0) unmatched.push(name);
      nameMappings[name] = rows.map((r) => r.id);
      matched.push(...rows);
    });

    const insights = await this.api.batch(
      matched.map((obj) =>
        batchGet(obj.id, "insights", {
          fields: metrics.join(","),
          level: objectType,
          ...dateParams(dates),
        })
      )
    );

    const data = matched.map((obj, i) => {
      const res = insights[i];
      if (isBatchSuccess(res)) return { ...obj, insights: dataRows(res.body) };
      return { ...obj, insights: [], insights_error: batchErrorMessage(res) };
    });

    return {
      data,
      matchedCount: matched.length,
      withInsights: data.filter((d) => !("insights_error" in d)).length,
      unmatched,
      nameMappings,
      lookupErrors,
    };
  }
}
