import { z } from "zod";
import { toErrorPayload } from "../errors.js";
import type { JsonObject, ToolOutput } from "../types.js";
import { JsonObjectSchema, compact, joinFields } from "../utils.js";
import { StatusSchema, ToolGroup } from "./base.js";

const DEFAULT_ADSET_FIELDS = [
  "id",
  "name",
  "status",
  "effective_status",
  "campaign_id",
  "daily_budget",
  "lifetime_budget",
  "bid_amount",
  "optimization_goal",
  "billing_event",
  "targeting",
];

// Goals that optimize for an event and need a pixel and event type.
const CONVERSION_GOALS = new Set([
  "OFFSITE_CONVERSIONS",
  "VALUE",
  "APP_INSTALLS",
  "APP_INSTALLS_AND_OFFSITE_CONVERSIONS",
  "IN_APP_VALUE",
  "LEAD_GENERATION",
  "QUALITY_LEAD",
]);

export const DEFAULT_TARGETING: JsonObject = {
  age_min: 18,
  age_max: 65,
  geo_locations: { countries: ["BR"] },
  targeting_automation: { advantage_audience: 1 },
};

export const requiresConversionDetails = (goal: string | undefined): boolean =>
  goal != null && CONVERSION_GOALS.has(goal);

export const CreateAdSetSchema = z.object({
  act_id: z.string(),
  campaign_id: z.string(),
  name: z.string(),
  optimization_goal: z.string().optional().describe("Must match the campaign objective"),
  billing_event: z.string().optional().describe("Must match the optimization goal; usually IMPRESSIONS"),
  status: StatusSchema.default("PAUSED"),
  daily_budget: z.number().positive().optional().describe("Cents; leave out when the campaign holds the budget"),
  lifetime_budget: z.number().positive().optional().describe("Cents; needs end_time"),
  targeting: z.union([z.string(), JsonObjectSchema]).optional().describe("Targeting spec object or its JSON text"),
  bid_strategy: z
    .enum(["LOWEST_COST_WITHOUT_CAP", "LOWEST_COST_WITH_BID_CAP", "COST_CAP", "LOWEST_COST_WITH_MIN_ROAS"])
    .optional(),
  bid_amount: z.number().positive().optional(),
  roas_average_floor: z.number().positive().optional(),
  start_time: z.string().optional().describe("ISO-8601"),
  end_time: z.string().optional().describe("ISO-8601"),
  pixel_id: z.string().optional(),
  custom_event_type: z.string().optional().describe("e.g. PURCHASE, ADD_TO_CART, LEAD"),
  website_domain: z.string().optional(),
  destination_type: z.string().default("WEBSITE"),
});

/** Targeting as an object; text is parsed, absence gets the broad default. */
export function readTargeting(raw: string | JsonObject | undefined): JsonObject | string {
  if (raw == null || (typeof raw === "string" && !raw.trim())) return DEFAULT_TARGETING;
  if (typeof raw !== "string") return Object.keys(raw).length ? raw : DEFAULT_TARGETING;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return `targeting was sent as a string but is not valid JSON: ${e instanceof Error ? e.message : String(e)}`;
  }
  const obj = JsonObjectSchema.safeParse(parsed);
  return obj.success ? obj.data : "targeting must be a JSON object";
}

export const AdSetDetailsSchema = z.object({
  adset_id: z.string(),
  fields: z.array(z.string()).optional(),
});

export const UpdateAdSetSchema = z.object({
  adset_id: z.string(),
  name: z.string().optional(),
  status: StatusSchema.optional(),
  daily_budget: z.number().positive().optional(),
  lifetime_budget: z.number().positive().optional(),
  bid_amount: z.number().positive().optional(),
});

export class AdSetTools extends ToolGroup {
  async create_adset(input: z.infer<typeof CreateAdSetSchema>): Promise<ToolOutput> {
    if (!input.campaign_id) return { error: "No campaign ID provided" };
    if (!input.name) return { error: "No ad set name provided" };
    if (!input.optimization_goal) return { error: "No optimization goal provided" };
    if (!input.billing_event) return { error: "No billing event provided" };

    const conversion = requiresConversionDetails(input.optimization_goal);
    if (conversion && !input.pixel_id) return { error: "pixel_id is required for conversion goals" };
    if (conversion && !input.custom_event_type) {
      return { error: "custom_event_type is required for conversion goals" };
    }
    if (input.bid_strategy === "LOWEST_COST_WITH_MIN_ROAS" && !input.roas_average_floor) {
      return { error: "ROAS average floor is required for LOWEST_COST_WITH_MIN_ROAS strategy" };
    }

    const targeting = readTargeting(input.targeting);
    if (typeof targeting === "string") return { error: targeting };

    const accountId = this.accountIdOrThrow(input.act_id);
    const params = compact({
      name: input.name,
      campaign_id: input.campaign_id,
      status: input.status,
      optimization_goal: input.optimization_goal,
      billing_event: input.billing_event,
      promoted_object: conversion
        ? JSON.stringify({ pixel_id: input.pixel_id, custom_event_type: input.custom_event_type?.toUpperCase() })
        : undefined,
      destination_type: conversion ? input.destination_type : undefined,
      conversion_domain: conversion ? input.website_domain : undefined,
      targeting,
      daily_budget: input.daily_budget,
      lifetime_budget: input.lifetime_budget,
      bid_amount: input.bid_amount,
      bid_strategy: input.bid_strategy,
      roas_average_floor: input.roas_average_floor,
      start_time: input.start_time,
      end_time: input.end_time,
    });

    try {
      return await this.api.post(`/${accountId}/adsets`, params);
    } catch (e) {
      return toErrorPayload("Failed to create ad set", e, params);
    }
  }

  async get_adset_details(input: z.infer<typeof AdSetDetailsSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.adset_id}`, { fields: joinFields(input.fields, DEFAULT_ADSET_FIELDS) });
  }

  async update_adset(input: z.infer<typeof UpdateAdSetSchema>): Promise<ToolOutput> {
    const { adset_id, ...changes } = input;
    const params = compact(changes);
    if (Object.keys(params).length === 0) return { error: "No ad set fields to update" };

    try {
      return await this.api.post(`/${adset_id}`, params);
    } catch (e) {
      return toErrorPayload("Failed to update ad set", e, params);
    }
  }
}
