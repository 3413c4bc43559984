import { z } from "zod";
import type { GraphParams, ToolOutput } from "../types.js";
import { compact, joinFields } from "../utils.js";
import { TimeRangeSchema, ToolGroup } from "./base.js";

export const DEFAULT_AD_ACCOUNT_FIELDS = [
  "name",
  "business_name",
  "age",
  "account_status",
  "balance",
  "amount_spent",
  "attribution_spec",
  "account_id",
  "business",
  "business_city",
  "brand_safety_content_filter_levels",
  "currency",
  "created_time",
  "id",
];

export const AccountDetailsSchema = z.object({
  act_id: z.string().describe("Ad account id, act_XXXXXXXXXX"),
  fields: z.array(z.string()).optional(),
});

const ActivitiesShape = {
  fields: z.array(z.string()).optional(),
  limit: z.number().int().positive().optional(),
  after: z.string().optional().describe("Cursor for the next page"),
  before: z.string().optional().describe("Cursor for the previous page"),
  time_range: TimeRangeSchema.optional().describe("Overrides since/until"),
  since: z.string().optional(),
  until: z.string().optional(),
};

export const AccountActivitiesSchema = z.object({ act_id: z.string(), ...ActivitiesShape });
export const AdSetActivitiesSchema = z.object({ adset_id: z.string(), ...ActivitiesShape });

type ActivitiesInput = z.infer<z.ZodObject<typeof ActivitiesShape>>;

export function activityParams(input: ActivitiesInput): GraphParams {
  // time_range takes precedence over since/until
  const window = input.time_range
    ? { time_range: input.time_range }
    : { since: input.since || undefined, until: input.until || undefined };

  return compact({
    fields: input.fields?.length ? input.fields.join(",") : undefined,
    limit: input.limit,
    after: input.after || undefined,
    before: input.before || undefined,
    ...window,
  });
}

export class AccountTools extends ToolGroup {
  // Admin: ad accounts reachable with the configured token
  async list_ad_accounts(): Promise<ToolOutput> {
    return this.api.get("/me", { fields: "adaccounts{name,account_id}" });
  }

  async get_details_of_ad_account(input: z.infer<typeof AccountDetailsSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.act_id}`, {
      fields: joinFields(input.fields, DEFAULT_AD_ACCOUNT_FIELDS),
    });
  }

  async get_activities_by_adaccount(input: z.infer<typeof AccountActivitiesSchema>): Promise<ToolOutput> {
    const accountId = this.accountIdOrThrow(input.act_id);
    return this.api.get(`/${accountId}/activities`, activityParams(input));
  }

  async get_activities_by_adset(input: z.infer<typeof AdSetActivitiesSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.adset_id}/activities`, activityParams(input));
  }
}
