import { z } from "zod";
import { toErrorPayload } from "../errors.js";
import type { GraphParams, ToolOutput } from "../types.js";
import { compact } from "../utils.js";
import { StatusSchema, ToolGroup } from "./base.js";

const ObjectiveSchema = z
  .enum([
    "OUTCOME_APP_PROMOTION",
    "OUTCOME_AWARENESS",
    "OUTCOME_ENGAGEMENT",
    "OUTCOME_LEADS",
    "OUTCOME_SALES",
    "OUTCOME_TRAFFIC",
  ])
  .describe("Campaign objective");

const BID_CAP_STRATEGIES = ["LOWEST_COST_WITH_BID_CAP", "COST_CAP"];

export const CreateCboCampaignSchema = z.object({
  act_id: z.string(),
  name: z.string().optional(),
  objective: ObjectiveSchema.optional(),
  status: StatusSchema.default("PAUSED"),
  daily_budget: z.number().positive().optional().describe("In cents of the account currency"),
  lifetime_budget: z.number().positive().optional().describe("In cents of the account currency"),
  buying_type: z.string().optional(),
  bid_strategy: z.enum(["LOWEST_COST_WITHOUT_CAP", "LOWEST_COST_WITH_BID_CAP", "COST_CAP"]).optional(),
  bid_amount: z.number().positive().optional(),
  spend_cap: z.number().positive().optional(),
});

export const CreateAboCampaignSchema = z.object({
  act_id: z.string(),
  name: z.string().optional(),
  objective: ObjectiveSchema.default("OUTCOME_SALES"),
  status: StatusSchema.default("PAUSED"),
  buying_type: z.string().default("AUCTION"),
});

export const CampaignStatusSchema = z.object({
  campaign_id: z.string(),
  status: StatusSchema,
});

export const CampaignBudgetSchema = z.object({
  campaign_id: z.string(),
  daily_budget: z.number().positive().optional(),
  lifetime_budget: z.number().positive().optional(),
});

export class CampaignTools extends ToolGroup {
  /**
   * Campaign Budget Optimization: budget and bidding live on the campaign and
   * the API spreads spend across its ad sets.
   */
  async create_cbo_campaign(input: z.infer<typeof CreateCboCampaignSchema>): Promise<ToolOutput> {
    if (!input.name) return { error: "No campaign name provided" };
    if (!input.objective) return { error: "No campaign objective provided" };
    if (!input.daily_budget && !input.lifetime_budget) {
      return { error: "CBO campaigns require either daily_budget or lifetime_budget" };
    }

    const bidStrategy = input.bid_strategy ?? "LOWEST_COST_WITHOUT_CAP";
    if (BID_CAP_STRATEGIES.includes(bidStrategy) && !input.bid_amount) {
      return { error: `bid_amount is required when bid_strategy is ${bidStrategy}` };
    }

    const accountId = this.accountIdOrThrow(input.act_id);
    const params = compact({
      name: input.name,
      objective: input.objective,
      status: input.status,
      campaign_budget_optimization: true,
      daily_budget: input.daily_budget,
      lifetime_budget: input.lifetime_budget,
      buying_type: input.buying_type,
      bid_strategy: bidStrategy,
      bid_amount: input.bid_amount,
      spend_cap: input.spend_cap,
      special_ad_categories: [],
    });

    return this.create(accountId, params, "Failed to create CBO campaign");
  }

  /** Ad set budget optimization: no budget or bid fields at campaign level. */
  async create_abo_campaign(input: z.infer<typeof CreateAboCampaignSchema>): Promise<ToolOutput> {
    if (!input.name) return { error: "No campaign name provided" };

    const accountId = this.accountIdOrThrow(input.act_id);
    const params: GraphParams = {
      name: input.name,
      objective: input.objective,
      status: input.status,
      campaign_budget_optimization: false,
      buying_type: input.buying_type,
      special_ad_categories: [],
    };

    return this.create(accountId, params, "Failed to create ABO campaign");
  }

  async deactivate_or_activate_campaign(input: z.infer<typeof CampaignStatusSchema>): Promise<ToolOutput> {
    return this.api.post(`/${input.campaign_id}`, { status: input.status });
  }

  async update_campaign_budget(input: z.infer<typeof CampaignBudgetSchema>): Promise<ToolOutput> {
    if (!input.daily_budget && !input.lifetime_budget) {
      return { error: "Pass daily_budget or lifetime_budget" };
    }
    const params = compact({ daily_budget: input.daily_budget, lifetime_budget: input.lifetime_budget });
    try {
      return await this.api.post(`/${input.campaign_id}`, params);
    } catch (e) {
      return toErrorPayload("Failed to update campaign budget", e, params);
    }
  }

  private async create(accountId: string, params: GraphParams, label: string): Promise<ToolOutput> {
    try {
      return await this.api.post(`/${accountId}/campaigns`, params);
    } catch (e) {
      return toErrorPayload(label, e, params);
    }
  }
}
