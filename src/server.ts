// src/server.ts
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { toErrorPayload } from "./errors.js";
import { MetaApi, type MetaApiOptions } from "./meta.js";
import {
  AccountActivitiesSchema,
  AccountDetailsSchema,
  AccountTools,
  AdSetActivitiesSchema,
} from "./tools/accounts.js";
import {
  AdTools,
  BulkStatusSchema,
  CreateCatalogAdSchema,
  CreateCatalogCreativeSchema,
  EditAdSchema,
} from "./tools/ads.js";
import { AdSetDetailsSchema, AdSetTools, CreateAdSetSchema, UpdateAdSetSchema } from "./tools/adsets.js";
import {
  AudienceSchema,
  AudienceTools,
  AudienceUsersSchema,
  CreateCustomAudienceSchema,
  CreateLookalikeAudienceSchema,
  CreateSavedAudienceSchema,
  DeleteAudienceSchema,
  DeleteSavedAudienceSchema,
  ListAudiencesSchema,
  ListSavedAudiencesSchema,
  SavedAudienceSchema,
  ShareAudienceSchema,
  UpdateAudienceSchema,
} from "./tools/audiences.js";
import {
  AdSetsByNameSchema,
  BatchQueryTools,
  CampaignsByNameSchema,
  InsightsBatchSchema,
  ObjectsByNameSchema,
} from "./tools/batchQueries.js";
import {
  CampaignBudgetSchema,
  CampaignStatusSchema,
  CampaignTools,
  CreateAboCampaignSchema,
  CreateCboCampaignSchema,
} from "./tools/campaigns.js";
import {
  CatalogSchema,
  CatalogTools,
  FetchProductSetsSchema,
  FetchProductsSchema,
  ListCatalogsSchema,
  ProductSchema,
  ProductSetProductsSchema,
  ProductSetSchema,
} from "./tools/catalogs.js";
import {
  AccountInsightsSchema,
  AdInsightsSchema,
  AdSetInsightsSchema,
  CampaignInsightsSchema,
  CompareCampaignsSchema,
  ReportingTools,
} from "./tools/reporting.js";
import { InterestSearchSchema, PixelsSchema, RegionKeySchema, UtilityTools } from "./tools/utilities.js";
import type { MetaConfig, ToolOutput } from "./types.js";

/** Wrap a JSON value into an MCP tool response. */
export const wrap = (json: unknown, isError = false): CallToolResult => ({
  content: [{ type: "text", text: JSON.stringify(json, null, 2) }],
  ...(isError ? { isError: true } : {}),
});

/** Runs a tool; any thrown failure becomes an error result carrying the upstream details. */
export async function runTool(name: string, fn: () => Promise<ToolOutput>): Promise<CallToolResult> {
  try {
    return wrap(await fn());
  } catch (err) {
    console.error(`Tool ${name} failed:`, err instanceof Error ? err.message : err);
    return wrap(toErrorPayload(`Tool ${name} failed`, err), true);
  }
}

type ToolSpec<S extends z.ZodRawShape> = {
  title: string;
  description: string;
  schema: z.ZodObject<S>;
  run: (input: z.infer<z.ZodObject<S>>) => Promise<ToolOutput>;
};

function register<S extends z.ZodRawShape>(server: McpServer, name: string, spec: ToolSpec<S>): void {
  server.registerTool<z.ZodRawShape, z.ZodRawShape>(
    name,
    { title: spec.title, description: spec.description, inputSchema: spec.schema.shape },
    // runtime validation applies defaults the raw shape leaves out
    async (args: unknown) => runTool(name, () => spec.run(spec.schema.parse(args ?? {})))
  );
}

const NoInput = z.object({});

export function createServer(cfg: MetaConfig, apiOptions: MetaApiOptions = {}): McpServer {
  const server = new McpServer({ name: "meta-ads-graph-mcp", version: "1.0.0" });
  const api = new MetaApi(cfg, apiOptions);

  const accounts = new AccountTools(api, cfg);
  const campaigns = new CampaignTools(api, cfg);
  const adsets = new AdSetTools(api, cfg);
  const ads = new AdTools(api, cfg);
  const catalogs = new CatalogTools(api, cfg);
  const reporting = new ReportingTools(api, cfg);
  const audiences = new AudienceTools(api, cfg);
  const batch = new BatchQueryTools(api, cfg);
  const utilities = new UtilityTools(api, cfg);

  // ---------- Accounts ----------
  register(server, "list_ad_accounts", {
    title: "List Ad Accounts",
    description: "List ad accounts the current token can access",
    schema: NoInput,
    run: () => accounts.list_ad_accounts(),
  });
  register(server, "get_details_of_ad_account", {
    title: "Ad Account Details",
    description: "Details of one ad account; default fields when none are given",
    schema: AccountDetailsSchema,
    run: (input) => accounts.get_details_of_ad_account(input),
  });
  register(server, "get_activities_by_adaccount", {
    title: "Ad Account Activities",
    description: "Change log of an ad account (one week by default)",
    schema: AccountActivitiesSchema,
    run: (input) => accounts.get_activities_by_adaccount(input),
  });
  register(server, "get_activities_by_adset", {
    title: "Ad Set Activities",
    description: "Change log of an ad set (one week by default)",
    schema: AdSetActivitiesSchema,
    run: (input) => accounts.get_activities_by_adset(input),
  });

  // ---------- Campaigns ----------
  register(server, "create_cbo_campaign", {
    title: "Create CBO Campaign",
    description: "Create a campaign with budget optimization at campaign level",
    schema: CreateCboCampaignSchema,
    run: (input) => campaigns.create_cbo_campaign(input),
  });
  register(server, "create_abo_campaign", {
    title: "Create ABO Campaign",
    description: "Create a campaign whose budgets are set per ad set",
    schema: CreateAboCampaignSchema,
    run: (input) => campaigns.create_abo_campaign(input),
  });
  register(server, "deactivate_or_activate_campaign", {
    title: "Set Campaign Status",
    description: "Pause, activate or archive a campaign",
    schema: CampaignStatusSchema,
    run: (input) => campaigns.deactivate_or_activate_campaign(input),
  });
  register(server, "update_campaign_budget", {
    title: "Update Campaign Budget",
    description: "Change the daily or lifetime budget of a campaign (cents)",
    schema: CampaignBudgetSchema,
    run: (input) => campaigns.update_campaign_budget(input),
  });

  // ---------- Ad sets ----------
  register(server, "create_adset", {
    title: "Create Ad Set",
    description:
      "Create an ad set in a campaign. Conversion goals need pixel_id and custom_event_type; " +
      "targeting defaults to adults 18-65 in Brazil with Advantage audience",
    schema: CreateAdSetSchema,
    run: (input) => adsets.create_adset(input),
  });
  register(server, "get_adset_details", {
    title: "Ad Set Details",
    description: "Details of one ad set",
    schema: AdSetDetailsSchema,
    run: (input) => adsets.get_adset_details(input),
  });
  register(server, "update_adset", {
    title: "Update Ad Set",
    description: "Change name, status, budget or bid of an ad set",
    schema: UpdateAdSetSchema,
    run: (input) => adsets.update_adset(input),
  });

  // ---------- Ads ----------
  register(server, "create_ad_with_catalog_creative", {
    title: "Create Catalog Ad",
    description: "Create an ad in an ad set from an existing catalog creative",
    schema: CreateCatalogAdSchema,
    run: (input) => ads.create_ad_with_catalog_creative(input),
  });
  register(server, "create_catalog_creative", {
    title: "Create Catalog Creative",
    description: "Create a carousel creative that renders products from a product set",
    schema: CreateCatalogCreativeSchema,
    run: (input) => ads.create_catalog_creative(input),
  });
  register(server, "edit_ad", {
    title: "Edit Ad",
    description: "Change name, status, ad set, creative or tracking of an ad",
    schema: EditAdSchema,
    run: (input) => ads.edit_ad(input),
  });
  register(server, "bulk_update_status", {
    title: "Bulk Status Update",
    description: "Set the status of many ads, ad sets or campaigns in batched calls",
    schema: BulkStatusSchema,
    run: (input) => ads.bulk_update_status(input),
  });

  // ---------- Catalogs ----------
  register(server, "list_catalogs", {
    title: "List Catalogs",
    description: "Product catalogs owned by a business",
    schema: ListCatalogsSchema,
    run: (input) => catalogs.list_catalogs(input),
  });
  register(server, "get_catalog_details", {
    title: "Catalog Details",
    description: "Details of one product catalog",
    schema: CatalogSchema,
    run: (input) => catalogs.get_catalog_details(input),
  });
  register(server, "fetch_products", {
    title: "Catalog Products",
    description: "Products of a catalog, optionally filtered",
    schema: FetchProductsSchema,
    run: (input) => catalogs.fetch_products(input),
  });
  register(server, "get_product_details", {
    title: "Product Details",
    description: "Details of one catalog product",
    schema: ProductSchema,
    run: (input) => catalogs.get_product_details(input),
  });
  register(server, "fetch_product_sets", {
    title: "Product Sets",
    description: "Product sets of a catalog",
    schema: FetchProductSetsSchema,
    run: (input) => catalogs.fetch_product_sets(input),
  });
  register(server, "get_product_set_details", {
    title: "Product Set Details",
    description: "Details of one product set",
    schema: ProductSetSchema,
    run: (input) => catalogs.get_product_set_details(input),
  });
  register(server, "fetch_products_in_product_set", {
    title: "Product Set Products",
    description: "Products that belong to a product set",
    schema: ProductSetProductsSchema,
    run: (input) => catalogs.fetch_products_in_product_set(input),
  });

  // ---------- Reporting ----------
  register(server, "get_account_insights", {
    title: "Account Insights",
    description: "Performance metrics for an ad account, optionally per campaign, ad set or ad",
    schema: AccountInsightsSchema,
    run: (input) => reporting.get_account_insights(input),
  });
  register(server, "get_campaign_insights", {
    title: "Campaign Insights",
    description: "Performance metrics for one campaign",
    schema: CampaignInsightsSchema,
    run: (input) => reporting.get_campaign_insights(input),
  });
  register(server, "get_adset_insights", {
    title: "Ad Set Insights",
    description: "Performance metrics for one ad set",
    schema: AdSetInsightsSchema,
    run: (input) => reporting.get_adset_insights(input),
  });
  register(server, "get_ad_insights", {
    title: "Ad Insights",
    description: "Performance metrics for one ad",
    schema: AdInsightsSchema,
    run: (input) => reporting.get_ad_insights(input),
  });
  register(server, "compare_campaign_performance", {
    title: "Compare Campaigns",
    description: "Side-by-side insights for several campaigns over the same window",
    schema: CompareCampaignsSchema,
    run: (input) => reporting.compare_campaign_performance(input),
  });

  // ---------- Audiences ----------
  register(server, "create_custom_audience", {
    title: "Create Custom Audience",
    description: "Create a custom audience in an ad account",
    schema: CreateCustomAudienceSchema,
    run: (input) => audiences.create_custom_audience(input),
  });
  register(server, "create_lookalike_audience", {
    title: "Create Lookalike Audience",
    description: "Create a lookalike audience from an existing custom audience",
    schema: CreateLookalikeAudienceSchema,
    run: (input) => audiences.create_lookalike_audience(input),
  });
  register(server, "get_custom_audience", {
    title: "Custom Audience",
    description: "Details of one custom audience",
    schema: AudienceSchema,
    run: (input) => audiences.get_custom_audience(input),
  });
  register(server, "list_custom_audiences", {
    title: "List Custom Audiences",
    description: "Custom audiences of an ad account",
    schema: ListAudiencesSchema,
    run: (input) => audiences.list_custom_audiences(input),
  });
  register(server, "delete_custom_audience", {
    title: "Delete Custom Audience",
    description: "Delete a custom audience",
    schema: DeleteAudienceSchema,
    run: (input) => audiences.delete_custom_audience(input),
  });
  register(server, "add_users_to_custom_audience", {
    title: "Add Audience Users",
    description: "Add hashed user rows to a custom audience",
    schema: AudienceUsersSchema,
    run: (input) => audiences.add_users_to_custom_audience(input),
  });
  register(server, "remove_users_from_custom_audience", {
    title: "Remove Audience Users",
    description: "Remove hashed user rows from a custom audience",
    schema: AudienceUsersSchema,
    run: (input) => audiences.remove_users_from_custom_audience(input),
  });
  register(server, "update_custom_audience", {
    title: "Update Custom Audience",
    description: "Rename a custom audience or change its description",
    schema: UpdateAudienceSchema,
    run: (input) => audiences.update_custom_audience(input),
  });
  register(server, "share_custom_audience", {
    title: "Share Custom Audience",
    description: "Share a custom audience with other ad accounts",
    schema: ShareAudienceSchema,
    run: (input) => audiences.share_custom_audience(input),
  });
  register(server, "create_saved_audience", {
    title: "Create Saved Audience",
    description: "Save a targeting spec as a reusable audience",
    schema: CreateSavedAudienceSchema,
    run: (input) => audiences.create_saved_audience(input),
  });
  register(server, "get_saved_audience", {
    title: "Saved Audience",
    description: "Details of one saved audience",
    schema: SavedAudienceSchema,
    run: (input) => audiences.get_saved_audience(input),
  });
  register(server, "list_saved_audiences", {
    title: "List Saved Audiences",
    description: "Saved audiences of an ad account",
    schema: ListSavedAudiencesSchema,
    run: (input) => audiences.list_saved_audiences(input),
  });
  register(server, "delete_saved_audience", {
    title: "Delete Saved Audience",
    description: "Delete a saved audience",
    schema: DeleteSavedAudienceSchema,
    run: (input) => audiences.delete_saved_audience(input),
  });

  // ---------- Batch queries ----------
  register(server, "fetch_meta_objects_by_name", {
    title: "Objects By Name",
    description: "Find campaigns, ad sets or ads by exact name and fetch their insights in batched calls",
    schema: ObjectsByNameSchema,
    run: (input) => batch.fetch_meta_objects_by_name(input),
  });
  register(server, "fetch_meta_campaigns_by_name", {
    title: "Campaigns By Name",
    description: "Find campaigns by exact name and fetch their insights in batched calls",
    schema: CampaignsByNameSchema,
    run: (input) => batch.fetch_meta_campaigns_by_name(input),
  });
  register(server, "fetch_meta_ad_sets_by_name", {
    title: "Ad Sets By Name",
    description: "Find ad sets by exact name and fetch their insights in batched calls",
    schema: AdSetsByNameSchema,
    run: (input) => batch.fetch_meta_ad_sets_by_name(input),
  });
  register(server, "get_insights_batch", {
    title: "Insights Batch",
    description: "Insights for many objects through the batch endpoint, in input order",
    schema: InsightsBatchSchema,
    run: (input) => batch.get_insights_batch(input),
  });

  // ---------- Utilities ----------
  register(server, "list_pixels", {
    title: "List Pixels",
    description: "Pixels/datasets of an ad account or business",
    schema: PixelsSchema,
    run: (input) => utilities.list_pixels(input),
  });
  register(server, "search_ad_interests", {
    title: "Search Interests",
    description: "Search the ad interest catalog (at most two terms)",
    schema: InterestSearchSchema,
    run: (input) => utilities.search_ad_interests(input),
  });
  register(server, "get_region_key_for_adsets", {
    title: "Region Keys",
    description: "Resolve region geo keys for targeting",
    schema: RegionKeySchema,
    run: (input) => utilities.get_region_key_for_adsets(input),
  });

  return server;
}

export async function startServer(cfg: MetaConfig): Promise<void> {
  const server = createServer(cfg);
  // ---------- Connect over stdio ----------
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
