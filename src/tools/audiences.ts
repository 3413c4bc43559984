import { z } from "zod";
import { toErrorPayload } from "../errors.js";
import type { GraphParams, ToolOutput } from "../types.js";
import { JsonObjectSchema, compact, joinFields } from "../utils.js";
import { ToolGroup } from "./base.js";

const DEFAULT_AUDIENCE_FIELDS = [
  "id",
  "name",
  "description",
  "subtype",
  "approximate_count_lower_bound",
  "approximate_count_upper_bound",
  "delivery_status",
  "operation_status",
  "time_created",
];

export const CreateCustomAudienceSchema = z.object({
  account_id: z.string(),
  name: z.string(),
  subtype: z.string().describe("CUSTOM, WEBSITE, APP, OFFLINE_CONVERSION, ENGAGEMENT, ..."),
  description: z.string().optional(),
  customer_file_source: z
    .enum(["USER_PROVIDED_ONLY", "PARTNER_PROVIDED_ONLY", "BOTH_USER_AND_PARTNER_PROVIDED"])
    .optional(),
});

export const CreateLookalikeAudienceSchema = z.object({
  account_id: z.string(),
  name: z.string(),
  origin_audience_id: z.string(),
  lookalike_spec: z
    .object({
      country: z.string().length(2),
      ratio: z.number().min(0.01).max(0.2),
      starting_ratio: z.number().min(0).max(0.2).optional(),
    })
    .describe('e.g. {"country": "US", "ratio": 0.01}'),
  description: z.string().optional(),
});

export const AudienceSchema = z.object({
  audience_id: z.string(),
  fields: z.array(z.string()).optional(),
});

export const ListAudiencesSchema = z.object({
  account_id: z.string(),
  fields: z.array(z.string()).optional(),
  limit: z.number().int().positive().optional(),
  after: z.string().optional(),
});

export const DeleteAudienceSchema = z.object({ audience_id: z.string() });

export const AudienceUsersSchema = z.object({
  audience_id: z.string(),
  schema: z
    .union([z.string(), z.array(z.string())])
    .describe('Hashed key or keys, e.g. "EMAIL_SHA256" or ["EMAIL_SHA256", "PHONE_SHA256"]'),
  data: z.array(z.array(z.string())).describe("One row per user, values in schema order, already hashed"),
});

export const UpdateAudienceSchema = z.object({
  audience_id: z.string(),
  name: z.string().optional(),
  description: z.string().optional(),
});

export const CreateSavedAudienceSchema = z.object({
  account_id: z.string(),
  name: z.string(),
  targeting: JsonObjectSchema.describe("Targeting spec"),
  description: z.string().optional(),
});

export const SavedAudienceSchema = z.object({
  saved_audience_id: z.string(),
  fields: z.array(z.string()).optional(),
});

export const ListSavedAudiencesSchema = z.object({
  account_id: z.string(),
  fields: z.array(z.string()).optional(),
  limit: z.number().int().positive().default(100),
});

export const DeleteSavedAudienceSchema = z.object({ saved_audience_id: z.string() });

export const ShareAudienceSchema = z.object({
  audience_id: z.string(),
  account_ids: z.array(z.string()).describe("Ad account ids, numeric or act_ prefixed"),
});

const DEFAULT_SAVED_AUDIENCE_FIELDS = ["id", "name", "description", "targeting", "approximate_count", "time_created"];

export class AudienceTools extends ToolGroup {
  async create_custom_audience(input: z.infer<typeof CreateCustomAudienceSchema>): Promise<ToolOutput> {
    if (!input.name) return { error: "No audience name provided" };
    if (!input.subtype) return { error: "No audience subtype provided" };

    const accountId = this.accountIdOrThrow(input.account_id);
    const params = compact({
      name: input.name,
      subtype: input.subtype,
      description: input.description,
      customer_file_source: input.customer_file_source,
    });
    return this.postOrError(`/${accountId}/customaudiences`, params, "Failed to create custom audience");
  }

  async create_lookalike_audience(input: z.infer<typeof CreateLookalikeAudienceSchema>): Promise<ToolOutput> {
    if (!input.name) return { error: "No audience name provided" };
    if (!input.origin_audience_id) return { error: "No origin audience ID provided" };

    const accountId = this.accountIdOrThrow(input.account_id);
    const params = compact({
      name: input.name,
      subtype: "LOOKALIKE",
      origin_audience_id: input.origin_audience_id,
      lookalike_spec: JSON.stringify(input.lookalike_spec),
      description: input.description,
    });
    return this.postOrError(`/${accountId}/customaudiences`, params, "Failed to create lookalike audience");
  }

  async get_custom_audience(input: z.infer<typeof AudienceSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.audience_id}`, { fields: joinFields(input.fields, DEFAULT_AUDIENCE_FIELDS) });
  }

  async list_custom_audiences(input: z.infer<typeof ListAudiencesSchema>): Promise<ToolOutput> {
    const accountId = this.accountIdOrThrow(input.account_id);
    return this.api.get(`/${accountId}/customaudiences`, {
      fields: joinFields(input.fields, DEFAULT_AUDIENCE_FIELDS),
      limit: input.limit,
      after: input.after,
    });
  }

  // The Graph API accepts a method override on POST for deletes.
  async delete_custom_audience(input: z.infer<typeof DeleteAudienceSchema>): Promise<ToolOutput> {
    return this.postOrError(`/${input.audience_id}`, { method: "delete" }, "Failed to delete custom audience");
  }

  async add_users_to_custom_audience(input: z.infer<typeof AudienceUsersSchema>): Promise<ToolOutput> {
    return this.changeUsers(input, false, "Failed to add users to custom audience");
  }

  async remove_users_from_custom_audience(input: z.infer<typeof AudienceUsersSchema>): Promise<ToolOutput> {
    return this.changeUsers(input, true, "Failed to remove users from custom audience");
  }

  async update_custom_audience(input: z.infer<typeof UpdateAudienceSchema>): Promise<ToolOutput> {
    const params = compact({ name: input.name || undefined, description: input.description || undefined });
    if (!Object.keys(params).length) return { error: "At least one field (name or description) must be provided" };
    return this.postOrError(`/${input.audience_id}`, params, "Failed to update custom audience");
  }

  async share_custom_audience(input: z.infer<typeof ShareAudienceSchema>): Promise<ToolOutput> {
    const accounts = input.account_ids.map((id) => id.trim().replace(/^act_/, "")).filter(Boolean);
    if (!accounts.length) return { error: "No account IDs provided" };
    const params = { adaccounts: JSON.stringify(accounts) };
    return this.postOrError(`/${input.audience_id}/adaccounts`, params, "Failed to share custom audience");
  }

  async create_saved_audience(input: z.infer<typeof CreateSavedAudienceSchema>): Promise<ToolOutput> {
    if (!input.name) return { error: "No audience name provided" };
    if (!Object.keys(input.targeting).length) return { error: "No targeting specification provided" };

    const accountId = this.accountIdOrThrow(input.account_id);
    const params = compact({
      name: input.name,
      targeting: JSON.stringify(input.targeting),
      description: input.description,
    });
    return this.postOrError(`/${accountId}/saved_audiences`, params, "Failed to create saved audience");
  }

  async get_saved_audience(input: z.infer<typeof SavedAudienceSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.saved_audience_id}`, {
      fields: joinFields(input.fields, DEFAULT_SAVED_AUDIENCE_FIELDS),
    });
  }

  async list_saved_audiences(input: z.infer<typeof ListSavedAudiencesSchema>): Promise<ToolOutput> {
    const accountId = this.accountIdOrThrow(input.account_id);
    return this.api.get(`/${accountId}/saved_audiences`, {
      fields: joinFields(input.fields, DEFAULT_SAVED_AUDIENCE_FIELDS),
      limit: input.limit,
    });
  }

  async delete_saved_audience(input: z.infer<typeof DeleteSavedAudienceSchema>): Promise<ToolOutput> {
    return this.postOrError(
      `/${input.saved_audience_id}`,
      { method: "delete" },
      "Failed to delete saved audience"
    );
  }

  private async changeUsers(
    input: z.infer<typeof AudienceUsersSchema>,
    remove: boolean,
    label: string
  ): Promise<ToolOutput> {
    if (!input.schema.length) return { error: "No schema provided" };
    if (!input.data.length) return { error: "No user data provided" };

    const params = compact({
      payload: JSON.stringify({ schema: input.schema, data: input.data }),
      is_remove: remove ? true : undefined,
    });
    return this.postOrError(`/${input.audience_id}/users`, params, label);
  }

  private async postOrError(path: string, params: GraphParams, label: string): Promise<ToolOutput> {
    try {
      return await this.api.post(path, params);
    } catch (e) {
      return toErrorPayload(label, e, params);
    }
  }
}
