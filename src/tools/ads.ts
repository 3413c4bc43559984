import { z } from "zod";
import { batchPost, isBatchSuccess } from "../batch.js";
import { toErrorPayload } from "../errors.js";
import type { GraphParams, JsonObject, ToolOutput } from "../types.js";
import { JsonObjectSchema, compact } from "../utils.js";
import { StatusSchema, ToolGroup } from "./base.js";
import { batchErrorMessage } from "./batchQueries.js";

const TrackingSpecsSchema = z.array(JsonObjectSchema).describe("Tracking specs, e.g. pixel or app event tracking");

export const CreateCatalogAdSchema = z.object({
  act_id: z.string(),
  name: z.string(),
  adset_id: z.string(),
  creative_id: z.string(),
  status: StatusSchema.default("PAUSED"),
  tracking_specs: TrackingSpecsSchema.optional(),
});

export const CreateCatalogCreativeSchema = z.object({
  act_id: z.string(),
  facebook_page_id: z.string(),
  name: z.string(),
  product_set_id: z.string(),
  link: z.string(),
  message: z.string(),
  headline: z.string(),
  caption: z.string(),
  instagram_user_id: z.string().optional(),
  call_to_action: z.string().default("SHOP_NOW"),
  template_format: z.string().default("carousel_images_multi_items"),
  multi_share_end_card: z.boolean().default(false),
  enable_dco: z.boolean().default(false).describe("Let Meta adapt images and text per viewer"),
  adv_image_template: z.boolean().default(true),
  adv_image_touchups: z.boolean().default(true),
  adv_text_optimizations: z.boolean().default(true),
  adv_inline_comment: z.boolean().default(true),
  adv_video_auto_crop: z.boolean().default(true),
});

export const EditAdSchema = z.object({
  ad_id: z.string(),
  name: z.string().optional(),
  status: StatusSchema.optional(),
  adset_id: z.string().optional(),
  creative_id: z.string().optional(),
  tracking_specs: TrackingSpecsSchema.optional(),
});

export const BulkStatusSchema = z.object({
  object_ids: z.array(z.string()),
  object_type: z.enum(["ads", "adsets", "campaigns"]),
  status: StatusSchema,
});

const enrollment = (on: boolean): JsonObject => ({ enroll_status: on ? "OPT_IN" : "OPT_OUT" });

export function creativeFeatures(input: z.infer<typeof CreateCatalogCreativeSchema>): JsonObject {
  return {
    creative_features_spec: {
      image_template: enrollment(input.adv_image_template),
      image_touchups: enrollment(input.adv_image_touchups),
      text_optimizations: enrollment(input.adv_text_optimizations),
      inline_comment: enrollment(input.adv_inline_comment),
      video_auto_crop: enrollment(input.adv_video_auto_crop),
    },
  };
}

export class AdTools extends ToolGroup {
  async create_ad_with_catalog_creative(input: z.infer<typeof CreateCatalogAdSchema>): Promise<ToolOutput> {
    const missing = (["name", "adset_id", "creative_id"] as const).filter((key) => !input[key]);
    if (missing.length) return { error: `Missing required fields: ${missing.join(", ")}` };

    const accountId = this.accountIdOrThrow(input.act_id);
    const params = compact({
      name: input.name,
      adset_id: input.adset_id,
      status: input.status,
      creative: JSON.stringify({ creative_id: input.creative_id }),
      tracking_specs: input.tracking_specs ? JSON.stringify(input.tracking_specs) : undefined,
    });
    return this.postOrError(`/${accountId}/ads`, params, "Failed to create ad");
  }

  async create_catalog_creative(input: z.infer<typeof CreateCatalogCreativeSchema>): Promise<ToolOutput> {
    const accountId = this.accountIdOrThrow(input.act_id);

    const storySpec: JsonObject = {
      page_id: input.facebook_page_id,
      template_data: {
        link: input.link,
        call_to_action: { type: input.call_to_action },
        format_option: input.template_format,
        multi_share_end_card: input.multi_share_end_card,
        message: input.message,
        name: input.headline,
        caption: input.caption,
      },
    };
    if (input.instagram_user_id) storySpec.instagram_user_id = input.instagram_user_id;

    const params = compact({
      name: input.name,
      object_story_spec: JSON.stringify(storySpec),
      product_set_id: input.product_set_id,
      degrees_of_freedom_spec: input.enable_dco ? JSON.stringify(creativeFeatures(input)) : undefined,
    });
    return this.postOrError(`/${accountId}/adcreatives`, params, "Failed to create catalog creative");
  }

  async edit_ad(input: z.infer<typeof EditAdSchema>): Promise<ToolOutput> {
    const params = compact({
      name: input.name,
      status: input.status,
      adset_id: input.adset_id,
      creative: input.creative_id ? JSON.stringify({ creative_id: input.creative_id }) : undefined,
      tracking_specs: input.tracking_specs ? JSON.stringify(input.tracking_specs) : undefined,
    });
    if (!Object.keys(params).length) {
      return { error: "No fields provided to update. Please specify at least one field to edit." };
    }
    return this.postOrError(`/${input.ad_id}`, params, "Failed to edit ad");
  }

  // One batched POST per 50 objects; each object succeeds or fails on its own.
  async bulk_update_status(input: z.infer<typeof BulkStatusSchema>): Promise<ToolOutput> {
    const ids = input.object_ids.map((id) => id.trim()).filter(Boolean);
    if (!ids.length) return { error: "object_ids list cannot be empty" };

    const responses = await this.api.batch(ids.map((id) => batchPost(id, "", { status: input.status })));

    const succeeded: JsonObject[] = [];
    const failed: JsonObject[] = [];
    responses.forEach((res, i) => {
      if (isBatchSuccess(res)) {
        succeeded.push({ id: ids[i], success: true, type: input.object_type, new_status: input.status });
      } else {
        failed.push({ id: ids[i], error: batchErrorMessage(res), type: input.object_type });
      }
    });

    return {
      summary: {
        total_objects: ids.length,
        successful_updates: succeeded.length,
        failed_updates: failed.length,
        object_type: input.object_type,
        status_set: input.status,
      },
      successful_updates: succeeded,
      failed_updates: failed,
    };
  }

  private async postOrError(path: string, params: GraphParams, label: string): Promise<ToolOutput> {
    try {
      return await this.api.post(path, params);
    } catch (e) {
      return toErrorPayload(label, e, params);
    }
  }
}
