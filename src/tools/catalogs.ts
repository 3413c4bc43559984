import { z } from "zod";
import type { GraphParams, ToolOutput } from "../types.js";
import { JsonObjectSchema, joinFields } from "../utils.js";
import { ToolGroup } from "./base.js";

const CATALOG_FIELDS = ["id", "name", "product_count", "vertical"];
const CATALOG_DETAIL_FIELDS = ["id", "name", "business", "product_count", "vertical"];
const PRODUCT_SET_FIELDS = ["id", "name", "filter", "product_count"];

const PRODUCT_LIST_FIELDS = [
  "id",
  "name",
  "description",
  "price",
  "url",
  "image_url",
  "brand",
  "availability",
  "retailer_id",
];

const PRODUCT_DETAIL_FIELDS = [
  ...PRODUCT_LIST_FIELDS,
  "condition",
  "product_type",
  "inventory",
  "sale_price",
];

const SET_PRODUCT_FIELDS = ["id", "name", "description", "price", "url", "image_url", "brand", "availability"];

const PageShape = {
  fields: z.array(z.string()).optional(),
  limit: z.number().int().positive().default(25),
  after: z.string().optional(),
  before: z.string().optional(),
};

export const ListCatalogsSchema = z.object({ business_id: z.string(), ...PageShape });
export const CatalogSchema = z.object({ catalog_id: z.string(), fields: z.array(z.string()).optional() });
export const FetchProductsSchema = z.object({
  catalog_id: z.string(),
  ...PageShape,
  filtering: JsonObjectSchema.optional().describe('Product filter, e.g. {"availability": {"eq": "in stock"}}'),
});
export const ProductSchema = z.object({ product_id: z.string(), fields: z.array(z.string()).optional() });
export const FetchProductSetsSchema = z.object({ catalog_id: z.string(), ...PageShape });
export const ProductSetSchema = z.object({ product_set_id: z.string(), fields: z.array(z.string()).optional() });
export const ProductSetProductsSchema = z.object({ product_set_id: z.string(), ...PageShape });

type PageInput = { fields?: string[]; limit: number; after?: string; before?: string };

const pageParams = (input: PageInput, defaults: readonly string[]): GraphParams => ({
  fields: joinFields(input.fields, defaults),
  limit: input.limit,
  after: input.after,
  before: input.before,
});

export class CatalogTools extends ToolGroup {
  async list_catalogs(input: z.infer<typeof ListCatalogsSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.business_id}/owned_product_catalogs`, pageParams(input, CATALOG_FIELDS));
  }

  async get_catalog_details(input: z.infer<typeof CatalogSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.catalog_id}`, { fields: joinFields(input.fields, CATALOG_DETAIL_FIELDS) });
  }

  async fetch_products(input: z.infer<typeof FetchProductsSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.catalog_id}/products`, {
      ...pageParams(input, PRODUCT_LIST_FIELDS),
      filter: input.filtering ? JSON.stringify(input.filtering) : undefined,
    });
  }

  async get_product_details(input: z.infer<typeof ProductSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.product_id}`, { fields: joinFields(input.fields, PRODUCT_DETAIL_FIELDS) });
  }

  async fetch_product_sets(input: z.infer<typeof FetchProductSetsSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.catalog_id}/product_sets`, pageParams(input, PRODUCT_SET_FIELDS));
  }

  async get_product_set_details(input: z.infer<typeof ProductSetSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.product_set_id}`, { fields: joinFields(input.fields, PRODUCT_SET_FIELDS) });
  }

  async fetch_products_in_product_set(input: z.infer<typeof ProductSetProductsSchema>): Promise<ToolOutput> {
    return this.api.get(`/${input.product_set_id}/products`, pageParams(input, SET_PRODUCT_FIELDS));
  }
}
