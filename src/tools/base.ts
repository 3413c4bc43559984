import { z } from "zod";
import type { MetaApi } from "../meta.js";
import type { MetaConfig } from "../types.js";
import { normalizeAccountId } from "../utils.js";

export const TimeRangeSchema = z.object({
  since: z.string().describe("YYYY-MM-DD"),
  until: z.string().describe("YYYY-MM-DD"),
});

export const StatusSchema = z.enum(["ACTIVE", "PAUSED", "ARCHIVED", "DELETED"]);

export abstract class ToolGroup {
  constructor(protected api: MetaApi, protected cfg: MetaConfig) {}

  // --- helper: normalize ad account id ---
  protected accountIdOrThrow(adAccountId?: string): string {
    const raw = adAccountId || this.cfg.adAccountId;
    if (!raw || !raw.trim()) {
      throw new Error(
        "An ad account id is required. Set META_AD_ACCOUNT_ID in .env or pass it in the tool input."
      );
    }
    return normalizeAccountId(raw);
  }
}
