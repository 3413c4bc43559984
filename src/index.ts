#!/usr/bin/env node
import dotenv from "dotenv";
import { loadConfig } from "./config.js";
import { startServer } from "./server.js";

dotenv.config();

const loaded = loadConfig(process.env);
if (!loaded.ok) {
  for (const problem of loaded.problems) console.error(`Invalid configuration: ${problem}`);
  process.exit(1);
}

const cfg = loaded.config;

if (!cfg.adAccountId) {
  console.warn(
    "META_AD_ACCOUNT_ID is recommended (format: act_XXXXXXXXXXXX). You can still call list_ad_accounts to discover accounts."
  );
}

startServer(cfg).catch((err) => {
  console.error("Failed to start MCP server:", err);
  process.exit(1);
});
