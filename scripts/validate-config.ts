#!/usr/bin/env tsx

/**
 * Validation script for .env, config.yml and feeds.yml
 *
 * Usage:
 *   npx tsx scripts/validate-config.ts
 *
 * Loads the configuration exactly as a digest run would, without contacting
 * any feed, the model API or Telegram.
 */

import process from "node:process";
import { loadConfig } from "../src/lib/config";
import { ConfigError } from "../src/lib/errors";

async function main(): Promise<number> {
  console.log("🔍 Validating configuration...\n");

  try {
    const config = await loadConfig();
    console.log("✅ Configuration is valid!\n");
    console.log(`  Feeds:    ${config.feeds.length}`);
    console.log(`  Model:    ${config.llm.model} (${config.llm.baseUrl})`);
    console.log(`  Channel:  ${config.telegram.channelId}`);
    console.log(`  Window:   last ${config.digest.windowHours}h, up to ${config.digest.maxArticles} articles`);
    console.log(`  Stories:  ${config.digest.minStories}–${config.digest.maxStories}`);
    console.log(`  Dry run:  ${config.dryRun ? "yes" : "no"}\n`);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("❌ Validation errors found:\n");
      error.issues.forEach((issue) => {
        console.error(`  ${issue}`);
      });
      console.error("");
      return 1;
    }
    throw error;
  }
}

process.exit(await main());
