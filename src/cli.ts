import process from "node:process";
import ora from "ora";
import { runDigest, type DigestDeps } from "./run-digest";
import { loadConfig } from "@/lib/config";
import { DigestError } from "@/lib/errors";
import { COLORS, GLYPHS, logDetail, logError, logSuccess } from "@/lib/log";
import type { DigestConfig } from "@/lib/types";

export interface CliDeps extends Omit<DigestDeps, "spinner"> {
  loadConfig?: () => Promise<DigestConfig>;
}

/**
 * One scheduled run. Resolves to the process exit code: 0 on success, 1 on
 * any failure.
 */
export async function runCli(deps: CliDeps = {}): Promise<number> {
  const startTime = Date.now();
  const spinner = ora();

  // Keep warnings off the spinner line.
  const restoreWarn = console.warn;
  const originalWarn = console.warn.bind(console);
  console.warn = (...args: unknown[]) => {
    if (spinner.isSpinning) {
      process.stdout.write("\n");
    }
    originalWarn(...args);
  };

  try {
    spinner.start("Loading configuration...");
    const { loadConfig: load = loadConfig, ...digestDeps } = deps;
    const config = await load();
    spinner.succeed(`Configuration loaded (${config.feeds.length} feeds, model: ${config.llm.model})`);

    const result = await runDigest(config, { ...digestDeps, spinner });

    if (!result.published) {
      logDetail(GLYPHS.message, "Dry run: message not posted");
      console.log(`\n${result.message}\n`);
    }

    const seconds = Math.round((Date.now() - startTime) / 1000);
    logSuccess(result.published ? "Digest run completed" : "Dry run completed");
    console.log(`  ${COLORS.detail}${GLYPHS.stats} ${result.storyCount} stories from ${result.itemCount} items${COLORS.reset}`);
    console.log(`  ${COLORS.detail}${GLYPHS.timer} Finished in ${seconds}s${COLORS.reset}\n`);
    return 0;
  } catch (error) {
    spinner.fail("Digest run failed");
    if (error instanceof DigestError) {
      logError(`[${error.stage}] ${error.message}`);
    } else {
      logError("Unexpected failure", error);
    }
    return 1;
  } finally {
    console.warn = restoreWarn;
  }
}
