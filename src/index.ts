#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import chalk from "chalk";
import { loadConfigFromEnv } from "./config";
import { createLogger } from "./logger";
import { formatSummary, keywordFromArgv } from "./cli";
import { createResearchPipeline, runResearch } from "./pipeline";
import { errorMessage } from "./utils";

async function askKeyword(): Promise<string> {
  const rl = createInterface({ input, output });
  const ans = await rl.question("Enter a search query: ");
  rl.close();
  return ans.trim();
}

async function main() {
  const config = loadConfigFromEnv();
  const logger = createLogger({ level: config.logLevel });

  const q = keywordFromArgv(process.argv) ?? (await askKeyword());
  if (!q) {
    logger.error("A search query is required.");
    process.exitCode = 1;
    return;
  }

  const summary = await runResearch(q, createResearchPipeline(config, logger));
  console.log(formatSummary(summary));
}

main().catch((e: unknown) => {
  console.error(chalk.red("Error:"), errorMessage(e));
  process.exit(1);
});
