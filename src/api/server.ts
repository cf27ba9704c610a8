import { loadConfigFromEnv } from "../config";
import { createLogger } from "../logger";
import { createResearchPipeline, runResearch } from "../pipeline";
import { createApp } from "./app";

const config = loadConfigFromEnv();
const logger = createLogger({ level: config.logLevel, scope: "API" });

const app = createApp({
  outputDir: config.outputDir,
  run: ({ query, delayMs, limit, topN }) =>
    runResearch(
      query,
      createResearchPipeline(
        {
          ...config,
          extractionDelayMs: delayMs ?? config.extractionDelayMs,
          searchResultLimit: limit ?? config.searchResultLimit,
          reportTopN: topN ?? config.reportTopN,
        },
        logger
      )
    ),
});

app.listen(config.port, () => {
  logger.info(`listening on http://localhost:${config.port}`);
  logger.info(`files served from: ${config.outputDir}`);
});
