import { loadConfig } from "./config/env";
import { createApp } from "./app";
import { createGeminiGenerator } from "./llm/gemini";
import { RetryingTextGenerator } from "./llm/retryingGenerator";
import { McqPipeline } from "./pipeline/McqPipeline";
import { logger } from "./utils/logger";

const config = loadConfig();

const generator = new RetryingTextGenerator(createGeminiGenerator(config), config.retry);
const pipeline = new McqPipeline(config, { generator });
const app = createApp(config, pipeline);

app.listen(config.port, () =>
  logger.info({ port: config.port, model: config.geminiModel }, "Server listening")
);
