import "dotenv/config";
import pino from "pino";
import { OpenAIClient } from "@reelgen/openai-client";
import { isTransientError, type RetryPolicy } from "@reelgen/shared";
import { createApp } from "./app";
import { loadSettings } from "./config";
import { loadReferenceScripts } from "./rag/corpus";
import { EmbeddingService } from "./rag/embed";
import { RetrievalService } from "./rag/retrieve";
import { ScriptGenerator } from "./services/generator";
import { LlmService } from "./services/llm";
import { loadPromptTemplates } from "./services/prompt";

const logger = pino({ level: "info" });

async function main() {
  const settings = loadSettings();
  logger.level = settings.logLevel;

  const client = new OpenAIClient({
    apiKey: settings.openaiApiKey,
    baseUrl: settings.openaiBaseUrl,
    timeoutMs: settings.openaiTimeoutMs,
  });
  const retry: RetryPolicy = {
    ...settings.llmRetry,
    jitterMs: 250,
    isRetryable: isTransientError,
  };

  const retrieval = await RetrievalService.open({
    embedder: new EmbeddingService(client, settings.embeddingModel),
    documents: loadReferenceScripts(),
    indexPath: settings.indexPath,
    topK: settings.topK,
    logger,
  });
  const writer = new LlmService({
    client,
    templates: loadPromptTemplates(),
    model: settings.llmModel,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    retry,
    logger,
  });
  const generator = new ScriptGenerator({
    retrieval,
    writer,
    logger,
    maxAttempts: settings.generationMaxAttempts,
    retry,
  });

  const app = createApp({ generator, retrieval, logger, settings });
  const server = app.listen(settings.port, () =>
    logger.info({ port: settings.port, model: settings.llmModel }, "API listening"),
  );
  server.requestTimeout = settings.requestTimeoutMs;

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    server.close((err) => {
      if (err) logger.error({ err }, "shutdown.close_failed");
      process.exit(err ? 1 : 0);
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, "startup_failed");
  process.exit(1);
});
