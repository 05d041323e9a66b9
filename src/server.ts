// src/server.ts
import dotenv from "dotenv";

import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { ConfigError } from "./errors";
import { OpenAIModelInvoker } from "./services/openaiModel";
import { createAnalysisPipeline, probeModel } from "./services/analysisPipeline";
import { PdfTextExtractor } from "./services/pdfText";

dotenv.config();

function readConfigOrExit(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (e: unknown) {
    if (e instanceof ConfigError) {
      console.error("❌ Missing or invalid environment variables:");
      for (const problem of e.problems) console.error(`   - ${problem}`);
      console.error("Set them in your .env file or environment (see .env.example).");
      process.exit(1);
    }
    throw e;
  }
}

async function main() {
  const config = readConfigOrExit();
  const invoker = new OpenAIModelInvoker(config.ai);

  if (config.ai.startupProbe) {
    await probeModel(invoker);
  }

  const app = createApp({
    config,
    analyzer: createAnalysisPipeline(config, invoker),
    extractor: new PdfTextExtractor(),
  });

  // ============================
  // Start server
  // ============================
  app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}`);
    console.log(`   model: ${config.ai.model}, max attempts: ${config.ai.maxAttempts}`);
  });
}

main().catch((e: unknown) => {
  console.error("❌ Failed to start server:", e);
  process.exit(1);
});
