// Wellness Retention Engine - Entry point
// Loads configuration, wires the OpenAI-backed services into the registry and
// starts the HTTP server.

import "dotenv/config";
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createChatClient, createEmbeddingsClient } from "./openai-clients.js";
import { APP_NAME, APP_VERSION, createAppServer } from "./server.js";
import { createServiceRegistry } from "./service-registry.js";
import { describeError } from "./utils.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) logFatal(issue);
    logFatal("Make sure your .env file contains: OPENAI_API_KEY=your_key_here");
  } else {
    logFatal(describeError(err));
  }
  process.exit(1);
}

logInit("Configuration loaded");

// ─── Wiring ─────────────────────────────────────────────────────────────────────

logInit("Creating OpenAI client...");
const openai = new OpenAI({ apiKey: config.openaiApiKey });

logInit(`Wiring services (embeddings: ${config.embeddingModel}, coach: ${config.coachModel})...`);
const registry = createServiceRegistry(config, {
  embeddings: createEmbeddingsClient(openai),
  chat: createChatClient(openai),
});

const server = createAppServer({ registry });

// ─── Start ──────────────────────────────────────────────────────────────────────

server
  .listen(config.port, config.host)
  .then((port) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://${config.host}:${port}`);
    logInit("Models load on first request; GET /api/v1/models/health to warm them up");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${describeError(err)}`);
    process.exit(1);
  });

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down...`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Error during shutdown: ${describeError(err)}`);
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
