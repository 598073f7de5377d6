// =============================================================================
// @trendwire/server — Entry point
// =============================================================================
// Loads config, builds the shared runtime, creates the Express + MCP server,
// starts the ingestion scheduler and listens.
// =============================================================================

import { ZodError } from "zod";
import { errorMessage, loadServerConfig, type ServerConfig } from "@trendwire/shared";
import {
  createIngestionGuard,
  createRuntime,
  ingestionDeps,
  ingestionOptions,
  runIngestion,
} from "@trendwire/worker";
import { createApp } from "./server.js";
import { createLogger } from "./logger.js";
import { registerIngestionTools } from "./tools/ingestion.js";
import { registerRetrievalTools } from "./tools/retrieval.js";
import { startScheduler } from "./scheduler.js";

let config: ServerConfig;
try {
  config = loadServerConfig();
} catch (err) {
  if (err instanceof ZodError) {
    process.stderr.write("Invalid configuration:\n");
    for (const issue of err.issues) {
      process.stderr.write(`  ${issue.path.join(".")}: ${issue.message}\n`);
    }
  } else {
    process.stderr.write(`Invalid configuration: ${errorMessage(err)}\n`);
  }
  process.exit(1);
}

const logger = createLogger({ level: config.LOG_LEVEL, sink: process.stdout });
const runtime = await createRuntime(config, logger);

const instance = createApp({
  config,
  logger,
  store: runtime.store,
  vectorIndex: runtime.vectorIndex,
  answerer: runtime.answerer,
  digest: runtime.digest,
  embeddingClient: runtime.embeddingClient,
  driver: runtime.driver,
  ingest: () => runIngestion(ingestionDeps(runtime), ingestionOptions(config)),
  ingestionGuard: createIngestionGuard(),
});
const { httpServer, deps, shutdown } = instance;

instance.addToolRegistrar(registerIngestionTools);
instance.addToolRegistrar(registerRetrievalTools);

const scheduler = startScheduler(deps);

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Trendwire MCP server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    rateLimitPerMin: config.RATE_LIMIT_PER_MIN,
    vectorBackend: config.VECTOR_BACKEND,
  });
});

// Signal handlers live here, not in createApp, so tests can build many apps.
function handleShutdown() {
  scheduler.stop();
  shutdown()
    .then(() => runtime.close())
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);

export type { ToolRegistrar, AppDependencies, AppInstance } from "./server.js";
export { createApp } from "./server.js";
