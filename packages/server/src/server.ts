// =============================================================================
// @trendwire/server — MCP server factory + Express app + Streamable HTTP
// =============================================================================
// Creates an Express application with a health check, bearer authentication,
// rate limiting, and a stateless MCP Streamable HTTP endpoint. Components
// are built by the caller and passed in, so tests can supply fakes.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type Driver,
  type EmbeddingClient,
  type HealthCheckResult,
  type JsonStore,
  type RetrievalAnswerer,
  type ServerConfig,
  type TrendDigest,
  type VectorIndex,
  embeddingHealthCheck,
  errorMessage,
  healthCheck,
} from "@trendwire/shared";
import type { IngestionGuard, IngestionReport } from "@trendwire/worker";
import { createRequestId, logExternalCall, type Logger } from "./logger.js";
import { createAuthMiddleware, createRateLimiter } from "./auth.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Registers MCP tools on a per-request McpServer instance. */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

/**
 * Shared dependencies that tool implementations and the scheduler need.
 */
export interface AppDependencies {
  config: ServerConfig;
  logger: Logger;
  store: JsonStore;
  vectorIndex: VectorIndex;
  answerer: RetrievalAnswerer;
  digest: TrendDigest;
  embeddingClient: EmbeddingClient;
  /** Present only with VECTOR_BACKEND=neo4j */
  driver?: Driver;
  /** One unguarded ingestion batch */
  ingest: () => Promise<IngestionReport>;
  /** Shared by the scheduler and the run_ingestion tool */
  ingestionGuard: IngestionGuard;
}

export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: rate limiter, then the HTTP server. */
  shutdown: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// CORS middleware
// ---------------------------------------------------------------------------

function createCorsMiddleware(origins: string): RequestHandler {
  return (req: Request, res: Response, next) => {
    res.setHeader("Access-Control-Allow-Origin", origins);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization, Mcp-Session-Id",
    );

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

async function timedCheck(
  logger: Logger,
  service: "gemini" | "neo4j",
  check: () => Promise<HealthCheckResult>,
): Promise<HealthCheckResult> {
  const result = await check();
  logExternalCall(logger, service, "health_check", result.latencyMs, result.error);
  return result;
}

function closeHttpServer(httpServer: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    httpServer.close((err) => (err ? reject(err) : resolve()));
  });
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(deps: AppDependencies): AppInstance {
  const { config, logger, driver, embeddingClient } = deps;
  const toolRegistrars: ToolRegistrar[] = [];

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Health endpoint (unauthenticated) ---
  app.get("/health", async (_req: Request, res: Response) => {
    try {
      const [gemini, neo4j] = await Promise.all([
        timedCheck(logger, "gemini", () => embeddingHealthCheck(embeddingClient)),
        driver
          ? timedCheck(logger, "neo4j", () => healthCheck(driver))
          : Promise.resolve(undefined),
      ]);

      const checks = neo4j ? [gemini, neo4j] : [gemini];
      const allOk = checks.every((c) => c.ok);
      const anyOk = checks.some((c) => c.ok);
      const status = allOk ? "ok" : anyOk ? "degraded" : "unhealthy";

      res.status(anyOk ? 200 : 503).json({
        status,
        gemini,
        ...(neo4j && { neo4j }),
        vectorBackend: config.VECTOR_BACKEND,
        ingesting: deps.ingestionGuard.running,
        uptime: process.uptime(),
      });
    } catch (err) {
      logger.error("Health check failed", { error: errorMessage(err) });
      res.status(503).json({ status: "unhealthy", uptime: process.uptime() });
    }
  });

  // --- Auth + Rate limiter for MCP routes ---
  const authMiddleware = createAuthMiddleware(config.API_KEYS);
  const rateLimiter = createRateLimiter(config.RATE_LIMIT_PER_MIN);

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post(
    "/mcp",
    authMiddleware,
    rateLimiter,
    async (req: Request, res: Response) => {
      const requestLogger = logger.child({
        requestId: createRequestId(),
        clientId: req.clientId,
      });
      try {
        const server = new McpServer({ name: "trendwire", version: "0.1.0" });
        const requestDeps: AppDependencies = { ...deps, logger: requestLogger };
        for (const registrar of toolRegistrars) {
          registrar(server, requestDeps);
        }

        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined, // stateless
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        requestLogger.error("MCP request failed", { error: errorMessage(err) });
        if (!res.headersSent) {
          res.status(500).json({ error: "Internal server error" });
        }
      }
    },
  );

  // Stateless: no SSE stream to resume and no session to end.
  const methodNotAllowed: RequestHandler = (_req, res) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  };
  app.route("/mcp").get(methodNotAllowed).delete(methodNotAllowed);

  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");
    rateLimiter.shutdown();

    if (httpServer.listening) {
      await closeHttpServer(httpServer);
    }

    logger.info("HTTP server closed");
  }

  return {
    app,
    httpServer,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}
