// =============================================================================
// @trendwire/server — Ingestion tools: run_ingestion, pipeline_status
// =============================================================================
// runIngestionJob and getPipelineStatus are exported so the cron scheduler
// can call them directly without going through MCP.
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, type Category } from "@trendwire/shared";
import {
  IngestionInProgressError,
  type IngestionReport,
} from "@trendwire/worker";
import type { AppDependencies, ToolRegistrar } from "../server.js";
import { logToolCall } from "../logger.js";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface PipelineStatus {
  ingesting: boolean;
  lastRunAt: string | null;
  coldStart: boolean;
  snapshot: {
    total: number;
    breaking: number;
    byCategory: Record<Category, number>;
  };
  indexed: number;
  vectorBackend: "file" | "neo4j";
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/** One ingestion batch; rejects with IngestionInProgressError if busy. */
export async function runIngestionJob(
  deps: AppDependencies,
): Promise<IngestionReport> {
  return deps.ingestionGuard.run(() => deps.ingest());
}

export async function getPipelineStatus(
  deps: AppDependencies,
): Promise<PipelineStatus> {
  const { store, vectorIndex, config } = deps;
  const [records, indexed, lastRun, coldStart] = await Promise.all([
    store.loadLatest(),
    vectorIndex.count(),
    store.getLastRunTime(),
    store.isColdStart(),
  ]);

  const byCategory: Record<Category, number> = {
    framework: 0,
    llm: 0,
    rag: 0,
    agent: 0,
    workflow: 0,
    paper: 0,
    other: 0,
  };
  for (const r of records) byCategory[r.category] += 1;

  return {
    ingesting: deps.ingestionGuard.running,
    lastRunAt: lastRun ? lastRun.toISOString() : null,
    coldStart,
    snapshot: {
      total: records.length,
      breaking: records.filter((r) => r.is_breaking_change).length,
      byCategory,
    },
    indexed,
    vectorBackend: config.VECTOR_BACKEND,
  };
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerIngestionTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { logger } = deps;

  server.tool(
    "run_ingestion",
    "Fetch all enabled sources, score the new items, persist them and index them for retrieval",
    {},
    async () => {
      const start = performance.now();
      try {
        const report = await runIngestionJob(deps);
        logToolCall(logger, "run_ingestion", {}, performance.now() - start);
        return {
          content: [
            { type: "text" as const, text: JSON.stringify(report, null, 2) },
          ],
        };
      } catch (err) {
        const errorMsg = errorMessage(err);
        logToolCall(
          logger,
          "run_ingestion",
          {},
          performance.now() - start,
          errorMsg,
        );
        const text =
          err instanceof IngestionInProgressError
            ? "Error: An ingestion run is already in progress. Try again when it finishes."
            : `Error: Ingestion failed: ${errorMsg}`;
        return { content: [{ type: "text" as const, text }], isError: true };
      }
    },
  );

  server.tool(
    "pipeline_status",
    "Snapshot size, category breakdown, index size and last run time",
    {},
    async () => {
      const start = performance.now();
      try {
        const status = await getPipelineStatus(deps);
        logToolCall(logger, "pipeline_status", {}, performance.now() - start);
        return {
          content: [
            { type: "text" as const, text: JSON.stringify(status, null, 2) },
          ],
        };
      } catch (err) {
        const errorMsg = errorMessage(err);
        logToolCall(
          logger,
          "pipeline_status",
          {},
          performance.now() - start,
          errorMsg,
        );
        return {
          content: [
            {
              type: "text" as const,
              text: `Error: Failed to read pipeline status: ${errorMsg}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
};
