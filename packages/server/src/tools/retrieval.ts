// =============================================================================
// @trendwire/server — Retrieval tools
// =============================================================================
// ask_question     grounded answer from the vector index + completion service
// search_records   raw top-k semantic search hits
// latest_records   ranked snapshot, optionally filtered
// explain_score    the five scoring terms behind one stored record
// =============================================================================

import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  AskQuestionInput,
  ExplainScoreInput,
  LatestRecordsInput,
  SearchRecordsInput,
  errorMessage,
  explainScore,
  scoredAt,
  normalizeUrl,
  type NewsRecord,
  type SearchHit,
} from "@trendwire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { logToolCall } from "../logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_LATEST_LIMIT = 20;

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatHit(hit: SearchHit, position: number): string {
  return [
    `## [${position}] ${hit.title} (similarity: ${hit.similarity.toFixed(3)})`,
    `- Category: ${hit.category} | Score: ${hit.score.toFixed(1)}`,
    `- Source: ${hit.source} | Published: ${hit.published_at.slice(0, 10)}`,
    `- URL: ${hit.url}`,
    hit.content,
  ].join("\n");
}

export function selectLatest(
  records: readonly NewsRecord[],
  input: LatestRecordsInput,
): NewsRecord[] {
  return records
    .filter((r) => !input.category || r.category === input.category)
    .filter((r) => !input.source_type || r.source_type === input.source_type)
    .filter((r) => !input.breaking_only || r.is_breaking_change)
    .slice(0, input.limit ?? DEFAULT_LATEST_LIMIT);
}

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

function errorResult(text: string) {
  return { content: [{ type: "text" as const, text }], isError: true };
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerRetrievalTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { answerer, digest, vectorIndex, store, config, logger } = deps;

  // -------------------------------------------------------------------------
  // ask_question: RAG answer; degraded outcomes come back as plain text
  // -------------------------------------------------------------------------
  server.tool("ask_question", AskQuestionInput.shape, async (input) => {
    const start = performance.now();
    const answer = await answerer.ask(input.question);
    logToolCall(logger, "ask_question", input, performance.now() - start);
    return textResult(answer);
  });

  // -------------------------------------------------------------------------
  // trend_digest: briefing over the high-scoring snapshot records
  // -------------------------------------------------------------------------
  server.tool(
    "trend_digest",
    "Summarize the 3 to 5 most important recent developments from the snapshot, flagging breaking changes",
    {},
    async () => {
      const start = performance.now();
      const text = await digest.digest();
      logToolCall(logger, "trend_digest", {}, performance.now() - start);
      return textResult(text);
    },
  );

  // -------------------------------------------------------------------------
  // search_records: semantic search without generation
  // -------------------------------------------------------------------------
  server.tool("search_records", SearchRecordsInput.shape, async (input) => {
    const start = performance.now();
    const { query, top_k = config.RAG_TOP_K } = input;

    try {
      const hits = await vectorIndex.search(query, top_k);
      logToolCall(logger, "search_records", input, performance.now() - start);

      if (hits.length === 0) {
        return textResult(
          "No indexed records match this query. Run ingestion first if the index is empty.",
        );
      }
      return textResult(hits.map((h, i) => formatHit(h, i + 1)).join("\n\n"));
    } catch (err) {
      const errorMsg = errorMessage(err);
      logToolCall(
        logger,
        "search_records",
        input,
        performance.now() - start,
        errorMsg,
      );
      return errorResult(`Error: Failed to search records: ${errorMsg}`);
    }
  });

  // -------------------------------------------------------------------------
  // latest_records: top of the rolling snapshot
  // -------------------------------------------------------------------------
  server.tool("latest_records", LatestRecordsInput.shape, async (input) => {
    const start = performance.now();
    try {
      const records = selectLatest(await store.loadLatest(), input);
      logToolCall(logger, "latest_records", input, performance.now() - start);
      return textResult(JSON.stringify(records, null, 2));
    } catch (err) {
      const errorMsg = errorMessage(err);
      logToolCall(
        logger,
        "latest_records",
        input,
        performance.now() - start,
        errorMsg,
      );
      return errorResult(`Error: Failed to load snapshot: ${errorMsg}`);
    }
  });

  // -------------------------------------------------------------------------
  // explain_score: per-term audit of a stored record
  // -------------------------------------------------------------------------
  server.tool("explain_score", ExplainScoreInput.shape, async (input) => {
    const start = performance.now();
    try {
      const key = normalizeUrl(input.url);
      const record = (await store.loadLatest()).find(
        (r) => normalizeUrl(r.url) === key,
      );
      logToolCall(logger, "explain_score", input, performance.now() - start);

      if (!record) {
        return errorResult(`Error: No record with URL ${input.url} in the snapshot`);
      }
      // Records saved before scored_at existed are explained as if re-scored now.
      const stamped = scoredAt(record);
      const explainedAt = stamped ?? new Date();
      return textResult(
        JSON.stringify(
          {
            title: record.title,
            url: record.url,
            storedScore: record.score,
            explainedAt: explainedAt.toISOString(),
            basis: stamped ? "scored_at" : "rescored_now",
            breakdown: explainScore(record, explainedAt),
          },
          null,
          2,
        ),
      );
    } catch (err) {
      const errorMsg = errorMessage(err);
      logToolCall(
        logger,
        "explain_score",
        input,
        performance.now() - start,
        errorMsg,
      );
      return errorResult(`Error: Failed to explain score: ${errorMsg}`);
    }
  });
};
