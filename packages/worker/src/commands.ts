// =============================================================================
// @trendwire/worker — CLI command implementations
// =============================================================================
// Each command writes human-readable text to `out`; logs go to the logger's
// own sink. Kept apart from cli.ts so they can run against fakes.
// =============================================================================

import { createInterface } from "node:readline";
import {
  EMPTY_QUESTION_MESSAGE,
  NO_DATA_MESSAGE,
  type JsonStore,
  type LogSink,
  type NewsRecord,
  type RetrievalAnswerer,
  type TrendDigest,
  type VectorIndex,
} from "@trendwire/shared";
import type { IngestionReport } from "./ingest.js";

export const EXIT_WORDS: ReadonlySet<string> = new Set(["q", "exit", "quit"]);
const PROMPT = "\n? ";

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatReport(report: IngestionReport): string {
  const lines = [
    `Ingestion ${report.coldStart ? "(cold start) " : ""}since ${report.since}`,
  ];
  for (const source of report.sources) {
    lines.push(
      source.error
        ? `  ${source.name}: failed (${source.error})`
        : `  ${source.name}: ${source.fetched} fetched`,
    );
  }
  lines.push(
    `Fetched ${report.fetched}, kept ${report.processed} after pipeline, ${report.breaking} breaking`,
  );
  if (report.saved) {
    const { snapshotTotal, added, archived, dropped } = report.saved;
    lines.push(
      `Snapshot: ${snapshotTotal} records (+${added}, -${dropped} expired); archived ${archived}`,
    );
  } else {
    lines.push("Nothing new to save");
  }
  lines.push(
    report.indexError
      ? `Indexing failed: ${report.indexError}`
      : `Indexed ${report.indexed} records`,
  );
  lines.push(`Done in ${(report.durationMs / 1000).toFixed(1)}s`);
  return lines.join("\n") + "\n";
}

/** `  1. [88.5] [llm] Title (source, YYYY-MM-DD)` then the URL */
export function formatRecords(records: readonly NewsRecord[]): string {
  if (records.length === 0) return "No records in the snapshot yet.\n";
  return (
    records
      .map((r, i) => {
        const flag = r.is_breaking_change ? " BREAKING" : "";
        return (
          `${String(i + 1).padStart(3)}. [${r.score.toFixed(1)}] [${r.category}]${flag} ` +
          `${r.title} (${r.source}, ${r.published_at.slice(0, 10)})\n     ${r.url}`
        );
      })
      .join("\n") + "\n"
  );
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export async function latestCommand(
  store: JsonStore,
  limit: number,
  out: LogSink,
): Promise<void> {
  const records = await store.loadLatest();
  out.write(formatRecords(records.slice(0, limit)));
}

export async function statsCommand(
  deps: { store: JsonStore; vectorIndex: VectorIndex },
  out: LogSink,
): Promise<void> {
  const [records, indexed, lastRun] = await Promise.all([
    deps.store.loadLatest(),
    deps.vectorIndex.count(),
    deps.store.getLastRunTime(),
  ]);
  out.write(
    [
      `Snapshot records: ${records.length}`,
      `Breaking changes: ${records.filter((r) => r.is_breaking_change).length}`,
      `Indexed records:  ${indexed}`,
      `Last run:         ${lastRun ? lastRun.toISOString() : "never"}`,
    ].join("\n") + "\n",
  );
}

/** Streams the trend digest of the current snapshot. */
export async function digestCommand(
  digest: TrendDigest,
  out: LogSink,
): Promise<void> {
  await digest.digestStream((chunk) => out.write(chunk));
  out.write("\n");
}

export interface AskDeps {
  vectorIndex: VectorIndex;
  answerer: RetrievalAnswerer;
}

async function answerOnce(
  answerer: RetrievalAnswerer,
  question: string,
  out: LogSink,
): Promise<void> {
  await answerer.askStream(question, (chunk) => out.write(chunk));
  out.write("\n");
}

/**
 * One-shot when `question` is given, otherwise a prompt loop over `input`
 * until EOF or an exit word.
 */
export async function askCommand(
  deps: AskDeps,
  question: string | undefined,
  io: { input: NodeJS.ReadableStream; out: LogSink },
): Promise<void> {
  if ((await deps.vectorIndex.count()) === 0) {
    io.out.write(NO_DATA_MESSAGE + "\n");
    return;
  }

  if (question !== undefined) {
    await answerOnce(deps.answerer, question, io.out);
    return;
  }

  const rl = createInterface({ input: io.input, terminal: false });
  io.out.write(`Ask about recent AI news (${[...EXIT_WORDS].join("/")} to leave)`);
  io.out.write(PROMPT);
  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (EXIT_WORDS.has(trimmed.toLowerCase())) break;
      if (trimmed) {
        await answerOnce(deps.answerer, trimmed, io.out);
      } else {
        io.out.write(EMPTY_QUESTION_MESSAGE + "\n");
      }
      io.out.write(PROMPT);
    }
  } finally {
    rl.close();
  }
}
