// =============================================================================
// @trendwire/shared — JSON file store
// =============================================================================
// Layout under the data directory:
//   latest.json            rolling snapshot, retention-pruned, score desc
//   last_run.json          incremental-fetch marker
//   archive/YYYY-MM.json   monthly append-only shard, never pruned
//
// Reads never throw on bad data: a missing, corrupt or schema-invalid file
// is treated as empty and logged. Invalid items are skipped one by one so
// their valid siblings survive. Writes go to a temp file and are renamed
// into place.
// =============================================================================

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { normalizeUrl } from "../pipeline/deduplicator.js";
import { parsePublishedAt } from "../pipeline/record.js";
import { rankRecords } from "../pipeline/rank.js";
import {
  ArchiveEnvelopeSchema,
  LastRunMarkerSchema,
  NewsRecordSchema,
  SnapshotEnvelopeSchema,
} from "../schemas.js";
import type {
  ArchiveShard,
  LastRunMarker,
  NewsRecord,
  StoreSnapshot,
} from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SaveResult {
  /** Records in the rolling snapshot after the save */
  snapshotTotal: number;
  /** Incoming records newly added to the snapshot */
  added: number;
  /** Incoming records newly appended to this month's archive shard */
  archived: number;
  /** Existing snapshot records removed by retention */
  dropped: number;
}

export const DEFAULT_KEEP_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC calendar month of a timestamp, e.g. "2025-03" */
export function monthKey(at: Date): string {
  return at.toISOString().slice(0, 7);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ---------------------------------------------------------------------------
// JsonStore
// ---------------------------------------------------------------------------

export class JsonStore {
  readonly latestPath: string;
  readonly lastRunPath: string;
  readonly archiveDir: string;

  constructor(
    readonly dataDir: string,
    private readonly logger: Logger,
  ) {
    this.latestPath = join(dataDir, "latest.json");
    this.lastRunPath = join(dataDir, "last_run.json");
    this.archiveDir = join(dataDir, "archive");
  }

  archivePath(month: string): string {
    return join(this.archiveDir, `${month}.json`);
  }

  // -------------------------------------------------------------------------
  // Markers
  // -------------------------------------------------------------------------

  /** True iff no rolling snapshot has been written yet. */
  async isColdStart(): Promise<boolean> {
    return (await this.readText(this.latestPath)) === null;
  }

  async getLastRunTime(): Promise<Date | null> {
    const json = await this.readJson(this.lastRunPath);
    if (json === undefined) return null;

    const parsed = LastRunMarkerSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("Ignoring invalid last-run marker", {
        path: this.lastRunPath,
        error: parsed.error.message,
      });
      return null;
    }
    return new Date(parsed.data.last_run_at);
  }

  async updateLastRunTime(now: Date = new Date()): Promise<void> {
    const marker: LastRunMarker = { last_run_at: now.toISOString() };
    await this.writeAtomic(this.lastRunPath, marker);
  }

  // -------------------------------------------------------------------------
  // Snapshot
  // -------------------------------------------------------------------------

  async loadLatest(): Promise<NewsRecord[]> {
    const json = await this.readJson(this.latestPath);
    if (json === undefined) return [];

    const envelope = SnapshotEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      this.logger.warn("Snapshot is malformed, treating as empty", {
        path: this.latestPath,
        error: envelope.error.message,
      });
      return [];
    }
    return this.validItems(envelope.data.items, this.latestPath);
  }

  async getExistingUrls(): Promise<Set<string>> {
    const records = await this.loadLatest();
    return new Set(records.map((r) => r.url));
  }

  /**
   * Merges `records` into the rolling snapshot and the current month's
   * archive shard. Nothing older than `now - keepDays` survives in the
   * snapshot; records with unparseable dates are kept.
   */
  async save(
    records: readonly NewsRecord[],
    keepDays: number = DEFAULT_KEEP_DAYS,
    now: Date = new Date(),
  ): Promise<SaveResult> {
    await mkdir(this.archiveDir, { recursive: true });

    const cutoff = now.getTime() - keepDays * DAY_MS;
    const withinWindow = (record: NewsRecord): boolean => {
      const published = parsePublishedAt(record.published_at);
      return published === null || published.getTime() >= cutoff;
    };

    const existing = await this.loadLatest();
    const kept = existing.filter(withinWindow);
    const dropped = existing.length - kept.length;

    const seen = new Set(kept.map((r) => normalizeUrl(r.url)));
    let added = 0;
    for (const record of records) {
      const key = normalizeUrl(record.url);
      if (seen.has(key) || !withinWindow(record)) continue;
      seen.add(key);
      kept.push(record);
      added++;
    }

    const items = rankRecords(kept);
    const snapshot: StoreSnapshot = {
      generated_at: now.toISOString(),
      total: items.length,
      items,
    };
    await this.writeAtomic(this.latestPath, snapshot);

    const archived = await this.appendToArchive(records, now);

    this.logger.info("Store saved", {
      snapshotTotal: items.length,
      added,
      archived,
      dropped,
    });
    return { snapshotTotal: items.length, added, archived, dropped };
  }

  // -------------------------------------------------------------------------
  // Archive
  // -------------------------------------------------------------------------

  async loadArchive(month: string): Promise<NewsRecord[]> {
    const path = this.archivePath(month);
    const json = await this.readJson(path);
    if (json === undefined) return [];

    const envelope = ArchiveEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      this.logger.warn("Archive shard is malformed, treating as empty", {
        path,
        error: envelope.error.message,
      });
      return [];
    }
    return this.validItems(envelope.data.items, path);
  }

  private async appendToArchive(
    records: readonly NewsRecord[],
    now: Date,
  ): Promise<number> {
    const month = monthKey(now);
    const items = await this.loadArchive(month);
    const seen = new Set(items.map((r) => normalizeUrl(r.url)));

    let archived = 0;
    for (const record of records) {
      const key = normalizeUrl(record.url);
      if (seen.has(key)) continue;
      seen.add(key);
      items.push(record);
      archived++;
    }

    const shard: ArchiveShard = {
      month,
      last_updated: now.toISOString(),
      total: items.length,
      items,
    };
    await this.writeAtomic(this.archivePath(month), shard);
    return archived;
  }

  // -------------------------------------------------------------------------
  // File helpers
  // -------------------------------------------------------------------------

  private validItems(items: readonly unknown[], path: string): NewsRecord[] {
    const valid: NewsRecord[] = [];
    items.forEach((item, position) => {
      const parsed = NewsRecordSchema.safeParse(item);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        this.logger.warn("Skipping invalid stored record", {
          path,
          position,
          error: parsed.error.message,
        });
      }
    });
    return valid;
  }

  /** File contents, or null when the file does not exist or is unreadable. */
  private async readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn("Failed to read store file", {
          path,
          error: errorMessage(err),
        });
      }
      return null;
    }
  }

  /** Parsed JSON, or undefined when missing, unreadable or not JSON. */
  private async readJson(path: string): Promise<unknown> {
    const text = await this.readText(path);
    if (text === null) return undefined;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      this.logger.warn("Store file is not valid JSON, treating as empty", {
        path,
        error: errorMessage(err),
      });
      return undefined;
    }
  }

  private async writeAtomic(path: string, payload: unknown): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(payload, null, 2) + "\n", "utf8");
    await rename(tmp, path);
  }
}
