import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { KeywordTableSchema, type KeywordTable } from "../schemas.js";

/** Bundled keyword table shipped with the package */
export const DEFAULT_KEYWORDS_PATH = fileURLToPath(
  new URL("../../data/keywords.json", import.meta.url),
);

/**
 * Reads and validates a keyword table. Throws when the file is missing or
 * does not match KeywordTableSchema; a bad table is a startup failure.
 */
export async function loadKeywordTable(
  path: string = DEFAULT_KEYWORDS_PATH,
): Promise<KeywordTable> {
  const raw = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return KeywordTableSchema.parse(parsed);
}
