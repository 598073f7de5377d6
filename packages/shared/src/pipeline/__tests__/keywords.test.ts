import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadKeywordTable } from "../keywords.js";
import { DETECTABLE_CATEGORIES } from "../../types.js";

describe("loadKeywordTable", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "trendwire-keywords-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the bundled table with every detectable category", async () => {
    const table = await loadKeywordTable();
    for (const category of DETECTABLE_CATEGORIES) {
      expect(table[category]?.length).toBeGreaterThan(0);
    }
  });

  it("lower-cases and dedupes keywords, keeping group order", async () => {
    const path = join(dir, "keywords.json");
    await writeFile(
      path,
      JSON.stringify({ llm: ["GPT", "gpt", "Claude"], agent: ["MCP"] }),
    );
    const table = await loadKeywordTable(path);
    expect(Object.keys(table)).toEqual(["llm", "agent"]);
    expect(table).toEqual({ llm: ["gpt", "claude"], agent: ["mcp"] });
  });

  it("rejects a table that is not a map of string lists", async () => {
    const path = join(dir, "keywords.json");
    await writeFile(path, JSON.stringify({ llm: "gpt" }));
    await expect(loadKeywordTable(path)).rejects.toThrow();
  });
});
