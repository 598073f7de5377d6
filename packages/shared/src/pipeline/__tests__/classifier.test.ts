import { describe, it, expect } from "vitest";
import {
  classify,
  detectCategory,
  extractTags,
  isBreakingChange,
} from "../classifier.js";
import type { KeywordTable } from "../../schemas.js";
import { makeRecord } from "../../__tests__/helpers.js";

const table: KeywordTable = {
  framework: ["langchain", "llamaindex"],
  llm: ["gpt", "llama"],
  rag: ["embedding"],
  agent: ["agent"],
  workflow: ["workflow"],
};

describe("detectCategory", () => {
  it("returns the first group in priority order that matches", () => {
    expect(detectCategory("langchain adds gpt-5 support", table)).toBe(
      "framework",
    );
    expect(detectCategory("new embedding model for agent memory", table)).toBe(
      "rag",
    );
  });

  it("falls back to other when nothing matches", () => {
    expect(detectCategory("quarterly earnings call", table)).toBe("other");
  });

  it("treats a missing group as empty", () => {
    expect(detectCategory("workflow tips", { agent: ["agent"] })).toBe("other");
  });
});

describe("isBreakingChange", () => {
  it("matches any of the breaking phrases", () => {
    expect(isBreakingChange("v2 ships with breaking changes")).toBe(true);
    expect(isBreakingChange("the old client is deprecated")).toBe(true);
    expect(isBreakingChange("python 3.8 is no longer supported")).toBe(true);
  });

  it("is false for ordinary release notes", () => {
    expect(isBreakingChange("bug fixes and performance improvements")).toBe(
      false,
    );
  });
});

describe("extractTags", () => {
  it("starts with the category and adds one keyword per group", () => {
    expect(
      extractTags("langchain adds gpt-5 agent support", "framework", table),
    ).toEqual(["framework", "langchain", "gpt", "agent"]);
  });

  it("caps the list at five tags", () => {
    expect(
      extractTags("langchain gpt embedding agent workflow", "framework", table),
    ).toEqual(["framework", "langchain", "gpt", "embedding", "agent"]);
  });

  it("does not repeat a keyword equal to the category", () => {
    expect(extractTags("an agent launches", "agent", table)).toEqual(["agent"]);
  });
});

describe("classify", () => {
  it("assigns category, breaking flag and tags from title and content", () => {
    const [result] = classify(
      [
        makeRecord({
          title: "LangChain 1.0",
          content: "Deprecated chains were removed in this release.",
        }),
      ],
      table,
    );
    expect(result?.category).toBe("framework");
    expect(result?.is_breaking_change).toBe(true);
    expect(result?.tags).toEqual(["framework", "langchain"]);
  });

  it("matches case-insensitively", () => {
    const [result] = classify([makeRecord({ title: "GPT-5 Is Here" })], table);
    expect(result?.category).toBe("llm");
  });

  it("keeps a pinned producer category", () => {
    const [result] = classify(
      [makeRecord({ title: "An agent benchmark", category: "paper" })],
      table,
    );
    expect(result?.category).toBe("paper");
    expect(result?.tags).toEqual(["paper", "agent"]);
  });

  it("keeps papers pinned whatever extra categories are configured", () => {
    const paper = makeRecord({ title: "An agent benchmark", category: "paper" });
    for (const pinnedCategories of [[], ["llm"]] as const) {
      const [result] = classify([paper], table, { pinnedCategories });
      expect(result?.category).toBe("paper");
    }
  });

  it("keeps an extra pinned category and reclassifies the rest", () => {
    const pinned = makeRecord({ title: "An agent benchmark", category: "llm" });
    const unpinned = makeRecord({ title: "An agent benchmark", category: "rag" });
    const [kept, moved] = classify([pinned, unpinned], table, {
      pinnedCategories: ["llm"],
    });
    expect(kept?.category).toBe("llm");
    expect(moved?.category).toBe("agent");
  });

  it("returns new records and leaves the input untouched", () => {
    const input = makeRecord({ title: "GPT-5" });
    const [result] = classify([input], table);
    expect(result).not.toBe(input);
    expect(input.category).toBe("other");
    expect(input.tags).toEqual([]);
  });
});
