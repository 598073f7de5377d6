import { describe, it, expect } from "vitest";
import { createLogger } from "../logger.js";

function collect(level?: string) {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    sink: { write: (chunk: string) => lines.push(chunk) },
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("writes one JSON line per entry with bindings and data", () => {
    const { logger, lines } = collect();
    logger.child({ component: "store" }).info("Store saved", { added: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith("\n")).toBe(true);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: "info",
      msg: "Store saved",
      component: "store",
      added: 2,
    });
  });

  it("drops entries below the configured level", () => {
    const { logger, lines } = collect("warn");
    logger.info("quiet");
    logger.warn("loud");
    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(["loud"]);
  });

  it("falls back to info for an unknown level", () => {
    const { logger, lines } = collect("chatty");
    logger.debug("hidden");
    logger.info("shown");
    expect(lines).toHaveLength(1);
  });
});
