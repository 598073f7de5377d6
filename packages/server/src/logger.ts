import { randomUUID } from "node:crypto";
import type { Logger } from "@trendwire/shared";

export { createLogger, type Logger, type LogLevel } from "@trendwire/shared";

export function createRequestId(): string {
  return randomUUID();
}

export function logToolCall(
  logger: Logger,
  toolName: string,
  input: Record<string, unknown>,
  durationMs: number,
  error?: string,
): void {
  const data: Record<string, unknown> = {
    tool: toolName,
    input,
    durationMs: Math.round(durationMs),
  };
  if (error !== undefined) {
    data.error = error;
    logger.error("Tool call failed", data);
  } else {
    logger.info("Tool called", data);
  }
}

export function logExternalCall(
  logger: Logger,
  service: "neo4j" | "gemini",
  operation: string,
  durationMs: number,
  error?: string,
): void {
  const data: Record<string, unknown> = {
    service,
    operation,
    durationMs: Math.round(durationMs),
  };
  if (error !== undefined) {
    data.error = error;
    logger.error("External call failed", data);
  } else {
    logger.info("External call completed", data);
  }
}
