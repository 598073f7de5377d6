// =============================================================================
// @trendwire/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. NEO4J_* become required only when the neo4j vector
// backend is selected; API_KEYS is validated as JSON for the server.
// =============================================================================

import { z } from "zod";
import { CATEGORIES, type Category } from "./types.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"replace-me": "mcp-client"}'
 */
const apiKeysSchema = z.string().transform((val, ctx) => {
  try {
    const parsed: unknown = JSON.parse(val);
    if (
      typeof parsed !== "object" ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "API_KEYS must be a JSON object mapping key strings to client ID strings",
      });
      return z.NEVER;
    }
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "string") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `API_KEYS value for "${key}" must be a string, got ${typeof value}`,
        });
        return z.NEVER;
      }
      record[key] = value;
    }
    return record;
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "API_KEYS must be valid JSON",
    });
    return z.NEVER;
  }
});

/** Comma-separated category list, e.g. "llm"; "paper" is always included */
const pinnedCategoriesSchema = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
  )
  .pipe(z.array(z.enum(CATEGORIES)))
  .transform((list) => [...new Set<Category>(["paper", ...list])]);

const booleanFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const baseShape = {
  // Required
  GEMINI_API_KEY: z.string().min(1, "GEMINI_API_KEY is required"),
  ANTHROPIC_API_KEY: z.string().min(1, "ANTHROPIC_API_KEY is required"),

  // Storage & pipeline
  DATA_DIR: z.string().min(1).default("data"),
  KEEP_DAYS: z.coerce.number().int().min(1).default(30),
  COLD_START_DAYS: z.coerce.number().int().min(1).default(7),
  FORUM_MIN_SCORE: z.coerce.number().int().min(0).default(50),
  KEYWORDS_FILE: z.string().min(1).optional(),
  SOURCES_FILE: z.string().min(1).optional(),
  PINNED_CATEGORIES: pinnedCategoriesSchema.default("paper"),
  GITHUB_TOKEN: z.string().min(1).optional(),

  // Embeddings
  EMBEDDING_DIMENSIONS: z.coerce.number().int().min(1).default(768),
  EMBEDDING_MODEL: z.string().default("gemini-embedding-001"),

  // Completion
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),
  ANSWER_MAX_TOKENS: z.coerce.number().int().min(64).max(8192).default(1024),
  RAG_TOP_K: z.coerce.number().int().min(1).max(50).default(5),

  // Vector index persistence
  VECTOR_BACKEND: z.enum(["file", "neo4j"]).default("file"),
  NEO4J_URI: z.string().min(1).optional(),
  NEO4J_USER: z.string().min(1).optional(),
  NEO4J_PASSWORD: z.string().min(1).optional(),

  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
};

const serverShape = {
  ...baseShape,
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  API_KEYS: apiKeysSchema,
  CORS_ORIGINS: z.string().default("*"),
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(100),
  CRON_ENABLED: booleanFlagSchema.default("true"),
  CRON_INGEST: z.string().default("0 */6 * * *"),
};

function requireNeo4jWhenSelected(
  cfg: {
    VECTOR_BACKEND: "file" | "neo4j";
    NEO4J_URI?: string;
    NEO4J_USER?: string;
    NEO4J_PASSWORD?: string;
  },
  ctx: z.RefinementCtx,
): void {
  if (cfg.VECTOR_BACKEND !== "neo4j") return;
  for (const key of ["NEO4J_URI", "NEO4J_USER", "NEO4J_PASSWORD"] as const) {
    if (!cfg[key]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `${key} is required when VECTOR_BACKEND=neo4j`,
      });
    }
  }
}

const configSchema = z.object(baseShape).superRefine(requireNeo4jWhenSelected);

const serverConfigSchema = z
  .object(serverShape)
  .superRefine(requireNeo4jWhenSelected);

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;

// ---------------------------------------------------------------------------
// Loaders
// ---------------------------------------------------------------------------

/**
 * Load and validate pipeline configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}

/** Pipeline configuration plus the HTTP/MCP server and scheduler settings. */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  return serverConfigSchema.parse(env);
}
