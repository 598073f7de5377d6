#!/usr/bin/env tsx
// =============================================================================
// @trendwire/worker — trendwire CLI
// =============================================================================
// Usage:
//   trendwire ingest            run one ingestion batch
//   trendwire ask [question]    answer one question, or start a prompt loop
//   trendwire digest            summary of the most important developments
//   trendwire latest [n]        top n records from the snapshot (default 20)
//   trendwire stats             snapshot, index and last-run summary
//
// Configuration comes from the environment (see .env.example). Logs are
// JSON lines on stderr; command output goes to stdout.
// =============================================================================

import { ZodError } from "zod";
import {
  ConfigError,
  createLogger,
  errorMessage,
  loadConfig,
  type Config,
} from "@trendwire/shared";
import {
  askCommand,
  digestCommand,
  formatReport,
  latestCommand,
  statsCommand,
} from "./commands.js";
import { runIngestion } from "./ingest.js";
import { createRuntime, ingestionDeps, ingestionOptions } from "./runtime.js";

const USAGE = `Usage: trendwire <ingest | ask [question] | digest | latest [n] | stats>\n`;

const [command, ...args] = process.argv.slice(2);

if (!command || !["ingest", "ask", "digest", "latest", "stats"].includes(command)) {
  process.stderr.write(USAGE);
  process.exit(command ? 1 : 0);
}

let config: Config;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ZodError) {
    process.stderr.write("Invalid configuration:\n");
    for (const issue of err.issues) {
      process.stderr.write(`  ${issue.path.join(".")}: ${issue.message}\n`);
    }
  } else {
    process.stderr.write(`Invalid configuration: ${errorMessage(err)}\n`);
  }
  process.exit(1);
}

const logger = createLogger({ level: config.LOG_LEVEL, sink: process.stderr });

let exitCode = 0;
try {
  const runtime = await createRuntime(config, logger);
  try {
    switch (command) {
      case "ingest": {
        const report = await runIngestion(
          ingestionDeps(runtime),
          ingestionOptions(config),
        );
        process.stdout.write(formatReport(report));
        break;
      }
      case "ask":
        await askCommand(runtime, args.length > 0 ? args.join(" ") : undefined, {
          input: process.stdin,
          out: process.stdout,
        });
        break;
      case "digest":
        await digestCommand(runtime.digest, process.stdout);
        break;
      case "latest": {
        const limit = Number.parseInt(args[0] ?? "20", 10);
        await latestCommand(
          runtime.store,
          Number.isFinite(limit) && limit > 0 ? limit : 20,
          process.stdout,
        );
        break;
      }
      case "stats":
        await statsCommand(runtime, process.stdout);
        break;
    }
  } finally {
    await runtime.close();
  }
} catch (err) {
  exitCode = 1;
  if (err instanceof ConfigError) {
    process.stderr.write(`Invalid configuration: ${err.message}\n`);
  } else {
    logger.fatal("Command failed", { command, error: errorMessage(err) });
  }
}

process.exit(exitCode);
