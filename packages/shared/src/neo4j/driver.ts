import neo4j, { type Driver, type Session } from "neo4j-driver";
import { ConfigError, errorMessage } from "../errors.js";
import type { Config } from "../config.js";
import type { HealthCheckResult } from "../services.js";

export type { Driver, Session };

export interface Neo4jConnection {
  uri: string;
  user: string;
  password: string;
}

/** NEO4J_* settings, or a ConfigError when any of them is missing. */
export function neo4jConnectionFromConfig(config: Config): Neo4jConnection {
  const { NEO4J_URI, NEO4J_USER, NEO4J_PASSWORD } = config;
  if (!NEO4J_URI || !NEO4J_USER || !NEO4J_PASSWORD) {
    throw new ConfigError(
      "NEO4J_URI, NEO4J_USER and NEO4J_PASSWORD are required for the neo4j vector backend",
    );
  }
  return { uri: NEO4J_URI, user: NEO4J_USER, password: NEO4J_PASSWORD };
}

export function createDriver(connection: Neo4jConnection): Driver {
  return neo4j.driver(
    connection.uri,
    neo4j.auth.basic(connection.user, connection.password),
    {
      maxConnectionPoolSize: 10,
      connectionLivenessCheckTimeout: 300000,
    },
  );
}

export async function healthCheck(driver: Driver): Promise<HealthCheckResult> {
  const start = performance.now();
  try {
    await driver.getServerInfo();
    return { ok: true, latencyMs: performance.now() - start };
  } catch (err) {
    return {
      ok: false,
      latencyMs: performance.now() - start,
      error: errorMessage(err),
    };
  }
}

export async function closeDriver(driver: Driver): Promise<void> {
  await driver.close();
}
