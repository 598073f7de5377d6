// =============================================================================
// HTTP surface of createApp: health, auth on /mcp, stateless method guard
// =============================================================================
// The app listens on an ephemeral loopback port inside the test process;
// every dependency is an in-process fake.
// =============================================================================

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createApp, type AppDependencies, type AppInstance } from "../server.js";
import { createEmbeddingClientStub, createTestDeps } from "./fixtures.js";

describe("createApp", () => {
  let dir: string;
  let instance: AppInstance | undefined;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "trendwire-app-"));
  });

  afterEach(async () => {
    await instance?.shutdown();
    instance = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  async function start(overrides: Partial<AppDependencies> = {}): Promise<string> {
    instance = createApp(createTestDeps(dir, overrides));
    const { httpServer } = instance;
    await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", resolve));
    const address = httpServer.address();
    if (!address || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    return `http://127.0.0.1:${address.port}`;
  }

  describe("/health", () => {
    it("reports ok without credentials", async () => {
      const base = await start();

      const res = await fetch(`${base}/health`);
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({
        status: "ok",
        gemini: { ok: true },
        vectorBackend: "file",
        ingesting: false,
      });
      expect(body).not.toHaveProperty("neo4j");
    });

    it("is unhealthy with 503 when the embedding service fails", async () => {
      const base = await start({
        embeddingClient: createEmbeddingClientStub(async () => {
          throw new Error("quota exhausted");
        }),
      });

      const res = await fetch(`${base}/health`);

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({
        status: "unhealthy",
        gemini: { ok: false, error: "quota exhausted" },
      });
    });
  });

  describe("/mcp", () => {
    it("rejects a request without an Authorization header", async () => {
      const base = await start();

      const res = await fetch(`${base}/mcp`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Missing Authorization header" });
    });

    it("rejects an unknown key", async () => {
      const base = await start();

      const res = await fetch(`${base}/mcp`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: "Bearer wrong-key",
        },
        body: "{}",
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Invalid API key" });
    });

    it("answers GET and DELETE with 405", async () => {
      const base = await start();

      for (const method of ["GET", "DELETE"]) {
        const res = await fetch(`${base}/mcp`, { method });
        expect(res.status).toBe(405);
        expect(await res.json()).toEqual({
          error: "Method not allowed for stateless server",
        });
      }
    });
  });

  it("answers CORS preflight with 204", async () => {
    const base = await start();

    const res = await fetch(`${base}/mcp`, { method: "OPTIONS" });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });
});
