// =============================================================================
// HTTP surface tests
// =============================================================================
// Builds the Express app on in-process dependencies and drives it over a
// loopback listener: health, auth, rate limiting and the stateless MCP route.
// =============================================================================

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { AddressInfo } from "node:net";
import type { Request, Response } from "express";
import { buildApp, type AppInstance } from "../server.js";
import { createRateLimiter } from "../auth.js";
import { registerAdminTools } from "../tools/admin.js";
import { createLogger } from "@topicwire/shared";
import { createTestDependencies } from "./fixtures.js";

const MCP_HEADERS = {
  "Content-Type": "application/json",
  Accept: "application/json, text/event-stream",
};

const LIST_TOOLS = JSON.stringify({
  jsonrpc: "2.0",
  id: 1,
  method: "tools/list",
  params: {},
});

describe("HTTP app", () => {
  let instance: AppInstance;
  let baseUrl: string;

  beforeEach(async () => {
    instance = buildApp(
      createTestDependencies({ env: { RATE_LIMIT_PER_MIN: "2" } }),
    );
    instance.addToolRegistrar(registerAdminTools);
    await new Promise<void>((resolve) => {
      instance.httpServer.listen(0, "127.0.0.1", resolve);
    });
    const { port } = instance.httpServer.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await instance.shutdown();
  });

  it("GET /health should report Neo4j status without auth", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      neo4j: { ok: true, latencyMs: 1 },
    });
  });

  it("GET /health should return 503 when Neo4j is unreachable", async () => {
    instance.deps.checkHealth = async () => ({
      ok: false,
      latencyMs: 0,
      error: "connection refused",
    });

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: "unhealthy" });
  });

  it("POST /mcp should require a bearer key", async () => {
    const res = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: MCP_HEADERS,
      body: LIST_TOOLS,
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Missing Authorization header" });
  });

  it("POST /mcp should reject malformed and unknown keys", async () => {
    const malformed = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { ...MCP_HEADERS, Authorization: "Basic test-key" },
      body: LIST_TOOLS,
    });
    const unknown = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { ...MCP_HEADERS, Authorization: "Bearer wrong-key" },
      body: LIST_TOOLS,
    });

    expect(malformed.status).toBe(401);
    expect(unknown.status).toBe(401);
    expect(await unknown.json()).toEqual({ error: "Invalid API key" });
  });

  it("POST /mcp should serve registered tools to a valid key", async () => {
    const res = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { ...MCP_HEADERS, Authorization: "Bearer test-key" },
      body: LIST_TOOLS,
    });

    expect(res.status).toBe(200);
    const body = await res.text();
    expect(body).toContain('"name":"health_check"');
    expect(body).toContain('"name":"pipeline_stats"');
  });

  it("POST /mcp should rate limit per client", async () => {
    const call = () =>
      fetch(`${baseUrl}/mcp`, {
        method: "POST",
        headers: { ...MCP_HEADERS, Authorization: "Bearer test-key" },
        body: LIST_TOOLS,
      });

    await (await call()).text();
    await (await call()).text();
    const limited = await call();

    expect(limited.status).toBe(429);
    expect(await limited.json()).toMatchObject({ error: "Rate limit exceeded" });
  });

  it("GET /mcp should be rejected for the stateless server", async () => {
    const res = await fetch(`${baseUrl}/mcp`);

    expect(res.status).toBe(405);
  });
});

describe("buildApp", () => {
  it("should warn when no API keys are configured", async () => {
    const lines: string[] = [];
    const deps = createTestDependencies({ env: { API_KEYS: "{}" } });
    deps.logger = createLogger({ write: (line) => lines.push(line) });

    const instance = buildApp(deps);
    await instance.shutdown();

    expect(lines.map((line) => JSON.parse(line))).toContainEqual(
      expect.objectContaining({
        level: "warn",
        msg: "API_KEYS is empty; every /mcp request will be rejected",
      }),
    );
  });

  it("should not warn when API keys are configured", async () => {
    const lines: string[] = [];
    const deps = createTestDependencies();
    deps.logger = createLogger({ write: (line) => lines.push(line) });

    const instance = buildApp(deps);
    await instance.shutdown();

    expect(lines.some((line) => line.includes("API_KEYS is empty"))).toBe(false);
  });
});

describe("createRateLimiter", () => {
  it("should reopen the window after a minute", () => {
    let now = 0;
    const limiter = createRateLimiter(1, {
      clock: () => now,
      cleanupIntervalMs: 0,
    });
    const statuses: number[] = [];
    let passed = 0;

    const run = () => {
      const req = { clientId: "test-client" };
      const res = {
        setHeader: () => undefined,
        status: (code: number) => {
          statuses.push(code);
          return { json: () => undefined };
        },
      };
      limiter(
        req as unknown as Request,
        res as unknown as Response,
        () => {
          passed++;
        },
      );
    };

    run();
    run();
    now = 60_000;
    run();

    expect(passed).toBe(2);
    expect(statuses).toEqual([429]);
    limiter.shutdown();
  });
});
