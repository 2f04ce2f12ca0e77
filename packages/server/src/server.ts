// =============================================================================
// @topicwire/server: MCP server factory + Express app + Streamable HTTP
// =============================================================================
// Creates an Express application with a health check, authentication, rate
// limiting, and a stateless MCP Streamable HTTP endpoint through which
// operators trigger discovery, archival and manual enqueues. Pipelines only
// see the storage ports in PipelineDependencies, so the same app runs on
// Neo4j (createApp) or on in-process backends (buildApp).
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type AnalyticsLog,
  type ArticleStore,
  type Config,
  type Driver,
  type HealthCheckResult,
  type Logger,
  type PipelineSettings,
  type SubscriberDirectory,
  type TaskQueue,
  loadConfig,
  toPipelineSettings,
  createLogger,
  createDriver,
  healthCheck,
  closeDriver,
  createNeo4jArticleStore,
  createNeo4jAnalyticsLog,
  createNeo4jSubscriberDirectory,
  createNeo4jTaskQueue,
  errorMessage,
} from "@topicwire/shared";
import { createAuthMiddleware, createRateLimiter } from "./auth.js";
import {
  createGoogleSearchClient,
  type SearchClient,
} from "./pipeline/search.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Callback that registers MCP tools on a per-request McpServer instance.
 * Tool modules export functions matching this signature.
 */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

/** What the discovery and archival pipelines run against. */
export interface PipelineDependencies {
  store: ArticleStore;
  analytics: AnalyticsLog;
  subscribers: SubscriberDirectory;
  queue: TaskQueue;
  search: SearchClient;
  settings: PipelineSettings;
  logger: Logger;
}

export interface AppDependencies extends PipelineDependencies {
  config: Config;
  checkHealth: () => Promise<HealthCheckResult>;
}

export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: rate limiter, HTTP server, then backing resources. */
  shutdown: () => Promise<void>;
}

export interface BuildAppOptions {
  /** Releases whatever backs the storage ports (e.g. the Neo4j driver). */
  close?: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// CORS middleware (inline, no external dependency)
// ---------------------------------------------------------------------------

function createCorsMiddleware(origins: string): RequestHandler {
  return (req: Request, res: Response, next) => {
    res.setHeader("Access-Control-Allow-Origin", origins);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization",
    );

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Search client without credentials
// ---------------------------------------------------------------------------

export class SearchNotConfiguredError extends Error {
  constructor() {
    super("Search is not configured: set GOOGLE_CSE_API_KEY and GOOGLE_CSE_ID");
    this.name = "SearchNotConfiguredError";
  }
}

function createSearchClient(config: Config, logger: Logger): SearchClient {
  if (config.GOOGLE_CSE_API_KEY && config.GOOGLE_CSE_ID) {
    return createGoogleSearchClient({
      apiKey: config.GOOGLE_CSE_API_KEY,
      searchEngineId: config.GOOGLE_CSE_ID,
    });
  }
  logger.warn("GOOGLE_CSE_API_KEY or GOOGLE_CSE_ID missing; discovery disabled");
  return {
    search: async () => {
      throw new SearchNotConfiguredError();
    },
  };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/** Neo4j-backed app from environment variables. */
export function createApp(
  env?: Record<string, string | undefined>,
): AppInstance & { driver: Driver } {
  const config = loadConfig(env);
  const settings = toPipelineSettings(config);
  const logger = createLogger({ level: config.LOG_LEVEL });
  const driver = createDriver(config);

  const deps: AppDependencies = {
    store: createNeo4jArticleStore(driver),
    analytics: createNeo4jAnalyticsLog(driver),
    subscribers: createNeo4jSubscriberDirectory(driver),
    queue: createNeo4jTaskQueue(driver, settings.queue),
    search: createSearchClient(config, logger),
    settings,
    logger,
    config,
    checkHealth: () => healthCheck(driver),
  };

  return {
    ...buildApp(deps, { close: () => closeDriver(driver) }),
    driver,
  };
}

export function buildApp(
  deps: AppDependencies,
  options: BuildAppOptions = {},
): AppInstance {
  const { config, logger } = deps;
  const toolRegistrars: ToolRegistrar[] = [];

  // --- Express app ---
  const app = express();
  app.use(express.json());
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Health endpoint (unauthenticated) ---
  app.get("/health", async (_req: Request, res: Response) => {
    try {
      const neo4jResult = await deps.checkHealth();
      res.status(neo4jResult.ok ? 200 : 503).json({
        status: neo4jResult.ok ? "ok" : "unhealthy",
        neo4j: neo4jResult,
        uptime: process.uptime(),
      });
    } catch (err) {
      logger.error("Health check failed", { error: errorMessage(err) });
      res.status(503).json({
        status: "unhealthy",
        neo4j: { ok: false, latencyMs: 0, error: "check failed" },
        uptime: process.uptime(),
      });
    }
  });

  // --- Auth + Rate limiter for MCP routes ---
  if (Object.keys(config.API_KEYS).length === 0) {
    logger.warn("API_KEYS is empty; every /mcp request will be rejected");
  }
  const authMiddleware = createAuthMiddleware(config.API_KEYS);
  const rateLimiter = createRateLimiter(config.RATE_LIMIT_PER_MIN);

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post(
    "/mcp",
    authMiddleware,
    rateLimiter,
    async (req: Request, res: Response) => {
      try {
        const server = new McpServer({ name: "topicwire", version: "0.1.0" });

        for (const registrar of toolRegistrars) {
          registrar(server, deps);
        }

        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined, // stateless
        });

        res.on("close", () => {
          transport.close().catch((err: unknown) => {
            logger.warn("MCP transport close failed", {
              error: errorMessage(err),
            });
          });
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        logger.error("MCP request failed", {
          clientId: req.clientId,
          error: errorMessage(err),
        });
        if (!res.headersSent) {
          res.status(500).json({ error: "Internal server error" });
        }
      }
    },
  );

  // Stateless server: no SSE stream, no session teardown
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    rateLimiter.shutdown();

    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    await options.close?.();

    logger.info("Shutdown complete");
  }

  return {
    app,
    httpServer,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}
