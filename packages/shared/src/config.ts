// =============================================================================
// @topicwire/shared: Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. API_KEYS is validated as JSON.
//
// Components never read the environment themselves: the flat config is
// projected into a PipelineSettings value object (see toPipelineSettings)
// and each component receives its slice at construction.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"sk-abc123": "ops-console", "sk-def456": "scheduler"}'
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
    const keys: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "string") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `API_KEYS value for "${key}" must be a string, got ${typeof value}`,
        });
        return z.NEVER;
      }
      keys[key] = value;
    }
    return keys;
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "API_KEYS must be valid JSON",
    });
    return z.NEVER;
  }
});

/** "true"/"false"/"1"/"0" from the environment; z.coerce.boolean treats "false" as true. */
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((val) => val === "true" || val === "1");

const configSchema = z.object({
  // Required
  NEO4J_URI: z.string().min(1, "NEO4J_URI is required"),
  NEO4J_USER: z.string().min(1, "NEO4J_USER is required"),
  NEO4J_PASSWORD: z.string().min(1, "NEO4J_PASSWORD is required"),

  // Manual trigger surface (server only)
  API_KEYS: apiKeysSchema.default("{}"),

  // Search discovery (server only)
  GOOGLE_CSE_API_KEY: z.string().min(1).optional(),
  GOOGLE_CSE_ID: z.string().min(1).optional(),

  // Optional with defaults
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  CORS_ORIGINS: z.string().default("*"),
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(100),

  // Scheduling
  CRON_ENABLED: booleanFlag.default("true"),
  CRON_DISCOVERY: z.string().default("0 */6 * * *"),
  CRON_ARCHIVAL: z.string().default("0 3 * * 0"),

  // Discovery
  DISCOVERY_QUERY_TEMPLATE: z
    .string()
    .includes("{topic}", {
      message: "DISCOVERY_QUERY_TEMPLATE must contain {topic}",
    })
    .default("latest articles about {topic}"),
  DISCOVERY_RESULTS_PER_TOPIC: z.coerce.number().int().min(1).max(100).default(5),

  // Crawl worker
  CRAWL_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
  CRAWL_SUMMARY_LINES: z.coerce.number().int().min(1).default(15),
  CRAWL_FAILURE_POLICY: z.enum(["drop", "retry"]).default("drop"),
  CRAWL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  CRAWL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  CHROME_EXECUTABLE_PATH: z.string().min(1).default("/usr/bin/chromium"),

  // Queue
  QUEUE_VISIBILITY_TIMEOUT_MS: z.coerce.number().int().min(1000).default(300_000),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(1),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(5_000),

  // Retention
  ARTICLE_RETENTION_DAYS: z.coerce.number().int().min(1).default(90),
  ANALYTICS_RETENTION_DAYS: z.coerce.number().int().min(1).default(180),
  ARCHIVAL_BATCH_SIZE: z.coerce.number().int().min(1).default(500),
});

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

export type FailurePolicyMode = Config["CRAWL_FAILURE_POLICY"];

export interface DiscoverySettings {
  queryTemplate: string;
  resultsPerTopic: number;
}

export interface FailurePolicy {
  mode: FailurePolicyMode;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface CrawlSettings {
  navigationTimeoutMs: number;
  summaryLines: number;
  failurePolicy: FailurePolicy;
}

export interface QueueSettings {
  visibilityTimeoutMs: number;
  concurrency: number;
  pollIntervalMs: number;
}

export interface RetentionSettings {
  articleDays: number;
  analyticsDays: number;
  deleteBatchSize: number;
}

export interface PipelineSettings {
  discovery: DiscoverySettings;
  crawl: CrawlSettings;
  queue: QueueSettings;
  retention: RetentionSettings;
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}

/** Projects the flat environment config into per-component settings. */
export function toPipelineSettings(config: Config): PipelineSettings {
  return {
    discovery: {
      queryTemplate: config.DISCOVERY_QUERY_TEMPLATE,
      resultsPerTopic: config.DISCOVERY_RESULTS_PER_TOPIC,
    },
    crawl: {
      navigationTimeoutMs: config.CRAWL_NAVIGATION_TIMEOUT_MS,
      summaryLines: config.CRAWL_SUMMARY_LINES,
      failurePolicy: {
        mode: config.CRAWL_FAILURE_POLICY,
        maxAttempts: config.CRAWL_MAX_ATTEMPTS,
        retryDelayMs: config.CRAWL_RETRY_DELAY_MS,
      },
    },
    queue: {
      visibilityTimeoutMs: config.QUEUE_VISIBILITY_TIMEOUT_MS,
      concurrency: config.WORKER_CONCURRENCY,
      pollIntervalMs: config.WORKER_POLL_INTERVAL_MS,
    },
    retention: {
      articleDays: config.ARTICLE_RETENTION_DAYS,
      analyticsDays: config.ANALYTICS_RETENTION_DAYS,
      deleteBatchSize: config.ARCHIVAL_BATCH_SIZE,
    },
  };
}
