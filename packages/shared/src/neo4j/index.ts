export {
  createDriver,
  healthCheck,
  closeDriver,
  toNumber,
  toInt,
  withSession,
} from "./driver.js";

export type { Driver, Session, HealthCheckResult } from "./driver.js";

export { ensureSchema, SCHEMA_CONSTRAINTS, SCHEMA_INDEXES } from "./schema.js";
export type { SchemaResult, SchemaLogger, SchemaStatement } from "./schema.js";

export {
  insertArticle,
  findExistingLinks,
  countProcessedBefore,
  deleteProcessedBefore,
  markArticlesProcessed,
  countArticles,
  createNeo4jArticleStore,
} from "./articles.js";

export {
  recordAnalyticsEvent,
  countAnalyticsEventsBefore,
  deleteAnalyticsEventsBefore,
  createNeo4jAnalyticsLog,
} from "./analytics.js";

export {
  listSubscriberTopics,
  createNeo4jSubscriberDirectory,
} from "./subscribers.js";

export {
  enqueueCrawlTask,
  leaseCrawlTask,
  deleteCrawlTask,
  releaseCrawlTask,
  countCrawlTasks,
  createNeo4jTaskQueue,
} from "./task-queue.js";
