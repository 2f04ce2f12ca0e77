// =============================================================================
// @topicwire/shared: Zod schemas for queue messages and manual triggers
// =============================================================================
// Queue bodies and manual trigger inputs are validated here so downstream
// code can trust the values it receives.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

/** Absolute http(s) URL */
export const ArticleUrlSchema = z
  .string()
  .trim()
  .url("Must be an absolute URL")
  .refine((val) => /^https?:\/\//i.test(val), {
    message: "Only http and https URLs can be crawled",
  });

/** Queue message body: exactly one absolute URL, no envelope */
export const QueueMessageSchema = ArticleUrlSchema;

const tagSchema = z.string().trim().min(1).max(100);

// ---------------------------------------------------------------------------
// Manual trigger inputs
// ---------------------------------------------------------------------------

export const EnqueueUrlsInput = z.object({
  urls: z
    .array(ArticleUrlSchema)
    .min(1)
    .max(100)
    .describe("Absolute article URLs to queue for crawling"),
});

export const RunArchivalInput = z.object({
  dry_run: z
    .boolean()
    .optional()
    .describe("Count eligible records without deleting (default: false)"),
});

export const SubmitArticleInput = z.object({
  title: z.string().trim().min(1).max(500),
  link: ArticleUrlSchema,
  summary: z.string().max(5000).optional(),
  content: z.string().max(200_000).optional(),
  tags: z.array(tagSchema).max(20).optional(),
});

export type EnqueueUrlsInputType = z.infer<typeof EnqueueUrlsInput>;
export type RunArchivalInputType = z.infer<typeof RunArchivalInput>;
export type SubmitArticleInputType = z.infer<typeof SubmitArticleInput>;
