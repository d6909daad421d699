import { z } from 'zod'

export const ArticleSchema = z.object({
  title: z.string(),
  url: z.string(),
  /** e.g. "rss:techcrunch", "arxiv" */
  source: z.string(),
  content: z.string(),
  /** ISO-8601 */
  publishedAt: z.string(),
  credibilityScore: z.number().min(0).max(1).default(0),
  category: z.string().optional(),
  relevanceScore: z.number().min(0).max(1).optional(),
})

export type Article = z.infer<typeof ArticleSchema>

export const SummarySchema = z.object({
  headline: z.string(),
  body: z.string(),
  category: z.string(),
  sourceUrls: z.array(z.string()),
  credibilityScore: z.number().min(0).max(1),
})

export type Summary = z.infer<typeof SummarySchema>

export const ContentPipelineState = z.object({
  triggerType: z.enum(['scheduled', 'manual']).default('manual'),

  // Data
  rawArticles: z.array(ArticleSchema).default([]),
  articles: z.array(ArticleSchema).default([]),
  summaries: z.array(SummarySchema).default([]),

  // Content
  newsletterHtml: z.string().default(''),
  linkedinDraft: z.string().default(''),
  imagePaths: z.array(z.string()).default([]),

  // Review
  approvalStatus: z.enum(['pending', 'approved', 'rejected']).default('pending'),
  feedback: z.string().default(''),
  revisionCount: z.number().int().nonnegative().default(0),

  errorLog: z.array(z.string()).default([]),
  currentStep: z.string().default('created'),
})

export type ContentPipelineShape = typeof ContentPipelineState.shape

export type ContentState = z.infer<typeof ContentPipelineState>
