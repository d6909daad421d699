/**
 * Content pipeline collaborators
 *
 * Everything that talks to the outside world (search APIs, LLMs, renderers,
 * mail and social publishing) is injected through these interfaces. The
 * pipeline only orchestrates.
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import type { Awaitable } from '../graph/graph-dsl'
import type { Article, Summary } from './content-state'

export interface SourceRequest {
  runId: string
  triggerType: 'scheduled' | 'manual'
}

/**
 * One news source. Throwing marks the fetch as failed; the scraper node is
 * retried per its policy.
 */
export interface ArticleSource {
  /** Becomes part of the node name: `scrape_<name>` */
  readonly name: string
  fetch(request: SourceRequest): Promise<Article[]>
}

export interface CredibilityScorer {
  /** 0.0 - 1.0 */
  score(article: Article): Awaitable<number>
}

export interface ArticleAnalysis {
  /** Position of the article in the analysed batch */
  index: number
  category: string
  relevanceScore: number
}

export interface ArticleAnalyzer {
  analyze(articles: readonly Article[]): Promise<ArticleAnalysis[]>
}

export interface Summarizer {
  /** `feedback` is the reviewer's note from a rejected draft, or empty */
  summarize(articles: readonly Article[], feedback: string): Promise<Summary[]>
}

export interface PostWriter {
  draftPost(summaries: readonly Summary[], feedback: string): Promise<string>
}

export interface ImageRenderer {
  renderCards(summaries: readonly Summary[], runId: string): Promise<string[]>
}

export interface PublishRequest {
  runId: string
  /** Newsletter subject; the publisher picks its own when absent */
  subject?: string
  newsletterHtml: string
  linkedinDraft: string
  imagePaths: readonly string[]
}

export interface Publisher {
  publish(request: PublishRequest): Promise<void>
}

export interface ContentServices {
  sources: readonly ArticleSource[]
  /** Defaults to source reputation scoring */
  credibility?: CredibilityScorer
  /** Articles are left unranked by topic without one */
  analyzer?: ArticleAnalyzer
  summarizer: Summarizer
  writer: PostWriter
  /** No images are produced without one */
  renderer?: ImageRenderer
  publisher: Publisher
}

export const ARTICLE_CATEGORIES = [
  'LLM',
  'Computer Vision',
  'Robotics',
  'AI Policy',
  'AI Startup',
  'Research Paper',
  'Industry News',
  'Other',
] as const

export function normalizeCategory(category: string): string {
  return ARTICLE_CATEGORIES.some(known => known === category) ? category : 'Other'
}

const ReputationTableSchema = z.record(z.number().min(0).max(1))

let defaultReputation: Readonly<Record<string, number>> | undefined

function loadDefaultReputation(): Readonly<Record<string, number>> {
  if (!defaultReputation) {
    const raw = readFileSync(new URL('./data/source-reputation.json', import.meta.url), 'utf-8')
    defaultReputation = ReputationTableSchema.parse(JSON.parse(raw))
  }
  return defaultReputation
}

export interface ReputationScorerOptions {
  /** domain -> 0.0 - 1.0; defaults to the bundled table */
  reputation?: Readonly<Record<string, number>>
  /** Score for domains not in the table */
  fallback?: number
}

/**
 * Credibility from the publishing domain's reputation.
 *
 * score = 0.4 * reputation + 0.3 * crossReference + 0.3 * consistency, where
 * the last two are neutral (0.5) until a checker for them exists.
 */
export class ReputationCredibilityScorer implements CredibilityScorer {
  private readonly reputation: Readonly<Record<string, number>>
  private readonly fallback: number

  constructor(options: ReputationScorerOptions = {}) {
    this.reputation = options.reputation ?? loadDefaultReputation()
    this.fallback = options.fallback ?? 0.4
  }

  reputationOf(url: string): number {
    let domain: string
    try {
      domain = new URL(url).hostname.toLowerCase().replace(/^www\./, '')
    } catch {
      return this.fallback
    }

    const exact = this.reputation[domain]
    if (exact !== undefined) return exact

    // blog.example.com -> example.com
    const parts = domain.split('.')
    if (parts.length > 2) {
      const parent = this.reputation[parts.slice(-2).join('.')]
      if (parent !== undefined) return parent
    }

    return this.fallback
  }

  score(article: Article): number {
    const crossReference = 0.5
    const consistency = 0.5
    return roundScore(0.4 * this.reputationOf(article.url) + 0.3 * crossReference + 0.3 * consistency)
  }
}

export function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000
}

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Composite ranking: 35% credibility, 40% relevance, 25% recency.
 * Recency falls linearly from 1 (now) to 0 (seven days old).
 */
export function rankArticle(article: Article, now: Date): number {
  const relevance = article.relevanceScore ?? 0.5

  let recency = 0.5
  const published = Date.parse(article.publishedAt)
  if (!Number.isNaN(published)) {
    const ageDays = (now.getTime() - published) / DAY_MS
    recency = Math.min(1, Math.max(0, 1 - ageDays / 7))
  }

  return 0.35 * article.credibilityScore + 0.4 * relevance + 0.25 * recency
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

export function buildNewsletterHtml(summaries: readonly Summary[], runId: string): string {
  const items = summaries
    .map(
      summary => `
    <div style="border-left:4px solid #0a66c2;padding:12px 16px;margin-bottom:24px;">
      <span style="font-size:11px;color:#666;text-transform:uppercase;">${escapeHtml(summary.category)}</span>
      <h2 style="margin:4px 0;font-size:18px;">${escapeHtml(summary.headline)}</h2>
      <p style="color:#333;line-height:1.6;">${escapeHtml(summary.body)}</p>
    </div>`
    )
    .join('')

  return `<!DOCTYPE html>
<html><head><meta charset="utf-8"></head>
<body style="font-family:sans-serif;max-width:640px;margin:0 auto;padding:24px;color:#111;">
  <h1 style="border-bottom:2px solid #0a66c2;padding-bottom:12px;">AI/ML Weekly Digest</h1>
  <p style="color:#666;font-size:13px;">Run ID: ${escapeHtml(runId)}</p>${items}
</body></html>`
}
