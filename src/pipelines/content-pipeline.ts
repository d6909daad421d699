/**
 * Content Pipeline - news digest workflow on the graph engine
 *
 * Flow:
 *   START -> scrape_<source> (fan-out) -> merge_results -> deduplicate
 *   -> credibility -> analyze -> summarize -> draft_post -> render_images
 *   -> human_approval [suspends] -> publish -> END
 *                                -> revise -> summarize (revision loop)
 *
 * Collaborator failures are recorded in `errorLog` by the engine and the run
 * carries on with whatever it has.
 */

import { createHash } from 'crypto'
import { z } from 'zod'
import { GraphDefinitionError } from '../graph/errors'
import { START, END, send } from '../graph/graph-dsl'
import { ApprovalDecisionSchema } from '../graph/interrupt'
import { StateGraph, type CompiledGraph } from '../graph/state-graph'
import { DEFAULT_RETRY_POLICIES, type RetryPolicy } from '../runtime/retry-handler'
import {
  ArticleSchema,
  ContentPipelineState,
  SummarySchema,
  type Article,
  type ContentPipelineShape,
  type ContentState,
} from './content-state'
import {
  ReputationCredibilityScorer,
  buildNewsletterHtml,
  normalizeCategory,
  rankArticle,
  roundScore,
  type ContentServices,
} from './content-services'

export interface ContentPipelineOptions {
  name?: string
  /** Cap on the ranked articles handed to the summarizer */
  maxArticlesPerRun?: number
  /** Score at which an article counts as credible in the logs; every scored article is kept */
  credibilityThreshold?: number
  scraperRetry?: Partial<RetryPolicy>
  now?: () => Date
}

export interface ApprovalPreview {
  linkedinDraft: string
  newsletterPreview: string
  imageCount: number
  summaryCount: number
  revisionCount: number
  message: string
}

export type ContentPipeline = CompiledGraph<ContentPipelineShape>

export const CONTENT_PIPELINE_DEFAULTS = {
  maxArticlesPerRun: 200,
  credibilityThreshold: 0.4,
}

const MAX_POST_LENGTH = 3000
const POST_CUTOFF = 2950
const POST_TRAILER = '\n\n#AI #MachineLearning'
const MAX_POST_SUMMARIES = 7
const MAX_IMAGE_CARDS = 5
const ANALYSIS_BATCH = 50
const PREVIEW_LENGTH = 500

const ArticleListSchema = z.array(ArticleSchema)
const SummaryListSchema = z.array(SummarySchema)

export function scraperNodeName(source: string): string {
  return `scrape_${source}`
}

function clampScore(value: number): number {
  return Math.min(1, Math.max(0, value))
}

function contentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

export function buildApprovalPreview(state: Readonly<ContentState>): ApprovalPreview {
  return {
    linkedinDraft: state.linkedinDraft,
    newsletterPreview: state.newsletterHtml.slice(0, PREVIEW_LENGTH),
    imageCount: state.imagePaths.length,
    summaryCount: state.summaries.length,
    revisionCount: state.revisionCount,
    message: 'Please review the content and approve or reject with feedback.',
  }
}

export function buildContentPipeline(
  services: ContentServices,
  options: ContentPipelineOptions = {}
): ContentPipeline {
  if (services.sources.length === 0) {
    throw new GraphDefinitionError('Content pipeline needs at least one article source')
  }

  const maxArticles = options.maxArticlesPerRun ?? CONTENT_PIPELINE_DEFAULTS.maxArticlesPerRun
  const threshold = options.credibilityThreshold ?? CONTENT_PIPELINE_DEFAULTS.credibilityThreshold
  const scraperRetry = options.scraperRetry ?? DEFAULT_RETRY_POLICIES.transient
  const now = options.now ?? (() => new Date())
  const credibility = services.credibility ?? new ReputationCredibilityScorer()
  const scrapers = services.sources.map(source => scraperNodeName(source.name))

  const graph = new StateGraph(ContentPipelineState, {
    name: options.name ?? 'content-pipeline',
    append: ['rawArticles'],
    errorField: 'errorLog',
  })

  // Scrapers: one node per source, all launched together
  for (const source of services.sources) {
    graph.addNode(
      scraperNodeName(source.name),
      async (state, ctx) => {
        const articles = ArticleListSchema.parse(
          await source.fetch({ runId: ctx.runId, triggerType: state.triggerType })
        )
        ctx.logger.info({ source: source.name, count: articles.length }, 'Articles fetched')
        return { rawArticles: articles }
      },
      { retryPolicy: scraperRetry }
    )
  }

  graph
    .addNode('merge_results', (state, ctx) => {
      const sources = new Set(state.rawArticles.map(article => article.source))
      ctx.logger.info({ total: state.rawArticles.length, sources: [...sources] }, 'Articles merged')
      return { articles: state.rawArticles, currentStep: 'merged' }
    })

    .addNode('deduplicate', (state, ctx) => {
      const seenHashes = new Set<string>()
      const seenTitles = new Set<string>()
      const unique: Article[] = []

      for (const article of state.articles) {
        const hash = contentHash(article.content)
        const title = article.title.toLowerCase().trim()
        if (seenHashes.has(hash) || seenTitles.has(title)) continue

        seenHashes.add(hash)
        seenTitles.add(title)
        unique.push(article)
      }

      ctx.logger.info({ before: state.articles.length, after: unique.length }, 'Articles deduplicated')
      return { articles: unique, currentStep: 'deduplicated' }
    })

    .addNode('credibility', async (state, ctx) => {
      if (state.articles.length === 0) {
        return { errorLog: ['credibility: no articles to score'], currentStep: 'credibility_scored' }
      }

      const scored: Article[] = []
      for (const article of state.articles) {
        const score = roundScore(clampScore(await credibility.score(article)))
        scored.push({ ...article, credibilityScore: score })
      }
      const aboveThreshold = scored.filter(article => article.credibilityScore >= threshold).length

      ctx.logger.info({ scored: scored.length, aboveThreshold, threshold }, 'Credibility scored')
      return { articles: scored, currentStep: 'credibility_scored' }
    })

    .addNode('analyze', async (state, ctx) => {
      if (!services.analyzer) {
        return { currentStep: 'analyzed' }
      }
      if (state.articles.length === 0) {
        return { errorLog: ['analyze: no articles to process'], currentStep: 'analyzed' }
      }

      const batch = state.articles.slice(0, ANALYSIS_BATCH)
      const results = await services.analyzer.analyze(batch)
      const enriched = [...state.articles]
      for (const result of results) {
        if (!Number.isInteger(result.index) || result.index < 0 || result.index >= batch.length) continue
        enriched[result.index] = {
          ...enriched[result.index],
          category: normalizeCategory(result.category),
          relevanceScore: clampScore(result.relevanceScore),
        }
      }

      ctx.logger.info({ analysed: batch.length, enriched: results.length }, 'Articles analysed')
      return { articles: enriched, currentStep: 'analyzed' }
    })

    .addNode('summarize', async (state, ctx) => {
      if (state.articles.length === 0) {
        return { errorLog: ['summarize: no articles to process'], currentStep: 'summarized' }
      }

      const at = now()
      const ranked = [...state.articles]
        .sort((a, b) => rankArticle(b, at) - rankArticle(a, at))
        .slice(0, maxArticles)
      const summaries = SummaryListSchema.parse(await services.summarizer.summarize(ranked, state.feedback))

      ctx.logger.info({ articles: ranked.length, summaries: summaries.length }, 'Articles summarised')
      return { summaries, currentStep: 'summarized' }
    })

    .addNode('draft_post', async (state, ctx) => {
      if (state.summaries.length === 0) {
        return { errorLog: ['draft_post: no summaries to draft from'], currentStep: 'drafted' }
      }

      let draft = (await services.writer.draftPost(state.summaries.slice(0, MAX_POST_SUMMARIES), state.feedback)).trim()
      if (draft.length > MAX_POST_LENGTH) {
        ctx.logger.warn({ length: draft.length }, 'Post too long, truncating')
        draft = draft.slice(0, POST_CUTOFF) + POST_TRAILER
      }

      return {
        linkedinDraft: draft,
        newsletterHtml: buildNewsletterHtml(state.summaries, ctx.runId),
        currentStep: 'drafted',
      }
    })

    .addNode('render_images', async (state, ctx) => {
      if (!services.renderer || state.summaries.length === 0) {
        return { imagePaths: [], currentStep: 'images_rendered' }
      }

      const imagePaths = await services.renderer.renderCards(state.summaries.slice(0, MAX_IMAGE_CARDS), ctx.runId)
      return { imagePaths, currentStep: 'images_rendered' }
    })

    .addNode(
      'human_approval',
      (state, ctx) => {
        ctx.logger.info({ summaries: state.summaries.length, revision: state.revisionCount }, 'Awaiting approval')
        const decision = ctx.suspend(buildApprovalPreview(state), ApprovalDecisionSchema)

        if (decision.action === 'approve') {
          return { approvalStatus: 'approved', currentStep: 'approved' }
        }
        return {
          approvalStatus: 'rejected',
          feedback: decision.feedback ?? '',
          currentStep: 'revision_requested',
        }
      },
      { resumeSchema: ApprovalDecisionSchema }
    )

    .addNode('publish', async (state, ctx) => {
      await services.publisher.publish({
        runId: ctx.runId,
        newsletterHtml: state.newsletterHtml,
        linkedinDraft: state.linkedinDraft,
        imagePaths: state.imagePaths,
      })
      ctx.logger.info({ images: state.imagePaths.length }, 'Content published')
      return { currentStep: 'published' }
    })

    .addNode('revise', (state, ctx) => {
      ctx.logger.info({ feedback: state.feedback, revision: state.revisionCount + 1 }, 'Revision requested')
      return { revisionCount: state.revisionCount + 1, approvalStatus: 'pending', currentStep: 'revising' }
    })

  graph.addFanOut(START, () => services.sources.map(source => send<ContentState>(scraperNodeName(source.name))), scrapers)
  for (const scraper of scrapers) {
    graph.addEdge(scraper, 'merge_results')
  }

  return graph
    .addEdge('merge_results', 'deduplicate')
    .addEdge('deduplicate', 'credibility')
    .addEdge('credibility', 'analyze')
    .addEdge('analyze', 'summarize')
    .addEdge('summarize', 'draft_post')
    .addEdge('draft_post', 'render_images')
    .addEdge('render_images', 'human_approval')
    .addConditionalEdges(
      'human_approval',
      state => (state.approvalStatus === 'approved' ? 'publish' : 'revise'),
      ['publish', 'revise']
    )
    .addEdge('publish', END)
    .addEdge('revise', 'summarize')
    .compile()
}
