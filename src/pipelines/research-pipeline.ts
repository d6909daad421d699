/**
 * Research Pipeline - single-paper deep dive on the graph engine
 *
 * Flow:
 *   START -> scrape_arxiv -> select_paper -> deep_analysis -> render_visual
 *   -> human_approval [suspends] -> publish -> END
 *                                -> revise -> deep_analysis (revision loop)
 *
 * A rejection re-runs the analysis of the same paper with the reviewer's
 * feedback; the paper is not selected again.
 */

import { z } from 'zod'
import { START, END } from '../graph/graph-dsl'
import { ApprovalDecisionSchema } from '../graph/interrupt'
import { StateGraph, type CompiledGraph } from '../graph/state-graph'
import { DEFAULT_RETRY_POLICIES, type RetryPolicy } from '../runtime/retry-handler'
import { ArticleSchema, type Article } from './content-state'
import { escapeHtml, type ArticleSource, type Publisher } from './content-services'

export const PaperSelectionSchema = z.object({
  url: z.string(),
  /** One sentence on why this paper matters most */
  reasoning: z.string(),
})

export type PaperSelection = z.infer<typeof PaperSelectionSchema>

export const DeepAnalysisSchema = z.object({
  coreProblem: z.string(),
  methodology: z.string(),
  breakthroughs: z.string(),
  limitations: z.string(),
})

export type DeepAnalysis = z.infer<typeof DeepAnalysisSchema>

export const ResearchPipelineState = z.object({
  triggerType: z.enum(['scheduled', 'manual']).default('manual'),

  rawArticles: z.array(ArticleSchema).default([]),
  selectedPaper: ArticleSchema.optional(),
  selectionReason: z.string().default(''),
  deepAnalysis: DeepAnalysisSchema.optional(),

  newsletterHtml: z.string().default(''),
  linkedinDraft: z.string().default(''),
  imagePaths: z.array(z.string()).default([]),

  approvalStatus: z.enum(['pending', 'approved', 'rejected']).default('pending'),
  feedback: z.string().default(''),
  revisionCount: z.number().int().nonnegative().default(0),

  errorLog: z.array(z.string()).default([]),
  currentStep: z.string().default('created'),
})

export type ResearchPipelineShape = typeof ResearchPipelineState.shape

export type ResearchState = z.infer<typeof ResearchPipelineState>

export type ResearchPipeline = CompiledGraph<ResearchPipelineShape>

export interface PaperSelector {
  /** Must answer with the url of one of the candidates */
  select(candidates: readonly Article[]): Promise<PaperSelection>
}

export interface DeepAnalyzer {
  /** `feedback` is the reviewer's note from a rejected draft, or empty */
  analyze(paper: Article, feedback: string): Promise<DeepAnalysis>
}

export interface VisualRequest {
  runId: string
  paper: Article
  analysis: DeepAnalysis
}

export interface VisualRenderer {
  /** Path of the rendered diagram */
  renderDiagram(request: VisualRequest): Promise<string>
}

export interface ResearchServices {
  papers: ArticleSource
  selector: PaperSelector
  analyzer: DeepAnalyzer
  /** The post goes out without a diagram when absent */
  renderer?: VisualRenderer
  publisher: Publisher
}

export interface ResearchPipelineOptions {
  name?: string
  /** How many fetched papers the selector gets to compare */
  maxCandidates?: number
  scraperRetry?: Partial<RetryPolicy>
}

export interface ResearchApprovalPreview {
  title: string
  linkedinDraft: string
  newsletterPreview: string
  imageCount: number
  revisionCount: number
  message: string
}

export const RESEARCH_NEWSLETTER_SUBJECT = 'AI Research Analyst: Deep Dive'

const DEFAULT_MAX_CANDIDATES = 30
const PREVIEW_LENGTH = 500

const ArticleListSchema = z.array(ArticleSchema)

export function buildResearchPost(paper: Article, analysis: DeepAnalysis): string {
  return [
    `Deep Tech Breakdown: ${paper.title}`,
    '',
    'The Core Problem:',
    analysis.coreProblem,
    '',
    'The Methodology:',
    analysis.methodology,
    '',
    'The Breakthrough:',
    analysis.breakthroughs,
    '',
    `Limitations to consider: ${analysis.limitations}`,
    '',
    `Read the full paper here: ${paper.url}`,
    '#AIResearch #MachineLearning #DeepLearning #ArXiv',
  ].join('\n')
}

export function buildResearchNewsletterHtml(paper: Article, analysis: DeepAnalysis): string {
  const section = (heading: string, text: string) => `
    <h3 style="border-bottom:1px solid #eee;padding-bottom:5px;">${heading}</h3>
    <p>${escapeHtml(text)}</p>`

  return `<div style="font-family:Arial,sans-serif;color:#333;line-height:1.6;">
    <h2 style="color:#0a66c2;">Deep Dive: ${escapeHtml(paper.title)}</h2>
    <p><strong>Read the paper:</strong> <a href="${escapeHtml(paper.url)}">${escapeHtml(paper.url)}</a></p>${[
      section('The Core Problem', analysis.coreProblem),
      section('Innovative Methodology', analysis.methodology),
      section('Key Breakthroughs', analysis.breakthroughs),
      section('Limitations &amp; Future Work', analysis.limitations),
    ].join('')}
  </div>`
}

export function buildResearchPreview(state: Readonly<ResearchState>): ResearchApprovalPreview {
  return {
    title: state.selectedPaper?.title ?? '',
    linkedinDraft: state.linkedinDraft,
    newsletterPreview: state.newsletterHtml.slice(0, PREVIEW_LENGTH),
    imageCount: state.imagePaths.length,
    revisionCount: state.revisionCount,
    message: 'Please review the deep dive and approve or reject with feedback.',
  }
}

export function buildResearchPipeline(
  services: ResearchServices,
  options: ResearchPipelineOptions = {}
): ResearchPipeline {
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES
  const scraperRetry = options.scraperRetry ?? DEFAULT_RETRY_POLICIES.transient

  return new StateGraph(ResearchPipelineState, {
    name: options.name ?? 'research-pipeline',
    append: ['rawArticles'],
    errorField: 'errorLog',
  })
    .addNode(
      'scrape_arxiv',
      async (state, ctx) => {
        const papers = ArticleListSchema.parse(
          await services.papers.fetch({ runId: ctx.runId, triggerType: state.triggerType })
        )
        ctx.logger.info({ source: services.papers.name, count: papers.length }, 'Papers fetched')
        return { rawArticles: papers }
      },
      { retryPolicy: scraperRetry }
    )

    .addNode('select_paper', async (state, ctx) => {
      const candidates = state.rawArticles.slice(0, maxCandidates)
      if (candidates.length === 0) {
        return { errorLog: ['select_paper: no papers to choose from'], currentStep: 'no_papers_found' }
      }

      const selection = PaperSelectionSchema.parse(await services.selector.select(candidates))
      const chosen = candidates.find(paper => paper.url === selection.url)
      if (!chosen) {
        ctx.logger.warn({ url: selection.url }, 'Selector chose an unknown paper, taking the first')
      }

      const paper = chosen ?? candidates[0]
      ctx.logger.info({ title: paper.title, candidates: candidates.length }, 'Paper selected')
      return { selectedPaper: paper, selectionReason: selection.reasoning, currentStep: 'paper_selected' }
    })

    .addNode('deep_analysis', async (state, ctx) => {
      const paper = state.selectedPaper
      if (!paper) {
        return { errorLog: ['deep_analysis: no paper selected'], currentStep: 'error_no_paper' }
      }

      const analysis = DeepAnalysisSchema.parse(await services.analyzer.analyze(paper, state.feedback))
      ctx.logger.info({ title: paper.title, revision: state.revisionCount }, 'Paper analysed')
      return {
        deepAnalysis: analysis,
        linkedinDraft: buildResearchPost(paper, analysis),
        newsletterHtml: buildResearchNewsletterHtml(paper, analysis),
        currentStep: 'analysis_complete',
      }
    })

    .addNode('render_visual', async (state, ctx) => {
      const paper = state.selectedPaper
      const analysis = state.deepAnalysis
      if (!services.renderer || !paper || !analysis) {
        return { imagePaths: [], currentStep: 'visuals_generated' }
      }

      const path = await services.renderer.renderDiagram({ runId: ctx.runId, paper, analysis })
      return { imagePaths: [path], currentStep: 'visuals_generated' }
    })

    .addNode(
      'human_approval',
      (state, ctx) => {
        ctx.logger.info({ revision: state.revisionCount }, 'Awaiting approval')
        const decision = ctx.suspend(buildResearchPreview(state), ApprovalDecisionSchema)

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
        subject: RESEARCH_NEWSLETTER_SUBJECT,
        newsletterHtml: state.newsletterHtml,
        linkedinDraft: state.linkedinDraft,
        imagePaths: state.imagePaths,
      })
      ctx.logger.info({ chars: state.linkedinDraft.length }, 'Research published')
      return { currentStep: 'published' }
    })

    .addNode('revise', (state, ctx) => {
      ctx.logger.info({ feedback: state.feedback, revision: state.revisionCount + 1 }, 'Revision requested')
      return { revisionCount: state.revisionCount + 1, approvalStatus: 'pending', currentStep: 'revising' }
    })

    .addEdge(START, 'scrape_arxiv')
    .addEdge('scrape_arxiv', 'select_paper')
    .addEdge('select_paper', 'deep_analysis')
    .addEdge('deep_analysis', 'render_visual')
    .addEdge('render_visual', 'human_approval')
    .addConditionalEdges(
      'human_approval',
      state => (state.approvalStatus === 'approved' ? 'publish' : 'revise'),
      ['publish', 'revise']
    )
    .addEdge('publish', END)
    .addEdge('revise', 'deep_analysis')
    .compile()
}
