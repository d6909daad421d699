import { describe, it, expect, vi } from 'vitest'
import { GraphExecutor, type RunResult } from '../../graph/graph-executor'
import { GraphDefinitionError } from '../../graph/errors'
import { InMemoryCheckpointStore } from '../../storage/in-memory-checkpoint-store'
import {
  buildContentPipeline,
  scraperNodeName,
  type ApprovalPreview,
  type ContentPipelineOptions,
} from '../../pipelines/content-pipeline'
import {
  ReputationCredibilityScorer,
  buildNewsletterHtml,
  normalizeCategory,
  rankArticle,
  type ContentServices,
  type PublishRequest,
} from '../../pipelines/content-services'
import type { Article, Summary } from '../../pipelines/content-state'

const NOW = new Date('2026-01-01T00:00:00Z')

function article(title: string, url: string, content: string, source = 'rss'): Article {
  return { title, url, source, content, publishedAt: NOW.toISOString(), credibilityScore: 0 }
}

const REUTERS = article('Model A released', 'https://www.reuters.com/a', 'alpha')
const TITLE_COPY = article('  model a released ', 'https://example.com/copy', 'another body')
const DEV_POST = article('Dev post', 'https://dev.to/post', 'delta')
const CONTENT_COPY = article('Different title', 'https://arxiv.org/abs/0', 'alpha', 'arxiv')
const PAPER = article('Paper', 'https://arxiv.org/abs/1', 'epsilon', 'arxiv')

const REPUTATION = { 'reuters.com': 0.95, 'dev.to': 0.45, 'arxiv.org': 0.8 }

function toSummary(source: Article): Summary {
  return {
    headline: source.title,
    body: `About ${source.title}`,
    category: source.category ?? 'Other',
    sourceUrls: [source.url],
    credibilityScore: source.credibilityScore,
  }
}

function fakeServices(overrides: Partial<ContentServices> = {}) {
  const summarized: Array<{ titles: string[]; feedback: string }> = []
  const published: PublishRequest[] = []

  const services: ContentServices = {
    sources: [
      { name: 'rss', fetch: async () => [REUTERS, TITLE_COPY, DEV_POST] },
      { name: 'arxiv', fetch: async () => [CONTENT_COPY, PAPER] },
    ],
    credibility: new ReputationCredibilityScorer({ reputation: REPUTATION }),
    analyzer: {
      analyze: async () => [
        { index: 0, category: 'LLM', relevanceScore: 0.2 },
        { index: 1, category: 'Bogus', relevanceScore: 0.9 },
        // outside the batch
        { index: 5, category: 'LLM', relevanceScore: 1 },
      ],
    },
    summarizer: {
      summarize: async (articles, feedback) => {
        summarized.push({ titles: articles.map(entry => entry.title), feedback })
        return articles.map(toSummary)
      },
    },
    writer: {
      draftPost: async (summaries, feedback) =>
        `  Post about ${summaries.length} stories${feedback ? ` (${feedback})` : ''}  `,
    },
    renderer: {
      renderCards: async (summaries, runId) => summaries.map((_, index) => `/cards/${runId}/${index}.png`),
    },
    publisher: {
      publish: async request => {
        published.push(request)
      },
    },
    ...overrides,
  }

  return { services, summarized, published }
}

function setup(overrides: Partial<ContentServices> = {}, options: ContentPipelineOptions = {}) {
  const fakes = fakeServices(overrides)
  const pipeline = buildContentPipeline(fakes.services, { credibilityThreshold: 0.5, now: () => NOW, ...options })
  const executor = new GraphExecutor(pipeline, {
    checkpointStore: new InMemoryCheckpointStore(),
    sleep: async () => {},
  })
  return { ...fakes, pipeline, executor }
}

function previewOf(result: RunResult<unknown>): unknown {
  if (result.status !== 'awaiting') throw new Error(`expected an awaiting run, got ${result.status}`)
  expect(result.interrupt.node).toBe('human_approval')
  return result.interrupt.payload
}

describe('content pipeline', () => {
  it('requires at least one source', () => {
    expect(() => buildContentPipeline({ ...fakeServices().services, sources: [] })).toThrow(GraphDefinitionError)
  })

  it('names one scraper node per source', () => {
    const { pipeline } = setup()

    expect(pipeline.nodes.names()).toEqual([
      scraperNodeName('rss'),
      scraperNodeName('arxiv'),
      'merge_results',
      'deduplicate',
      'credibility',
      'analyze',
      'summarize',
      'draft_post',
      'render_images',
      'human_approval',
      'publish',
      'revise',
    ])
  })

  it('stops for approval with a preview of the drafted content', async () => {
    const { executor, summarized } = setup()

    const result = await executor.run({ triggerType: 'scheduled' }, { runId: 'run-1' })
    const summaries = result.state.summaries

    const expected: ApprovalPreview = {
      linkedinDraft: 'Post about 3 stories',
      newsletterPreview: buildNewsletterHtml(summaries, 'run-1').slice(0, 500),
      imageCount: 3,
      summaryCount: 3,
      revisionCount: 0,
      message: 'Please review the content and approve or reject with feedback.',
    }
    expect(previewOf(result)).toEqual(expected)
    expect(result.state.currentStep).toBe('images_rendered')
    expect(result.state.errorLog).toEqual([])
    expect(summarized).toEqual([{ titles: ['Dev post', 'Paper', 'Model A released'], feedback: '' }])
  })

  it('drops duplicates and keeps every scored article, credible or not', async () => {
    const { executor } = setup()

    const result = await executor.run({}, { runId: 'run-1' })

    expect(result.state.rawArticles).toHaveLength(5)
    expect(
      result.state.articles.map(entry => [entry.title, entry.credibilityScore, entry.category, entry.relevanceScore])
    ).toEqual([
      ['Model A released', 0.68, 'LLM', 0.2],
      ['Dev post', 0.48, 'Other', 0.9],
      ['Paper', 0.62, undefined, undefined],
    ])
  })

  it('deduplicates everything fetched before any cap applies', async () => {
    const x = article('X', 'https://www.reuters.com/x', 'x body')
    const xCopy = article('X again', 'https://example.com/x', 'x body')
    const y = article('Y', 'https://arxiv.org/abs/y', 'y body', 'arxiv')
    const { executor, summarized } = setup(
      {
        sources: [
          { name: 'rss', fetch: async () => [x, xCopy] },
          { name: 'arxiv', fetch: async () => [y] },
        ],
      },
      { maxArticlesPerRun: 2 }
    )

    const result = await executor.run({}, { runId: 'run-1' })

    expect(result.state.articles.map(entry => entry.title)).toEqual(['X', 'Y'])
    expect(summarized).toEqual([{ titles: ['Y', 'X'], feedback: '' }])
  })

  it('caps the summarised articles after ranking them', async () => {
    const { executor, summarized } = setup({}, { maxArticlesPerRun: 2 })

    await executor.run({}, { runId: 'run-1' })

    expect(summarized).toEqual([{ titles: ['Dev post', 'Paper'], feedback: '' }])
  })

  it('publishes the approved content', async () => {
    const { executor, published } = setup()
    const first = await executor.run({}, { runId: 'run-1' })

    const result = await executor.resume('run-1', { action: 'approve' })

    expect(result.status).toBe('completed')
    expect(result.state.approvalStatus).toBe('approved')
    expect(result.state.currentStep).toBe('published')
    expect(published).toEqual([
      {
        runId: 'run-1',
        newsletterHtml: first.state.newsletterHtml,
        linkedinDraft: 'Post about 3 stories',
        imagePaths: ['/cards/run-1/0.png', '/cards/run-1/1.png', '/cards/run-1/2.png'],
      },
    ])
  })

  it('loops back through summarising with the reviewer feedback', async () => {
    const { executor, summarized, published } = setup()
    await executor.run({}, { runId: 'run-1' })

    const result = await executor.resume('run-1', { action: 'reject', feedback: 'shorter please' })

    expect(previewOf(result)).toMatchObject({
      linkedinDraft: 'Post about 3 stories (shorter please)',
      revisionCount: 1,
    })
    expect(result.state.revisionCount).toBe(1)
    expect(result.state.approvalStatus).toBe('pending')
    expect(result.state.feedback).toBe('shorter please')
    expect(summarized.map(call => call.feedback)).toEqual(['', 'shorter please'])
    expect(published).toEqual([])

    const approved = await executor.resume('run-1', { action: 'approve' })
    expect(approved.state.currentStep).toBe('published')
    expect(published).toHaveLength(1)
  })

  it('records a source that keeps failing and carries on with the rest', async () => {
    const broken = vi.fn(async (): Promise<Article[]> => {
      throw new Error('feed unavailable')
    })
    const { executor } = setup(
      {
        sources: [
          { name: 'rss', fetch: async () => [REUTERS] },
          { name: 'broken', fetch: broken },
        ],
      },
      { scraperRetry: { maxAttempts: 2, initialIntervalMs: 1, backoffFactor: 2, jitter: false } }
    )

    const result = await executor.run({}, { runId: 'run-1' })

    expect(broken).toHaveBeenCalledTimes(2)
    expect(result.status).toBe('awaiting')
    expect(result.state.errorLog).toEqual(['scrape_broken: feed unavailable'])
    expect(result.state.summaries.map(summary => summary.headline)).toEqual(['Model A released'])
  })

  it('logs every empty stage when no source returns anything', async () => {
    const { executor } = setup({ sources: [{ name: 'rss', fetch: async () => [] }] })

    const result = await executor.run({}, { runId: 'run-1' })

    expect(result.status).toBe('awaiting')
    expect(result.state.errorLog).toEqual([
      'credibility: no articles to score',
      'analyze: no articles to process',
      'summarize: no articles to process',
      'draft_post: no summaries to draft from',
    ])
    expect(result.state.imagePaths).toEqual([])
  })

  it('skips analysis and images without those collaborators', async () => {
    const { executor } = setup({ analyzer: undefined, renderer: undefined })

    const result = await executor.run({}, { runId: 'run-1' })

    expect(result.state.articles.map(entry => entry.category)).toEqual([undefined, undefined, undefined])
    expect(result.state.imagePaths).toEqual([])
    expect(previewOf(result)).toMatchObject({ imageCount: 0 })
  })

  it('cuts an overlong post and adds the hashtag trailer', async () => {
    const { executor } = setup({ writer: { draftPost: async () => 'x'.repeat(3100) } })

    const result = await executor.run({}, { runId: 'run-1' })

    expect(result.state.linkedinDraft).toBe('x'.repeat(2950) + '\n\n#AI #MachineLearning')
  })
})

describe('content services', () => {
  describe('ReputationCredibilityScorer', () => {
    const scorer = new ReputationCredibilityScorer()

    it('looks domains up in the bundled table', () => {
      expect(scorer.reputationOf('https://www.reuters.com/world')).toBe(0.95)
      expect(scorer.reputationOf('https://TechCrunch.com/post')).toBe(0.85)
    })

    it('falls back to the parent domain, then the default', () => {
      expect(scorer.reputationOf('https://blog.arxiv.org/post')).toBe(0.8)
      expect(scorer.reputationOf('https://unknown.example/post')).toBe(0.4)
      expect(scorer.reputationOf('not a url')).toBe(0.4)
    })

    it('weights reputation with neutral cross-reference and consistency', () => {
      expect(scorer.score(article('t', 'https://techcrunch.com/a', 'c'))).toBe(0.64)
      expect(new ReputationCredibilityScorer({ reputation: {}, fallback: 0 }).score(REUTERS)).toBe(0.3)
    })
  })

  describe('rankArticle', () => {
    it('prefers relevant, credible and recent articles', () => {
      const fresh = { ...REUTERS, credibilityScore: 1, relevanceScore: 1 }
      expect(rankArticle(fresh, NOW)).toBeCloseTo(1)

      const weekOld = { ...fresh, publishedAt: '2025-12-25T00:00:00Z' }
      expect(rankArticle(weekOld, NOW)).toBeCloseTo(0.75)
    })

    it('treats a missing relevance and an unreadable date as neutral', () => {
      const unknown = { ...REUTERS, credibilityScore: 0.5, publishedAt: 'yesterday' }
      expect(rankArticle(unknown, NOW)).toBeCloseTo(0.5)
    })
  })

  it('maps unknown categories to Other', () => {
    expect(normalizeCategory('Robotics')).toBe('Robotics')
    expect(normalizeCategory('robotics')).toBe('Other')
  })

  it('escapes summary text in the newsletter', () => {
    const html = buildNewsletterHtml(
      [
        {
          headline: '<b>Bold & "quoted"</b>',
          body: 'body',
          category: 'LLM',
          sourceUrls: [],
          credibilityScore: 0.5,
        },
      ],
      'run-1'
    )

    expect(html).toContain(
      '<h2 style="margin:4px 0;font-size:18px;">&lt;b&gt;Bold &amp; &quot;quoted&quot;&lt;/b&gt;</h2>'
    )
    expect(html).toContain('<p style="color:#666;font-size:13px;">Run ID: run-1</p>')
  })
})
