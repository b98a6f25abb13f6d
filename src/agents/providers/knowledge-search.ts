import path from 'path';
import { env } from '../../config/env';
import { FaqArticle, Language } from '../../config/types';
import { ajv } from '../../config/validation';
import { loadYamlResource } from '../../config/yaml-loader';
import { logger } from '../../observability/logger';
import { CapabilityProvider, KnowledgeInput, KnowledgeOutput } from '../types';
import { round4, tokenize } from './text-utils';

export const MIN_MATCH_SCORE = 0.3;
export const SNIPPET_LENGTH = 200;
const TAG_BONUS = 0.5;

export interface FaqEntry {
  article_id: string;
  title: string;
  content: string;
  language: Language;
  tags?: string[];
}

interface FaqFile {
  articles: FaqEntry[];
}

interface StopWordFile {
  stop_words: string[];
}

const validateFaqFile = ajv.compile<FaqFile>({
  type: 'object',
  required: ['articles'],
  properties: {
    articles: {
      type: 'array',
      items: {
        type: 'object',
        required: ['article_id', 'title', 'content', 'language'],
        properties: {
          article_id: { type: 'string' },
          title: { type: 'string' },
          content: { type: 'string' },
          language: { enum: ['en', 'ar'] },
          tags: { type: 'array', items: { type: 'string' } },
        },
      },
    },
  },
});

const validateStopWords = ajv.compile<StopWordFile>({
  type: 'object',
  required: ['stop_words'],
  properties: { stop_words: { type: 'array', items: { type: 'string' } } },
});

interface IndexedArticle {
  entry: FaqEntry;
  terms: Set<string>;
  tagTerms: Set<string>;
}

export interface KnowledgeSearchOptions {
  articles?: FaqEntry[];
  stopWords?: string[];
  faqPath?: string;
  stopWordsPath?: string;
}

/**
 * FAQ lookup by keyword overlap. The index is built once in init(); queries never touch disk.
 */
export class KnowledgeSearch implements CapabilityProvider<'knowledge'> {
  readonly role = 'knowledge' as const;
  private index: IndexedArticle[] | null = null;
  private stopWords: ReadonlySet<string> = new Set();
  private readonly log = logger.child({ component: 'knowledge-search' });

  constructor(private readonly options: KnowledgeSearchOptions = {}) {}

  async init(): Promise<void> {
    const articles = this.options.articles ?? this.loadArticles();
    this.stopWords = new Set(this.options.stopWords ?? this.loadStopWords());
    this.index = articles.map((entry) => ({
      entry,
      terms: new Set(tokenize(`${entry.title} ${entry.content}`)),
      tagTerms: new Set((entry.tags ?? []).flatMap((tag) => tokenize(tag))),
    }));
    this.log.info({ articles: this.index.length }, 'Knowledge index built');
  }

  async shutdown(): Promise<void> {
    this.index = null;
  }

  async invoke(input: KnowledgeInput): Promise<KnowledgeOutput> {
    if (!this.index) {
      throw new Error('Knowledge search used before init()');
    }
    return {
      suggestedArticles: this.search(this.index, input.queryText, input.topK, input.language),
      updatedKnowledge: false,
    };
  }

  /** Meaningful query terms; a query made only of stop words keeps all of its terms */
  queryTerms(query: string): string[] {
    const terms = tokenize(query);
    const meaningful = terms.filter((term) => !this.stopWords.has(term) && term.length > 1);
    return meaningful.length > 0 ? meaningful : terms;
  }

  private search(index: IndexedArticle[], query: string, topK: number, language: Language): FaqArticle[] {
    const terms = this.queryTerms(query);
    if (terms.length === 0 || topK <= 0) return [];

    const hits = index
      .map((article) => ({ article, score: scoreArticle(article, terms) }))
      .filter((hit) => hit.score >= MIN_MATCH_SCORE);

    const sameLanguage = hits.filter((hit) => hit.article.entry.language === language);
    const candidates = sameLanguage.length > 0 ? sameLanguage : hits;

    return candidates
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(({ article, score }) => ({
        articleId: article.entry.article_id,
        title: article.entry.title,
        contentSnippet: article.entry.content.slice(0, SNIPPET_LENGTH),
        confidenceScore: round4(Math.min(1, score)),
      }));
  }

  private loadArticles(): FaqEntry[] {
    const filePath = this.options.faqPath ?? path.join(env.projectRoot, 'knowledge', 'faq.yaml');
    return loadYamlResource(filePath, validateFaqFile)?.articles ?? [];
  }

  private loadStopWords(): string[] {
    const filePath = this.options.stopWordsPath ?? path.join(env.projectRoot, 'knowledge', 'stop-words.yaml');
    return loadYamlResource(filePath, validateStopWords)?.stop_words ?? [];
  }
}

function scoreArticle(article: IndexedArticle, terms: string[]): number {
  let score = 0;
  for (const term of terms) {
    if (article.terms.has(term) || article.tagTerms.has(term)) {
      score += 1;
      if (article.tagTerms.has(term)) score += TAG_BONUS;
    }
  }
  return score / terms.length;
}
