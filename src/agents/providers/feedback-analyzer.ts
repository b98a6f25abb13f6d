import { FeedbackAnalysis, KnowledgeBaseUpdate, SentimentTrend } from '../../config/types';
import { UNRESOLVED_INTENTS } from '../../context/conversation-context';
import { logger } from '../../observability/logger';
import { CapabilityProvider, FeedbackInput, FeedbackOutput, FeedbackRecord, PastInteraction } from '../types';

export const MAX_TOP_ISSUES = 5;
export const MAX_GAP_QUERIES = 3;
const TREND_DELTA = 0.1;
const QUERY_PREVIEW_LENGTH = 100;

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** CSAT on a 0-5 scale; percentage-style ratings above 5 are divided by 20 */
export function normalizeCsat(feedback: Record<string, unknown> | null): number | null {
  if (!feedback) return null;
  const raw = toNumber(feedback.csat_score) ?? toNumber(feedback.rating);
  if (raw === null) return null;
  return raw > 5 ? Math.min(raw / 20, 5) : raw;
}

/** Compares the average of the first half of the scores against the second half */
export function sentimentTrend(history: readonly FeedbackRecord[]): SentimentTrend | null {
  const scores = history
    .map((record) => record.csatScore ?? record.sentimentScore)
    .filter((score): score is number => typeof score === 'number');
  if (scores.length < 2) return null;

  const mid = Math.floor(scores.length / 2);
  const average = (values: number[]): number => values.reduce((a, b) => a + b, 0) / values.length;
  const diff = average(scores.slice(mid)) - average(scores.slice(0, mid));

  if (diff > TREND_DELTA) return 'improving';
  if (diff < -TREND_DELTA) return 'declining';
  return 'stable';
}

/** Most frequent resolved intents, most common first; ties keep first-seen order */
export function topIssues(interactions: readonly PastInteraction[], max = MAX_TOP_ISSUES): string[] {
  const counts = new Map<string, number>();
  for (const { intent } of interactions) {
    if (!intent || intent === 'unknown') continue;
    counts.set(intent, (counts.get(intent) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, max)
    .map(([intent]) => intent);
}

export function unresolvedQueries(interactions: readonly PastInteraction[]): string[] {
  const queries: string[] = [];
  for (const interaction of interactions) {
    if (!UNRESOLVED_INTENTS.has(interaction.intent) || !interaction.customerMessage) continue;
    const preview = interaction.customerMessage.slice(0, QUERY_PREVIEW_LENGTH);
    if (!queries.includes(preview)) queries.push(preview);
  }
  return queries.slice(0, MAX_GAP_QUERIES);
}

export function knowledgeGaps(interactions: readonly PastInteraction[]): string[] {
  const unresolved = interactions.filter((interaction) => UNRESOLVED_INTENTS.has(interaction.intent)).length;
  const gaps: string[] = [];
  if (unresolved > 0) {
    gaps.push(`${unresolved} interactions with unresolved intent`);
  }
  for (const query of unresolvedQueries(interactions)) {
    gaps.push(`Low-confidence query: '${query}'`);
  }
  return gaps;
}

/** Post-interaction analytics: CSAT, trends, recurring issues and knowledge gaps */
export class FeedbackAnalyzer implements CapabilityProvider<'feedback'> {
  readonly role = 'feedback' as const;
  private readonly log = logger.child({ component: 'feedback-analyzer' });

  async invoke(input: FeedbackInput): Promise<FeedbackOutput> {
    const { interactionLog } = input;
    const analysis: FeedbackAnalysis = {
      csatScore: normalizeCsat(input.customerFeedback),
      sentimentTrend: sentimentTrend(interactionLog.feedbackHistory),
      topIssues: topIssues(interactionLog.pastInteractions),
      knowledgeGapFlags: knowledgeGaps(interactionLog.pastInteractions),
    };

    const knowledgeBaseUpdates: KnowledgeBaseUpdate[] = unresolvedQueries(interactionLog.pastInteractions).map(
      (query) => ({
        topic: query,
        action: 'create_article',
        reason: 'Customers asked this without a confident intent match',
      }),
    );

    this.log.info(
      {
        interactionId: input.interactionId,
        csatScore: analysis.csatScore,
        sentimentTrend: analysis.sentimentTrend,
        topIssues: analysis.topIssues.length,
        knowledgeGaps: analysis.knowledgeGapFlags.length,
      },
      'Feedback analyzed',
    );

    return { feedbackAnalysis: analysis, knowledgeBaseUpdates };
  }
}
