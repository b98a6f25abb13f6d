import {
  AgentOutcome,
  AnomalyOutput,
  FeedbackOutput,
  GeneratorOutput,
  KnowledgeOutput,
  SentimentOutput,
} from '../agents/types';
import { EscalationDecision, FeedbackAnalysis, Language } from '../config/types';
import { ContextSnapshot } from '../context/types';
import { NEUTRAL_EMOTION } from '../escalation/escalation-evaluator';
import { AgentLogEntry, PENDING_ASYNC, SKIPPED, UnifiedResponse } from './types';

export const DEFAULT_TONE = 'neutral and professional';

export interface AgentOutcomes {
  generator: AgentOutcome<GeneratorOutput>;
  knowledge: AgentOutcome<KnowledgeOutput>;
  sentiment: AgentOutcome<SentimentOutput>;
  anomaly: AgentOutcome<AnomalyOutput>;
  /** undefined while the deferred analysis has not run yet */
  feedback?: AgentOutcome<FeedbackOutput>;
}

export interface AggregationInput {
  interactionId: string;
  timestamp: string;
  context: Pick<ContextSnapshot, 'conversationId' | 'customerId' | 'channel'>;
  outcomes: AgentOutcomes;
  escalation: EscalationDecision;
  defaultLanguage: Language;
}

export function emptyFeedbackAnalysis(): FeedbackAnalysis {
  return { csatScore: null, sentimentTrend: null, topIssues: [], knowledgeGapFlags: [] };
}

function logEntry<T extends object>(outcome: AgentOutcome<T>): T | typeof SKIPPED {
  return outcome ? structuredClone(outcome) : SKIPPED;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Merge whatever agent outcomes exist into one response. Absent outcomes fall back
 * to neutral defaults; this function has no failure path.
 */
export function aggregateResponse(input: AggregationInput): UnifiedResponse {
  const { generator, knowledge, sentiment, anomaly, feedback } = input.outcomes;

  const feedbackLog: AgentLogEntry<'feedback'> =
    feedback === undefined ? PENDING_ASYNC : logEntry(feedback);

  const response: UnifiedResponse = {
    interactionId: input.interactionId,
    timestamp: input.timestamp,
    conversationId: input.context.conversationId,
    customerId: input.context.customerId,
    channel: input.context.channel,
    language: generator?.language ?? input.defaultLanguage,
    responseText: generator?.responseText ?? '',
    intent: generator?.intent ?? 'unknown',
    sentimentScore: sentiment?.sentimentScore ?? 0,
    dominantEmotion: sentiment?.dominantEmotion ?? NEUTRAL_EMOTION,
    toneRecommendation: sentiment?.toneRecommendation ?? DEFAULT_TONE,
    escalation: { ...input.escalation, reasons: [...input.escalation.reasons], triggers: [...input.escalation.triggers] },
    suggestedArticles: knowledge ? knowledge.suggestedArticles.map((article) => ({ ...article })) : [],
    proactiveAlerts: anomaly ? anomaly.proactiveAlerts.map((alert) => ({ ...alert })) : [],
    feedbackAnalysis: feedback ? structuredClone(feedback.feedbackAnalysis) : emptyFeedbackAnalysis(),
    agentLogs: {
      generator: logEntry(generator),
      knowledge: logEntry(knowledge),
      sentiment: logEntry(sentiment),
      anomaly: logEntry(anomaly),
      feedback: feedbackLog,
    },
  };

  return deepFreeze(response);
}
