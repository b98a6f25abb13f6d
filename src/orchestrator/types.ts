import { AgentOutput, AgentRole } from '../agents/types';
import { Channel, EscalationDecision, FaqArticle, FeedbackAnalysis, Language, ProactiveAlert } from '../config/types';

export const SKIPPED = Object.freeze({ status: 'skipped' } as const);
export const PENDING_ASYNC = Object.freeze({ status: 'pending_async' } as const);

export type SkippedMarker = typeof SKIPPED;
export type PendingMarker = typeof PENDING_ASYNC;

export type AgentLogEntry<R extends AgentRole> = AgentOutput<R> | SkippedMarker | PendingMarker;
export type AgentLogs = { readonly [R in AgentRole]: AgentLogEntry<R> };

/** The one result a caller gets per interaction. Deep-frozen once built. */
export interface UnifiedResponse {
  readonly interactionId: string;
  readonly timestamp: string;
  readonly conversationId: string;
  readonly customerId: string;
  readonly channel: Channel;
  readonly language: Language;
  readonly responseText: string;
  readonly intent: string;
  readonly sentimentScore: number;
  readonly dominantEmotion: string;
  readonly toneRecommendation: string;
  readonly escalation: Readonly<EscalationDecision>;
  readonly suggestedArticles: readonly FaqArticle[];
  readonly proactiveAlerts: readonly ProactiveAlert[];
  readonly feedbackAnalysis: Readonly<FeedbackAnalysis>;
  readonly agentLogs: AgentLogs;
}
