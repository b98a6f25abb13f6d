import { ContextSnapshot } from '../context/types';

/** Channels a customer interaction can arrive on */
export type Channel = 'chat' | 'email' | 'social';

export type Language = 'en' | 'ar';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type SentimentTrend = 'improving' | 'declining' | 'stable';

/** One account usage record; numeric fields are what the anomaly scan reads */
export type UsageLogEntry = Record<string, unknown>;

// ───── Inbound ─────

export interface InteractionRequest {
  customerId: string;
  customerMessage: string;
  channel: Channel;
  conversationId?: string;
  accountId?: string;
  accountData?: Record<string, unknown>;
  usageLogs?: UsageLogEntry[];
  customerFeedback?: Record<string, unknown>;
  conversationHistory?: string[];
}

// ───── Agent payload pieces ─────

export interface FaqArticle {
  articleId: string;
  title: string;
  contentSnippet: string;
  confidenceScore: number;
}

export interface ProactiveAlert {
  alertType: string;
  severity: Severity;
  anomalyScore: number;
  recommendedAction: string;
  timestamp: string;
}

export interface FeedbackAnalysis {
  csatScore: number | null;
  sentimentTrend: SentimentTrend | null;
  topIssues: string[];
  knowledgeGapFlags: string[];
}

export interface KnowledgeBaseUpdate {
  topic: string;
  action: 'create_article' | 'review_article';
  reason: string;
}

// ───── Escalation ─────

export type EscalationTrigger =
  | 'explicit_request'
  | 'escalation_intent'
  | 'negative_sentiment'
  | 'persistent_emotion'
  | 'sentiment_agent_flag'
  | 'critical_alert'
  | 'unresolved_turns';

export interface EscalationDecision {
  escalate: boolean;
  reasons: string[];
  /** Parallel to reasons; stable codes for metrics and tests */
  triggers: EscalationTrigger[];
  /** Reasons joined with " | ", null when nothing fired */
  reason: string | null;
}

export interface EscalationPayload {
  interactionId: string;
  customerId: string;
  channel: Channel;
  conversationId?: string;
  reason: string;
  reasons: string[];
  summary: string;
  /** Conversation state at hand-off; absent on manually submitted escalations */
  contextSnapshot?: ContextSnapshot;
  timestamp: string;
}
