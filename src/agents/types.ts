import {
  Channel,
  FaqArticle,
  FeedbackAnalysis,
  KnowledgeBaseUpdate,
  Language,
  ProactiveAlert,
  UsageLogEntry,
} from '../config/types';
import { ContextSnapshot, HistoryEntry } from '../context/types';

/** Every agent input is tied to the interaction that produced it */
export interface AgentInputBase {
  interactionId: string;
}

// ───── Response generator ─────

export interface GeneratorInput extends AgentInputBase {
  customerMessage: string;
  channel: Channel;
  context: ContextSnapshot;
}

export interface GeneratorOutput {
  responseText: string;
  intent: string;
  confidence: number;
  escalationFlag: boolean;
  language: Language;
}

// ───── Knowledge search ─────

export interface KnowledgeInput extends AgentInputBase {
  queryText: string;
  topK: number;
  language: Language;
}

export interface KnowledgeOutput {
  suggestedArticles: FaqArticle[];
  updatedKnowledge: boolean;
}

// ───── Sentiment ─────

export interface SentimentInput extends AgentInputBase {
  conversationText: string;
  emotionHistory: string[];
}

export interface SentimentOutput {
  sentimentScore: number;
  dominantEmotion: string;
  emotionScores: Record<string, number>;
  escalationFlag: boolean;
  escalationReason: string | null;
  toneRecommendation: string;
}

// ───── Anomaly scan ─────

export interface AnomalyInput extends AgentInputBase {
  accountId: string;
  accountData: Record<string, unknown>;
  usageLogs: UsageLogEntry[];
}

export interface AnomalyOutput {
  proactiveAlerts: ProactiveAlert[];
}

// ───── Feedback analysis ─────

export interface FeedbackRecord {
  csatScore?: number;
  sentimentScore?: number;
}

export interface PastInteraction {
  intent: string;
  customerMessage?: string;
}

export interface InteractionLog {
  customerMessage: string;
  responseText: string;
  intent: string;
  sentimentScore: number | null;
  history: HistoryEntry[];
  pastInteractions: PastInteraction[];
  feedbackHistory: FeedbackRecord[];
}

export interface FeedbackInput extends AgentInputBase {
  customerFeedback: Record<string, unknown> | null;
  interactionLog: InteractionLog;
}

export interface FeedbackOutput {
  feedbackAnalysis: FeedbackAnalysis;
  knowledgeBaseUpdates: KnowledgeBaseUpdate[];
}

// ───── Role registry ─────

export interface AgentIO {
  generator: { input: GeneratorInput; output: GeneratorOutput };
  knowledge: { input: KnowledgeInput; output: KnowledgeOutput };
  sentiment: { input: SentimentInput; output: SentimentOutput };
  anomaly: { input: AnomalyInput; output: AnomalyOutput };
  feedback: { input: FeedbackInput; output: FeedbackOutput };
}

export type AgentRole = keyof AgentIO;

export type AgentInput<R extends AgentRole> = AgentIO[R]['input'];
export type AgentOutput<R extends AgentRole> = AgentIO[R]['output'];

/** An agent result, or null when the agent failed, timed out or was not run */
export type AgentOutcome<T> = T | null;

/**
 * What a concrete analysis capability implements. Providers may throw freely;
 * the AgentContract wrapping them converts every failure into an absent outcome.
 */
export interface CapabilityProvider<R extends AgentRole> {
  readonly role: R;
  init?(): Promise<void>;
  shutdown?(): Promise<void>;
  invoke(input: AgentInput<R>): Promise<AgentOutput<R>>;
}

export type AgentProviders = { [R in AgentRole]: CapabilityProvider<R> };
