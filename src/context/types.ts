import { Channel, Language } from '../config/types';

export type HistoryRole = 'customer' | 'assistant';

export interface HistoryEntry {
  role: HistoryRole;
  text: string;
  timestamp: string;
}

/** Immutable view of a conversation's state at one point in time */
export interface ContextSnapshot {
  readonly conversationId: string;
  readonly customerId: string;
  readonly channel: Channel;
  readonly language: Language;
  readonly history: readonly HistoryEntry[];
  readonly previousIntents: readonly string[];
  readonly emotionTrend: readonly string[];
  readonly turnCount: number;
  readonly unresolvedTurns: number;
  readonly isEscalated: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** What one completed turn contributes to the context */
export interface TurnResult {
  customerMessage: string;
  responseText: string;
  intent: string;
  dominantEmotion: string;
  language: Language;
  escalated: boolean;
}

export interface ContextRepository {
  get(conversationId: string): Promise<ContextSnapshot | null>;
  save(snapshot: ContextSnapshot): Promise<void>;
}
