import { Channel, Language } from '../config/types';
import { ContextSnapshot, HistoryEntry, TurnResult } from './types';

export const HISTORY_LIMIT = 20;
export const INTENT_LIMIT = 10;
export const EMOTION_LIMIT = 10;

/** Intent labels that count as "not resolved yet" */
export const UNRESOLVED_INTENTS: ReadonlySet<string> = new Set(['unknown', 'unclear', 'unresolved']);

function keepLast<T>(items: readonly T[], limit: number): T[] {
  return items.length > limit ? items.slice(items.length - limit) : [...items];
}

function toCounter(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}

export interface NewContextParams {
  conversationId: string;
  customerId: string;
  channel: Channel;
  language: Language;
}

/**
 * Owns the rules for how a conversation evolves turn by turn.
 * Every transition produces fresh arrays, so snapshots handed out earlier never change.
 */
export class ConversationContext {
  private constructor(private state: ContextSnapshot) {}

  static create(params: NewContextParams, now: Date = new Date()): ConversationContext {
    const timestamp = now.toISOString();
    return new ConversationContext({
      conversationId: params.conversationId,
      customerId: params.customerId,
      channel: params.channel,
      language: params.language,
      history: [],
      previousIntents: [],
      emotionTrend: [],
      turnCount: 0,
      unresolvedTurns: 0,
      isEscalated: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  }

  /** Rehydrate a stored record, re-applying caps and counter bounds */
  static fromSnapshot(snapshot: ContextSnapshot): ConversationContext {
    return new ConversationContext({
      ...snapshot,
      history: keepLast(snapshot.history, HISTORY_LIMIT),
      previousIntents: keepLast(snapshot.previousIntents, INTENT_LIMIT),
      emotionTrend: keepLast(snapshot.emotionTrend, EMOTION_LIMIT),
      turnCount: toCounter(snapshot.turnCount),
      unresolvedTurns: toCounter(snapshot.unresolvedTurns),
    });
  }

  get conversationId(): string {
    return this.state.conversationId;
  }

  get turnCount(): number {
    return this.state.turnCount;
  }

  applyTurn(turn: TurnResult, now: Date = new Date()): void {
    const timestamp = now.toISOString();
    const exchange: HistoryEntry[] = [
      { role: 'customer', text: turn.customerMessage, timestamp },
      { role: 'assistant', text: turn.responseText, timestamp },
    ];

    this.state = {
      ...this.state,
      history: keepLast([...this.state.history, ...exchange], HISTORY_LIMIT),
      previousIntents: keepLast([...this.state.previousIntents, turn.intent], INTENT_LIMIT),
      emotionTrend: keepLast([...this.state.emotionTrend, turn.dominantEmotion], EMOTION_LIMIT),
      turnCount: this.state.turnCount + 1,
      unresolvedTurns: UNRESOLVED_INTENTS.has(turn.intent) ? this.state.unresolvedTurns + 1 : 0,
      language: turn.language,
      isEscalated: turn.escalated,
      updatedAt: timestamp,
    };
  }

  toSnapshot(): ContextSnapshot {
    return this.state;
  }
}
