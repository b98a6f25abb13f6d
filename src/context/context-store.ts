import { v4 as uuidv4 } from 'uuid';
import { Channel, Language } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { contextUpdateMisses } from '../observability/metrics';
import { ConversationContext } from './conversation-context';
import { KeyedLock } from './keyed-lock';
import { ContextRepository, ContextSnapshot, TurnResult } from './types';

export interface GetOrCreateParams {
  conversationId?: string;
  customerId: string;
  channel: Channel;
}

export interface ContextStoreOptions {
  defaultLanguage: Language;
  clock: () => Date;
}

/**
 * Loads, creates and updates conversation contexts. All reads and writes for one
 * conversation id pass through a per-key lock, so concurrent turns apply in order.
 */
export class ContextStore {
  private readonly lock = new KeyedLock();
  private readonly log = logger.child({ component: 'context-store' });
  private readonly options: ContextStoreOptions;

  constructor(
    private readonly repository: ContextRepository,
    options: Partial<ContextStoreOptions> = {},
  ) {
    this.options = {
      defaultLanguage: options.defaultLanguage ?? env.agents.defaultLanguage,
      clock: options.clock ?? (() => new Date()),
    };
  }

  async getOrCreate(params: GetOrCreateParams): Promise<ContextSnapshot> {
    const conversationId = params.conversationId || uuidv4();

    return this.lock.run(conversationId, async () => {
      if (params.conversationId) {
        let existing: ContextSnapshot | null;
        try {
          existing = await this.repository.get(conversationId);
        } catch (err) {
          // Serve a fresh context for this turn without overwriting whatever is stored
          this.log.error({ err, conversationId }, 'Context read failed; using transient context');
          return this.fresh(conversationId, params).toSnapshot();
        }
        if (existing) {
          this.log.debug({ conversationId, turnCount: existing.turnCount }, 'Context loaded');
          return existing;
        }
      }

      const snapshot = this.fresh(conversationId, params).toSnapshot();
      try {
        await this.repository.save(snapshot);
        this.log.info({ conversationId, customerId: params.customerId }, 'Context created');
      } catch (err) {
        this.log.error({ err, conversationId }, 'Failed to persist new context');
      }
      return snapshot;
    });
  }

  /**
   * Fold one turn into the stored context. A missing conversation is logged and skipped;
   * storage errors are logged and never reach the caller.
   */
  async update(conversationId: string, turn: TurnResult): Promise<ContextSnapshot | null> {
    return this.lock.run(conversationId, async () => {
      try {
        const stored = await this.repository.get(conversationId);
        if (!stored) {
          contextUpdateMisses.inc();
          this.log.warn({ conversationId }, 'Context update miss: conversation not found');
          return null;
        }

        const context = ConversationContext.fromSnapshot(stored);
        context.applyTurn(turn, this.options.clock());
        const updated = context.toSnapshot();
        await this.repository.save(updated);

        this.log.debug(
          { conversationId, turnCount: updated.turnCount, unresolvedTurns: updated.unresolvedTurns },
          'Context updated',
        );
        return updated;
      } catch (err) {
        this.log.error({ err, conversationId }, 'Context update failed');
        return null;
      }
    });
  }

  private fresh(conversationId: string, params: GetOrCreateParams): ConversationContext {
    return ConversationContext.create(
      {
        conversationId,
        customerId: params.customerId,
        channel: params.channel,
        language: this.options.defaultLanguage,
      },
      this.options.clock(),
    );
  }
}
