import Redis from 'ioredis';
import { ContextRepository, ContextSnapshot } from './types';
import { ajv, describeErrors } from '../config/validation';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const stringArray = { type: 'array', items: { type: 'string' } };

const validateSnapshot = ajv.compile<ContextSnapshot>({
  type: 'object',
  required: [
    'conversationId', 'customerId', 'channel', 'language', 'history', 'previousIntents',
    'emotionTrend', 'turnCount', 'unresolvedTurns', 'isEscalated', 'createdAt', 'updatedAt',
  ],
  properties: {
    conversationId: { type: 'string' },
    customerId: { type: 'string' },
    channel: { enum: ['chat', 'email', 'social'] },
    language: { enum: ['en', 'ar'] },
    history: {
      type: 'array',
      items: {
        type: 'object',
        required: ['role', 'text', 'timestamp'],
        properties: {
          role: { enum: ['customer', 'assistant'] },
          text: { type: 'string' },
          timestamp: { type: 'string' },
        },
      },
    },
    previousIntents: stringArray,
    emotionTrend: stringArray,
    turnCount: { type: 'number' },
    unresolvedTurns: { type: 'number' },
    isEscalated: { type: 'boolean' },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' },
  },
});

/** Decode a stored record, rejecting anything that is not a context snapshot */
export function parseSnapshot(raw: string): ContextSnapshot {
  const parsed: unknown = JSON.parse(raw);
  if (!validateSnapshot(parsed)) {
    throw new Error(`Malformed context record: ${describeErrors(validateSnapshot.errors)}`);
  }
  return parsed;
}

/**
 * Redis-backed context repository. Records carry no TTL; retention is handled outside this service.
 */
export class RedisContextRepository implements ContextRepository {
  private readonly prefix: string;

  constructor(private readonly redis: Redis) {
    this.prefix = `${env.redis.keyPrefix}ctx:`;
  }

  private key(conversationId: string): string {
    return `${this.prefix}${conversationId}`;
  }

  async get(conversationId: string): Promise<ContextSnapshot | null> {
    const raw = await this.redis.get(this.key(conversationId));
    if (!raw) return null;
    return parseSnapshot(raw);
  }

  async save(snapshot: ContextSnapshot): Promise<void> {
    await this.redis.set(this.key(snapshot.conversationId), JSON.stringify(snapshot));
  }
}

/**
 * In-memory context repository (dev/test fallback). Stores copies so callers never share state with it.
 */
export class InMemoryContextRepository implements ContextRepository {
  private readonly records = new Map<string, ContextSnapshot>();

  async get(conversationId: string): Promise<ContextSnapshot | null> {
    const record = this.records.get(conversationId);
    return record ? structuredClone(record) : null;
  }

  async save(snapshot: ContextSnapshot): Promise<void> {
    this.records.set(snapshot.conversationId, structuredClone(snapshot));
  }

  get size(): number {
    return this.records.size;
  }
}

export function createContextRepository(redis?: Redis): ContextRepository {
  if (redis) {
    return new RedisContextRepository(redis);
  }
  logger.warn('Using in-memory context repository (no Redis)');
  return new InMemoryContextRepository();
}
