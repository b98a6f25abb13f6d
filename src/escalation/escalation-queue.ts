import Redis from 'ioredis';
import { EscalationPayload } from '../config/types';
import { ajv, describeErrors } from '../config/validation';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { escalationQueueDepth } from '../observability/metrics';

export interface EscalationQueue {
  /** Append a payload; resolves to its 1-based position in the queue */
  enqueue(payload: EscalationPayload): Promise<number>;
  /** Most recent payloads, newest last */
  list(limit: number): Promise<EscalationPayload[]>;
  size(): Promise<number>;
}

const validatePayload = ajv.compile<EscalationPayload>({
  type: 'object',
  required: ['interactionId', 'customerId', 'channel', 'reason', 'reasons', 'summary', 'timestamp'],
  properties: {
    interactionId: { type: 'string' },
    customerId: { type: 'string' },
    channel: { enum: ['chat', 'email', 'social'] },
    conversationId: { type: 'string' },
    reason: { type: 'string' },
    reasons: { type: 'array', items: { type: 'string' } },
    summary: { type: 'string' },
    contextSnapshot: { type: 'object' },
    timestamp: { type: 'string' },
  },
});

function parsePayload(raw: string): EscalationPayload | null {
  const parsed: unknown = JSON.parse(raw);
  if (!validatePayload(parsed)) {
    logger.warn({ errors: describeErrors(validatePayload.errors) }, 'Skipping malformed escalation record');
    return null;
  }
  return parsed;
}

/**
 * Redis list-backed escalation queue shared by every instance.
 */
export class RedisEscalationQueue implements EscalationQueue {
  private readonly key: string;

  constructor(private readonly redis: Redis) {
    this.key = `${env.redis.keyPrefix}escalations`;
  }

  async enqueue(payload: EscalationPayload): Promise<number> {
    const position = await this.redis.rpush(this.key, JSON.stringify(payload));
    escalationQueueDepth.set(position);
    return position;
  }

  async list(limit: number): Promise<EscalationPayload[]> {
    if (limit <= 0) return [];
    const raw = await this.redis.lrange(this.key, -limit, -1);
    return raw.map(parsePayload).filter((payload): payload is EscalationPayload => payload !== null);
  }

  async size(): Promise<number> {
    return this.redis.llen(this.key);
  }
}

/**
 * In-memory escalation queue (dev/test fallback).
 */
export class InMemoryEscalationQueue implements EscalationQueue {
  private readonly items: EscalationPayload[] = [];

  async enqueue(payload: EscalationPayload): Promise<number> {
    this.items.push(structuredClone(payload));
    escalationQueueDepth.set(this.items.length);
    return this.items.length;
  }

  async list(limit: number): Promise<EscalationPayload[]> {
    if (limit <= 0) return [];
    return this.items.slice(-limit).map((payload) => structuredClone(payload));
  }

  async size(): Promise<number> {
    return this.items.length;
  }
}

export function createEscalationQueue(redis?: Redis): EscalationQueue {
  if (redis) {
    return new RedisEscalationQueue(redis);
  }
  logger.warn('Using in-memory escalation queue (no Redis)');
  return new InMemoryEscalationQueue();
}
