import { EscalationPayload } from '../../src/config/types';
import { createEscalationQueue, InMemoryEscalationQueue } from '../../src/escalation/escalation-queue';
import { FIXED_NOW } from '../helpers/fixtures';

const payload = (interactionId: string): EscalationPayload => ({
  interactionId,
  conversationId: 'conv-1',
  customerId: 'cust-1',
  channel: 'chat',
  reason: 'Customer explicitly requested a human agent.',
  reasons: ['Customer explicitly requested a human agent.'],
  summary: 'Turn 1 on chat; intent escalation_request',
  timestamp: FIXED_NOW.toISOString(),
});

describe('InMemoryEscalationQueue', () => {
  it('returns the 1-based position of each enqueued payload', async () => {
    const queue = new InMemoryEscalationQueue();

    await expect(queue.enqueue(payload('int-1'))).resolves.toBe(1);
    await expect(queue.enqueue(payload('int-2'))).resolves.toBe(2);
    await expect(queue.size()).resolves.toBe(2);
  });

  it('lists the most recent payloads, newest last', async () => {
    const queue = new InMemoryEscalationQueue();
    for (const id of ['int-1', 'int-2', 'int-3']) {
      await queue.enqueue(payload(id));
    }

    const recent = await queue.list(2);
    expect(recent.map((item) => item.interactionId)).toEqual(['int-2', 'int-3']);
    await expect(queue.list(0)).resolves.toEqual([]);
  });

  it('stores copies, not the caller objects', async () => {
    const queue = new InMemoryEscalationQueue();
    const item = payload('int-1');
    await queue.enqueue(item);
    item.reasons.push('changed later');

    const [stored] = await queue.list(1);
    expect(stored.reasons).toEqual(['Customer explicitly requested a human agent.']);
  });

  it('falls back to memory without Redis', () => {
    expect(createEscalationQueue()).toBeInstanceOf(InMemoryEscalationQueue);
  });
});
