import { ContextStore } from '../../src/context/context-store';
import { InMemoryContextRepository, parseSnapshot } from '../../src/context/context-repository';
import { ContextRepository, ContextSnapshot, TurnResult } from '../../src/context/types';
import { FIXED_NOW, makeSnapshot } from '../helpers/fixtures';

const turn = (overrides: Partial<TurnResult> = {}): TurnResult => ({
  customerMessage: 'My invoice is wrong',
  responseText: 'I understand you have a billing question.',
  intent: 'billing_inquiry',
  dominantEmotion: 'neutral',
  language: 'en',
  escalated: false,
  ...overrides,
});

describe('ContextStore', () => {
  let repository: InMemoryContextRepository;
  let store: ContextStore;

  beforeEach(() => {
    repository = new InMemoryContextRepository();
    store = new ContextStore(repository, { defaultLanguage: 'en', clock: () => FIXED_NOW });
  });

  describe('getOrCreate', () => {
    it('creates and persists a fresh context with a generated id', async () => {
      const snapshot = await store.getOrCreate({ customerId: 'cust-1', channel: 'chat' });

      expect(snapshot.conversationId).toMatch(/^[0-9a-f-]{36}$/);
      expect(snapshot.turnCount).toBe(0);
      expect(snapshot.language).toBe('en');
      expect(await repository.get(snapshot.conversationId)).toEqual(snapshot);
    });

    it('creates a context under a caller-supplied id', async () => {
      const snapshot = await store.getOrCreate({ conversationId: 'conv-new', customerId: 'cust-1', channel: 'email' });
      expect(snapshot.conversationId).toBe('conv-new');
      expect(snapshot.channel).toBe('email');
      expect(repository.size).toBe(1);
    });

    it('returns the stored context when the id exists', async () => {
      await repository.save(makeSnapshot({ conversationId: 'conv-1', turnCount: 4 }));
      const snapshot = await store.getOrCreate({ conversationId: 'conv-1', customerId: 'cust-1', channel: 'chat' });
      expect(snapshot.turnCount).toBe(4);
    });

    it('creates only one record under concurrent first turns for the same id', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, () =>
          store.getOrCreate({ conversationId: 'conv-race', customerId: 'cust-1', channel: 'chat' }),
        ),
      );
      expect(new Set(results.map((r) => r.conversationId))).toEqual(new Set(['conv-race']));
      expect(repository.size).toBe(1);
    });

    it('serves a transient context without writing when the repository read fails', async () => {
      const broken: ContextRepository = {
        get: jest.fn().mockRejectedValue(new Error('connection reset')),
        save: jest.fn().mockResolvedValue(undefined),
      };
      const brokenStore = new ContextStore(broken, { clock: () => FIXED_NOW });

      const snapshot = await brokenStore.getOrCreate({ conversationId: 'conv-1', customerId: 'cust-1', channel: 'chat' });

      expect(snapshot.conversationId).toBe('conv-1');
      expect(snapshot.turnCount).toBe(0);
      expect(broken.save).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('applies a turn and persists it', async () => {
      await repository.save(makeSnapshot({ conversationId: 'conv-1' }));
      const updated = await store.update('conv-1', turn());

      expect(updated?.turnCount).toBe(1);
      const stored = await repository.get('conv-1');
      expect(stored?.previousIntents).toEqual(['billing_inquiry']);
      expect(stored?.history.map((h) => h.role)).toEqual(['customer', 'assistant']);
    });

    it('is a no-op for an unknown conversation', async () => {
      await expect(store.update('missing', turn())).resolves.toBeNull();
      expect(repository.size).toBe(0);
    });

    it('swallows repository write failures', async () => {
      const failing: ContextRepository = {
        get: jest.fn().mockResolvedValue(makeSnapshot()),
        save: jest.fn().mockRejectedValue(new Error('disk full')),
      };
      const failingStore = new ContextStore(failing, { clock: () => FIXED_NOW });
      await expect(failingStore.update('conv-1', turn())).resolves.toBeNull();
    });

    it('keeps every turn when updates for one conversation race', async () => {
      await repository.save(makeSnapshot({ conversationId: 'conv-1' }));

      await Promise.all(
        Array.from({ length: 8 }, (_, i) => store.update('conv-1', turn({ customerMessage: `m${i}` }))),
      );

      const stored = await repository.get('conv-1');
      expect(stored?.turnCount).toBe(8);
      expect(stored?.history.filter((h) => h.role === 'customer').map((h) => h.text)).toEqual([
        'm0', 'm1', 'm2', 'm3', 'm4', 'm5', 'm6', 'm7',
      ]);
    });
  });
});

describe('parseSnapshot', () => {
  it('decodes a stored record', () => {
    const snapshot: ContextSnapshot = makeSnapshot({ previousIntents: ['greeting'] });
    expect(parseSnapshot(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  it('rejects records that are not context snapshots', () => {
    expect(() => parseSnapshot(JSON.stringify({ conversationId: 'conv-1' }))).toThrow('Malformed context record');
  });
});
