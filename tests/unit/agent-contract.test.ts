import pino from 'pino';
import { AgentContract } from '../../src/agents/agent-contract';
import { createAgentSet, initAgents, shutdownAgents } from '../../src/agents/agent-set';
import { AgentProviders, CapabilityProvider, GeneratorOutput } from '../../src/agents/types';
import { agentInvocations } from '../../src/observability/metrics';
import { failingProvider, fakeProvider, generatorOutput, makeSnapshot } from '../helpers/fixtures';

const input = {
  interactionId: 'int-1',
  customerMessage: 'hello',
  channel: 'chat' as const,
  context: makeSnapshot(),
};

async function invocationCount(agent: string, outcome: string): Promise<number> {
  const metric = await agentInvocations.get();
  return metric.values.find((v) => v.labels.agent === agent && v.labels.outcome === outcome)?.value ?? 0;
}

describe('AgentContract', () => {
  it('returns the provider output on success', async () => {
    const contract = new AgentContract(fakeProvider('generator', async () => generatorOutput()));
    await expect(contract.invoke(input)).resolves.toEqual(generatorOutput());
  });

  it('logs the start and the completion of a call at info level', async () => {
    const lines: string[] = [];
    const parent = pino({ level: 'info' }, { write: (line: string) => void lines.push(line) });
    const contract = new AgentContract(fakeProvider('generator', async () => generatorOutput()), { logger: parent });

    await contract.invoke(input);

    const entries = lines.map((line) => JSON.parse(line));
    expect(entries.map((entry) => [entry.level, entry.msg, entry.agent, entry.interactionId])).toEqual([
      [30, 'Agent started', 'generator', 'int-1'],
      [30, 'Agent completed', 'generator', 'int-1'],
    ]);
  });

  it('turns a rejected call into an absent outcome', async () => {
    const contract = new AgentContract(failingProvider('generator'));
    await expect(contract.invoke(input)).resolves.toBeNull();
  });

  it('turns a synchronous throw into an absent outcome', async () => {
    const provider: CapabilityProvider<'generator'> = {
      role: 'generator',
      invoke: () => {
        throw new Error('malformed input');
      },
    };
    await expect(new AgentContract(provider).invoke(input)).resolves.toBeNull();
  });

  it('times out a slow provider', async () => {
    jest.useFakeTimers();
    try {
      const contract = new AgentContract(
        fakeProvider('generator', () => new Promise<GeneratorOutput>(() => undefined)),
        { timeoutMs: 1000 },
      );
      const pending = contract.invoke(input);
      await jest.advanceTimersByTimeAsync(1000);
      await expect(pending).resolves.toBeNull();
    } finally {
      jest.useRealTimers();
    }
  });

  it('counts failures per role', async () => {
    const before = await invocationCount('sentiment', 'error');
    await new AgentContract(failingProvider('sentiment', 'model offline')).invoke({
      interactionId: 'int-2',
      conversationText: 'hello',
      emotionHistory: [],
    });
    expect(await invocationCount('sentiment', 'error')).toBe(before + 1);
  });

  it('exposes the provider role', () => {
    expect(new AgentContract(failingProvider('anomaly')).role).toBe('anomaly');
  });
});

describe('AgentSet lifecycle', () => {
  function providers(): AgentProviders {
    return {
      generator: fakeProvider('generator', async () => generatorOutput()),
      knowledge: failingProvider('knowledge'),
      sentiment: failingProvider('sentiment'),
      anomaly: failingProvider('anomaly'),
      feedback: failingProvider('feedback'),
    };
  }

  it('initializes and shuts down every provider that has hooks', async () => {
    const init = jest.fn().mockResolvedValue(undefined);
    const shutdown = jest.fn().mockRejectedValue(new Error('already closed'));
    const set = createAgentSet({ ...providers(), knowledge: { ...failingProvider('knowledge'), init, shutdown } });

    await initAgents(set);
    await expect(shutdownAgents(set)).resolves.toBeUndefined();

    expect(init).toHaveBeenCalledTimes(1);
    expect(shutdown).toHaveBeenCalledTimes(1);
  });

  it('propagates an init failure to the host', async () => {
    const init = jest.fn().mockRejectedValue(new Error('catalog missing'));
    const set = createAgentSet({ ...providers(), generator: { ...failingProvider('generator'), init } });

    await expect(initAgents(set)).rejects.toThrow('catalog missing');
  });
});
