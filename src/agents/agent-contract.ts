import { Logger } from 'pino';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { agentDuration, agentInvocations } from '../observability/metrics';
import { AgentInput, AgentOutcome, AgentOutput, AgentRole, CapabilityProvider } from './types';

export class AgentTimeoutError extends Error {
  constructor(
    public readonly role: AgentRole,
    public readonly timeoutMs: number,
  ) {
    super(`Agent ${role} timed out after ${timeoutMs}ms`);
    this.name = 'AgentTimeoutError';
  }
}

export interface AgentContractOptions {
  timeoutMs: number;
  /** Parent of the contract's child logger */
  logger: Logger;
}

/**
 * Uniform wrapper around a capability provider. invoke() never throws:
 * errors and timeouts are logged, counted and turned into a null outcome.
 */
export class AgentContract<R extends AgentRole> {
  private readonly log: Logger;
  private readonly options: AgentContractOptions;

  constructor(
    private readonly provider: CapabilityProvider<R>,
    options: Partial<AgentContractOptions> = {},
  ) {
    this.options = {
      timeoutMs: options.timeoutMs ?? env.agents.timeoutMs,
      logger: options.logger ?? logger,
    };
    this.log = this.options.logger.child({ agent: provider.role });
  }

  get role(): R {
    return this.provider.role;
  }

  async init(): Promise<void> {
    if (!this.provider.init) return;
    await this.provider.init();
    this.log.info('Agent initialized');
  }

  async shutdown(): Promise<void> {
    if (!this.provider.shutdown) return;
    try {
      await this.provider.shutdown();
      this.log.info('Agent shut down');
    } catch (err) {
      this.log.error({ err }, 'Agent shutdown failed');
    }
  }

  async invoke(input: AgentInput<R>): Promise<AgentOutcome<AgentOutput<R>>> {
    const interactionId = input.interactionId;
    const start = Date.now();
    this.log.info({ interactionId }, 'Agent started');

    try {
      // Defer the call so a synchronous throw in the provider is caught like a rejection
      const output = await this.withTimeout(Promise.resolve().then(() => this.provider.invoke(input)));
      const durationMs = Date.now() - start;
      agentInvocations.inc({ agent: this.role, outcome: 'ok' });
      agentDuration.observe({ agent: this.role }, durationMs / 1000);
      this.log.info({ interactionId, durationMs }, 'Agent completed');
      return output;
    } catch (err) {
      const durationMs = Date.now() - start;
      const timedOut = err instanceof AgentTimeoutError;
      agentInvocations.inc({ agent: this.role, outcome: timedOut ? 'timeout' : 'error' });
      agentDuration.observe({ agent: this.role }, durationMs / 1000);
      this.log.error({ interactionId, durationMs, err }, timedOut ? 'Agent timed out' : 'Agent failed');
      return null;
    }
  }

  private withTimeout<T>(work: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new AgentTimeoutError(this.role, this.options.timeoutMs)),
        this.options.timeoutMs,
      );
    });
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
  }
}
