import { logger } from '../observability/logger';
import { AgentContract, AgentContractOptions } from './agent-contract';
import { AgentProviders, AgentRole } from './types';

export type AgentSet = { [R in AgentRole]: AgentContract<R> };

export function createAgentSet(providers: AgentProviders, options: Partial<AgentContractOptions> = {}): AgentSet {
  return {
    generator: new AgentContract(providers.generator, options),
    knowledge: new AgentContract(providers.knowledge, options),
    sentiment: new AgentContract(providers.sentiment, options),
    anomaly: new AgentContract(providers.anomaly, options),
    feedback: new AgentContract(providers.feedback, options),
  };
}

function contractsOf(agents: AgentSet) {
  return [agents.generator, agents.knowledge, agents.sentiment, agents.anomaly, agents.feedback];
}

/** Prepare every provider before traffic is admitted. A provider that cannot start aborts startup. */
export async function initAgents(agents: AgentSet): Promise<void> {
  for (const contract of contractsOf(agents)) {
    await contract.init();
  }
  logger.info('All agents initialized');
}

export async function shutdownAgents(agents: AgentSet): Promise<void> {
  await Promise.all(contractsOf(agents).map((contract) => contract.shutdown()));
  logger.info('All agents shut down');
}
