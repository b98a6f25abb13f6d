import {
  AgentInput,
  AgentOutput,
  AgentRole,
  CapabilityProvider,
  GeneratorOutput,
  SentimentOutput,
} from '../../src/agents/types';
import { ContextSnapshot } from '../../src/context/types';
import { EscalationThresholds } from '../../src/escalation/types';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export const THRESHOLDS: EscalationThresholds = {
  sentimentThreshold: -0.65,
  triggerEmotions: ['anger', 'distress'],
  consecutiveTurns: 2,
  maxUnresolvedTurns: 3,
  escalationIntent: 'escalation_request',
};

export function makeSnapshot(overrides: Partial<ContextSnapshot> = {}): ContextSnapshot {
  return {
    conversationId: 'conv-1',
    customerId: 'cust-1',
    channel: 'chat',
    language: 'en',
    history: [],
    previousIntents: [],
    emotionTrend: [],
    turnCount: 0,
    unresolvedTurns: 0,
    isEscalated: false,
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

export function generatorOutput(overrides: Partial<GeneratorOutput> = {}): GeneratorOutput {
  return {
    responseText: 'Let me look into that.',
    intent: 'billing_inquiry',
    confidence: 0.6,
    escalationFlag: false,
    language: 'en',
    ...overrides,
  };
}

export function sentimentOutput(overrides: Partial<SentimentOutput> = {}): SentimentOutput {
  return {
    sentimentScore: 0,
    dominantEmotion: 'neutral',
    emotionScores: { neutral: 1 },
    escalationFlag: false,
    escalationReason: null,
    toneRecommendation: 'neutral and professional',
    ...overrides,
  };
}

export interface FakeProvider<R extends AgentRole> {
  role: R;
  invoke: jest.Mock<Promise<AgentOutput<R>>, [AgentInput<R>]>;
}

/** Provider whose invoke is a jest mock */
export function fakeProvider<R extends AgentRole>(
  role: R,
  impl: (input: AgentInput<R>) => Promise<AgentOutput<R>>,
): FakeProvider<R> {
  return { role, invoke: jest.fn(impl) };
}

export function failingProvider<R extends AgentRole>(role: R, message = 'provider unavailable'): CapabilityProvider<R> {
  return {
    role,
    invoke: jest.fn(async () => {
      throw new Error(message);
    }),
  };
}
