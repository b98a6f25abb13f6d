import { FeedbackOutput, KnowledgeOutput } from '../../src/agents/types';
import { evaluateEscalation } from '../../src/escalation/escalation-evaluator';
import { aggregateResponse, AgentOutcomes, DEFAULT_TONE } from '../../src/orchestrator/aggregator';
import { FIXED_NOW, generatorOutput, makeSnapshot, sentimentOutput, THRESHOLDS } from '../helpers/fixtures';

const knowledge: KnowledgeOutput = {
  suggestedArticles: [
    { articleId: 'faq-billing-002', title: 'Why was I charged twice', contentSnippet: 'A duplicate charge', confidenceScore: 0.875 },
  ],
  updatedKnowledge: false,
};

function aggregate(outcomes: AgentOutcomes, context = makeSnapshot()) {
  return aggregateResponse({
    interactionId: 'int-1',
    timestamp: FIXED_NOW.toISOString(),
    context,
    outcomes,
    escalation: evaluateEscalation(
      { generator: outcomes.generator, sentiment: outcomes.sentiment, anomaly: outcomes.anomaly, context },
      THRESHOLDS,
    ),
    defaultLanguage: 'en',
  });
}

describe('aggregateResponse', () => {
  it('merges every present outcome', () => {
    const response = aggregate({
      generator: generatorOutput({ responseText: 'Checking your bill.', language: 'ar' }),
      knowledge,
      sentiment: sentimentOutput({ sentimentScore: 0.4, dominantEmotion: 'joy', toneRecommendation: 'friendly and positive' }),
      anomaly: { proactiveAlerts: [] },
    });

    expect(response.responseText).toBe('Checking your bill.');
    expect(response.intent).toBe('billing_inquiry');
    expect(response.language).toBe('ar');
    expect(response.sentimentScore).toBe(0.4);
    expect(response.dominantEmotion).toBe('joy');
    expect(response.toneRecommendation).toBe('friendly and positive');
    expect(response.suggestedArticles.map((a) => a.articleId)).toEqual(['faq-billing-002']);
    expect(response.agentLogs.anomaly).toEqual({ proactiveAlerts: [] });
    expect(response.agentLogs.feedback).toEqual({ status: 'pending_async' });
  });

  it('falls back to defaults when every agent is absent', () => {
    const response = aggregate(
      { generator: null, knowledge: null, sentiment: null, anomaly: null },
      makeSnapshot({ unresolvedTurns: 3 }),
    );

    expect(response).toMatchObject({
      interactionId: 'int-1',
      conversationId: 'conv-1',
      customerId: 'cust-1',
      channel: 'chat',
      language: 'en',
      responseText: '',
      intent: 'unknown',
      sentimentScore: 0,
      dominantEmotion: 'neutral',
      toneRecommendation: DEFAULT_TONE,
      suggestedArticles: [],
      proactiveAlerts: [],
      feedbackAnalysis: { csatScore: null, sentimentTrend: null, topIssues: [], knowledgeGapFlags: [] },
    });
    expect(response.escalation.escalate).toBe(true);
    expect(response.escalation.triggers).toEqual(['unresolved_turns']);
    expect(response.agentLogs).toEqual({
      generator: { status: 'skipped' },
      knowledge: { status: 'skipped' },
      sentiment: { status: 'skipped' },
      anomaly: { status: 'skipped' },
      feedback: { status: 'pending_async' },
    });
  });

  it('records a failed feedback analysis as skipped and a finished one as its output', () => {
    const feedback: FeedbackOutput = {
      feedbackAnalysis: { csatScore: 4, sentimentTrend: null, topIssues: ['billing_inquiry'], knowledgeGapFlags: [] },
      knowledgeBaseUpdates: [],
    };
    const base = { generator: null, knowledge: null, sentiment: null, anomaly: null };

    expect(aggregate({ ...base, feedback: null }).agentLogs.feedback).toEqual({ status: 'skipped' });
    const done = aggregate({ ...base, feedback });
    expect(done.agentLogs.feedback).toEqual(feedback);
    expect(done.feedbackAnalysis.csatScore).toBe(4);
  });

  it('returns a deeply frozen response', () => {
    const response = aggregate({ generator: generatorOutput(), knowledge, sentiment: null, anomaly: null });

    expect(Object.isFrozen(response)).toBe(true);
    expect(Object.isFrozen(response.suggestedArticles)).toBe(true);
    expect(Object.isFrozen(response.suggestedArticles[0])).toBe(true);
    expect(Object.isFrozen(response.escalation.reasons)).toBe(true);
  });

  it('does not freeze the agent outputs it was given', () => {
    const generator = generatorOutput();
    aggregate({ generator, knowledge, sentiment: null, anomaly: null });
    expect(Object.isFrozen(generator)).toBe(false);
    expect(Object.isFrozen(knowledge.suggestedArticles)).toBe(false);
  });
});
