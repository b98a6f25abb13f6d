import { v4 as uuidv4 } from 'uuid';
import { Logger } from 'pino';
import { AgentSet } from '../agents/agent-set';
import { AgentOutcome, AnomalyOutput, FeedbackInput, PastInteraction } from '../agents/types';
import { env } from '../config/env';
import { EscalationDecision, EscalationPayload, InteractionRequest, Language } from '../config/types';
import { ContextStore } from '../context/context-store';
import { ConversationContext } from '../context/conversation-context';
import { ContextSnapshot } from '../context/types';
import { evaluateEscalation, NEUTRAL_EMOTION } from '../escalation/escalation-evaluator';
import { EscalationQueue } from '../escalation/escalation-queue';
import { EscalationThresholds } from '../escalation/types';
import { childLogger } from '../observability/logger';
import { escalations, interactionsProcessed, pipelineDuration } from '../observability/metrics';
import { createTraceContext, TraceContext } from '../observability/trace';
import { aggregateResponse, AgentOutcomes } from './aggregator';
import { DeferredWorkQueue } from './deferred-work';
import { PipelineStateMachine } from './state-machine';
import { UnifiedResponse } from './types';

const SUMMARY_MESSAGE_LENGTH = 200;

export interface PipelineDependencies {
  agents: AgentSet;
  contextStore: ContextStore;
  escalationQueue: EscalationQueue;
  deferredWork: DeferredWorkQueue;
  thresholds: EscalationThresholds;
}

export interface PipelineOptions {
  knowledgeTopK: number;
  defaultLanguage: Language;
  clock: () => Date;
}

/**
 * Runs one customer message through the analysis agents in a fixed order and returns
 * a unified response. Agent failures become absent outcomes; the pipeline always completes.
 */
export class PipelineCoordinator {
  private readonly options: PipelineOptions;

  constructor(
    private readonly deps: PipelineDependencies,
    options: Partial<PipelineOptions> = {},
  ) {
    this.options = {
      knowledgeTopK: options.knowledgeTopK ?? env.agents.knowledgeTopK,
      defaultLanguage: options.defaultLanguage ?? env.agents.defaultLanguage,
      clock: options.clock ?? (() => new Date()),
    };
  }

  async handle(request: InteractionRequest, trace: TraceContext = createTraceContext()): Promise<UnifiedResponse> {
    const interactionId = uuidv4();
    trace.interactionId = interactionId;
    trace.customerId = request.customerId;
    trace.channel = request.channel;

    const log = childLogger(interactionId, {
      requestId: trace.requestId,
      customerId: request.customerId,
      channel: request.channel,
    });
    const machine = new PipelineStateMachine(trace, log);
    const endTimer = pipelineDuration.startTimer({ channel: request.channel });
    const loaded: { context?: ContextSnapshot } = {};
    log.info({ hasAccount: Boolean(request.accountId) }, 'Pipeline started');

    try {
      const response = await this.runPipeline(request, interactionId, trace, machine, log, loaded);
      interactionsProcessed.inc({ channel: request.channel, outcome: response.escalation.escalate ? 'escalated' : 'answered' });
      log.info(
        { conversationId: response.conversationId, intent: response.intent, escalate: response.escalation.escalate },
        'Pipeline completed',
      );
      return response;
    } catch (err) {
      interactionsProcessed.inc({ channel: request.channel, outcome: 'degraded' });
      log.error({ err, stage: machine.stage }, 'Pipeline error; returning degraded response');
      return this.degradedResponse(request, interactionId, loaded.context);
    } finally {
      endTimer();
    }
  }

  private async runPipeline(
    request: InteractionRequest,
    interactionId: string,
    trace: TraceContext,
    machine: PipelineStateMachine,
    log: Logger,
    loaded: { context?: ContextSnapshot },
  ): Promise<UnifiedResponse> {
    const { agents, contextStore } = this.deps;

    // ───── Context ─────
    const context = await machine.run('ContextLoaded', () =>
      contextStore.getOrCreate({
        conversationId: request.conversationId,
        customerId: request.customerId,
        channel: request.channel,
      }),
    );
    trace.conversationId = context.conversationId;
    loaded.context = context;

    // ───── Synchronous analysis, strictly in order ─────
    const generator = await machine.run('Generated', () =>
      agents.generator.invoke({
        interactionId,
        customerMessage: request.customerMessage,
        channel: request.channel,
        context,
      }),
    );

    const language = generator?.language ?? context.language;
    const queryText = generator ? `${generator.intent} ${request.customerMessage}` : request.customerMessage;
    const knowledge = await machine.run('Searched', () =>
      agents.knowledge.invoke({ interactionId, queryText, topK: this.options.knowledgeTopK, language }),
    );

    const sentiment = await machine.run('Scored', () =>
      agents.sentiment.invoke({
        interactionId,
        conversationText: request.customerMessage,
        emotionHistory: emotionHistoryFor(context, request),
      }),
    );

    let anomaly: AgentOutcome<AnomalyOutput> = null;
    const accountId = request.accountId;
    if (accountId) {
      anomaly = await machine.run('Scanned', () =>
        agents.anomaly.invoke({
          interactionId,
          accountId,
          accountData: request.accountData ?? {},
          usageLogs: request.usageLogs ?? [],
        }),
      );
    } else {
      machine.skip('Scanned', 'no account id on request');
    }

    // ───── Decision and response ─────
    const decision = await machine.run('Escalated', async () =>
      evaluateEscalation({ generator, sentiment, anomaly, context }, this.deps.thresholds),
    );

    const outcomes: AgentOutcomes = { generator, knowledge, sentiment, anomaly };
    const response = await machine.run('Aggregated', async () =>
      aggregateResponse({
        interactionId,
        timestamp: this.options.clock().toISOString(),
        context,
        outcomes,
        escalation: decision,
        defaultLanguage: this.options.defaultLanguage,
      }),
    );

    await machine.run('Persisted', () =>
      contextStore.update(context.conversationId, {
        customerMessage: request.customerMessage,
        responseText: response.responseText,
        intent: response.intent,
        dominantEmotion: response.dominantEmotion,
        language: response.language,
        escalated: decision.escalate,
      }),
    );

    if (decision.escalate) {
      this.handOff(request, response, decision, context, log);
    }

    await machine.run('Deferred', async () => {
      this.scheduleFeedback(request, response, sentiment ? sentiment.sentimentScore : null, context, log);
    });
    machine.transition('Completed');

    return response;
  }

  /** Fire-and-forget hand-off to the human escalation queue */
  private handOff(
    request: InteractionRequest,
    response: UnifiedResponse,
    decision: EscalationDecision,
    context: ContextSnapshot,
    log: Logger,
  ): void {
    for (const trigger of decision.triggers) {
      escalations.inc({ trigger, channel: request.channel });
    }

    const payload: EscalationPayload = {
      interactionId: response.interactionId,
      conversationId: context.conversationId,
      customerId: request.customerId,
      channel: request.channel,
      reason: decision.reason ?? '',
      reasons: [...decision.reasons],
      summary: buildSummary(request.customerMessage, response, context.turnCount + 1),
      contextSnapshot: context,
      timestamp: response.timestamp,
    };

    this.deps.escalationQueue
      .enqueue(payload)
      .then((position) => log.info({ position, reasons: decision.reasons.length }, 'Escalation queued'))
      .catch((err) => log.warn({ err }, 'Escalation hand-off failed (non-blocking)'));
  }

  private scheduleFeedback(
    request: InteractionRequest,
    response: UnifiedResponse,
    sentimentScore: number | null,
    context: ContextSnapshot,
    log: Logger,
  ): void {
    const input: FeedbackInput = {
      interactionId: response.interactionId,
      customerFeedback: request.customerFeedback ?? null,
      interactionLog: {
        customerMessage: request.customerMessage,
        responseText: response.responseText,
        intent: response.intent,
        sentimentScore,
        history: [...context.history],
        pastInteractions: [...pastInteractions(context), { intent: response.intent, customerMessage: request.customerMessage }],
        feedbackHistory: [],
      },
    };

    this.deps.deferredWork.schedule('feedback-analysis', async () => {
      const result = await this.deps.agents.feedback.invoke(input);
      if (result) {
        log.info(
          {
            csatScore: result.feedbackAnalysis.csatScore,
            topIssues: result.feedbackAnalysis.topIssues,
            knowledgeGaps: result.feedbackAnalysis.knowledgeGapFlags.length,
          },
          'Feedback analysis recorded',
        );
      }
    });
  }

  /** Response built from the loaded context alone, or a fresh one when loading never finished */
  private degradedResponse(
    request: InteractionRequest,
    interactionId: string,
    loadedContext: ContextSnapshot | undefined,
  ): UnifiedResponse {
    const now = this.options.clock();
    const context =
      loadedContext ??
      ConversationContext.create(
        {
          conversationId: request.conversationId ?? uuidv4(),
          customerId: request.customerId,
          channel: request.channel,
          language: this.options.defaultLanguage,
        },
        now,
      ).toSnapshot();

    return aggregateResponse({
      interactionId,
      timestamp: now.toISOString(),
      context,
      outcomes: { generator: null, knowledge: null, sentiment: null, anomaly: null, feedback: null },
      escalation: evaluateEscalation(
        { generator: null, sentiment: null, anomaly: null, context },
        this.deps.thresholds,
      ),
      defaultLanguage: this.options.defaultLanguage,
    });
  }
}

/** Stored emotion trend; a new conversation falls back to the caller-supplied history */
function emotionHistoryFor(context: ContextSnapshot, request: InteractionRequest): string[] {
  if (context.emotionTrend.length > 0) return [...context.emotionTrend];
  return [...(request.conversationHistory ?? [])];
}

/** Pairs stored intents with the customer messages of the same turns, newest last */
function pastInteractions(context: ContextSnapshot): PastInteraction[] {
  const messages = context.history.filter((entry) => entry.role === 'customer').map((entry) => entry.text);
  const offset = messages.length - context.previousIntents.length;
  return context.previousIntents.map((intent, i) => ({ intent, customerMessage: messages[i + offset] }));
}

function buildSummary(message: string, response: UnifiedResponse, turn: number): string {
  const preview = message.length > SUMMARY_MESSAGE_LENGTH ? `${message.slice(0, SUMMARY_MESSAGE_LENGTH)}…` : message;
  return [
    `Turn ${turn} on ${response.channel}`,
    `intent ${response.intent}`,
    `sentiment ${response.sentimentScore.toFixed(2)} (${response.dominantEmotion || NEUTRAL_EMOTION})`,
    `last message: "${preview}"`,
  ].join('; ');
}
