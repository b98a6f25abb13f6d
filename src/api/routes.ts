import { FastifyInstance, FastifyReply } from 'fastify';
import { AgentSet } from '../agents/agent-set';
import { FeedbackRecord } from '../agents/types';
import { describeErrors } from '../config/validation';
import { EscalationPayload, InteractionRequest } from '../config/types';
import { EscalationQueue } from '../escalation/escalation-queue';
import { logger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { PipelineCoordinator } from '../orchestrator/pipeline-coordinator';
import { RateLimiter } from '../security/rate-limiter';
import { validateEscalateRequest, validateFeedbackRequest, validateInteractRequest } from './schemas';
import { escalationToWire, feedbackToWire, responseToWire } from './serializers';

export const ESCALATION_QUEUE_PREVIEW = 10;

export interface ApiDependencies {
  coordinator: PipelineCoordinator;
  agents: AgentSet;
  escalationQueue: EscalationQueue;
  rateLimiter: RateLimiter;
}

function badRequest(reply: FastifyReply, details: string) {
  return reply.status(400).send({ error: 'Invalid request', details });
}

export function registerApiRoutes(app: FastifyInstance, deps: ApiDependencies): void {
  const log = logger.child({ component: 'api' });

  /** Run one customer message through the pipeline */
  app.post('/api/v1/interact', async (req, reply) => {
    const limit = deps.rateLimiter.check(req.ip);
    if (!limit.allowed) {
      const retryAfterSeconds = Math.max(1, Math.ceil(limit.retryAfterMs / 1000));
      return reply
        .status(429)
        .header('Retry-After', String(retryAfterSeconds))
        .send({ error: 'Rate limit exceeded', retry_after_seconds: retryAfterSeconds });
    }

    const body = req.body;
    if (!validateInteractRequest(body)) {
      return badRequest(reply, describeErrors(validateInteractRequest.errors));
    }

    const request: InteractionRequest = {
      customerId: body.customer_id,
      customerMessage: body.customer_message,
      channel: body.channel ?? 'chat',
      conversationId: body.conversation_id,
      accountId: body.account_id,
      accountData: body.account_data,
      usageLogs: body.usage_logs,
      customerFeedback: body.customer_feedback,
      conversationHistory: body.conversation_history,
    };

    const trace = createTraceContext({ requestId: req.id });
    const response = await deps.coordinator.handle(request, trace);
    reply.header('X-RateLimit-Remaining', String(limit.remaining));
    return reply.send(responseToWire(response));
  });

  /** Manually hand a conversation to the human escalation queue */
  app.post('/api/v1/escalate', async (req, reply) => {
    const body = req.body;
    if (!validateEscalateRequest(body)) {
      return badRequest(reply, describeErrors(validateEscalateRequest.errors));
    }

    const payload: EscalationPayload = {
      interactionId: body.interaction_id,
      conversationId: body.conversation_id,
      customerId: body.customer_id,
      channel: body.channel,
      reason: body.escalation_reason,
      reasons: [body.escalation_reason],
      summary: body.summary ?? '',
      timestamp: new Date().toISOString(),
    };
    const position = await deps.escalationQueue.enqueue(payload);
    log.info({ interactionId: payload.interactionId, position }, 'Manual escalation queued');

    return reply.send({
      status: 'queued',
      interaction_id: payload.interactionId,
      position_in_queue: position,
      timestamp: payload.timestamp,
    });
  });

  app.get('/api/v1/escalation-queue', async (_req, reply) => {
    const [length, items] = await Promise.all([
      deps.escalationQueue.size(),
      deps.escalationQueue.list(ESCALATION_QUEUE_PREVIEW),
    ]);
    return reply.send({ queue_length: length, items: items.map(escalationToWire) });
  });

  /** Post-interaction feedback, analyzed synchronously for the caller */
  app.post('/api/v1/feedback', async (req, reply) => {
    const body = req.body;
    if (!validateFeedbackRequest(body)) {
      return badRequest(reply, describeErrors(validateFeedbackRequest.errors));
    }

    const feedbackHistory: FeedbackRecord[] = (body.feedback_history ?? []).map((record) => ({
      csatScore: record.csat_score,
      sentimentScore: record.sentiment_score,
    }));

    const result = await deps.agents.feedback.invoke({
      interactionId: body.interaction_id,
      customerFeedback: body.feedback,
      interactionLog: {
        customerMessage: '',
        responseText: '',
        intent: 'unknown',
        sentimentScore: null,
        history: [],
        pastInteractions: [],
        feedbackHistory,
      },
    });

    return reply.send({
      status: 'received',
      interaction_id: body.interaction_id,
      analysis: result ? feedbackToWire(result.feedbackAnalysis) : null,
    });
  });
}
