import { Channel } from '../config/types';
import { ajv } from '../config/validation';

export interface InteractRequestBody {
  customer_id: string;
  customer_message: string;
  channel?: Channel;
  conversation_id?: string;
  account_id?: string;
  account_data?: Record<string, unknown>;
  usage_logs?: Array<Record<string, unknown>>;
  customer_feedback?: Record<string, unknown>;
  /** Earlier dominant emotions, oldest first; seeds the emotion trend of a new conversation */
  conversation_history?: string[];
}

export interface EscalateRequestBody {
  interaction_id: string;
  customer_id: string;
  channel: Channel;
  escalation_reason: string;
  conversation_id?: string;
  summary?: string;
}

export interface FeedbackRequestBody {
  interaction_id: string;
  feedback: Record<string, unknown>;
  feedback_history?: Array<{ csat_score?: number; sentiment_score?: number }>;
}

const channel = { enum: ['chat', 'email', 'social'] };
const nonEmptyString = { type: 'string', minLength: 1 };

export const validateInteractRequest = ajv.compile<InteractRequestBody>({
  type: 'object',
  required: ['customer_id', 'customer_message'],
  properties: {
    customer_id: nonEmptyString,
    customer_message: { type: 'string', minLength: 1, maxLength: 10_000 },
    channel,
    conversation_id: nonEmptyString,
    account_id: nonEmptyString,
    account_data: { type: 'object' },
    usage_logs: { type: 'array', items: { type: 'object' }, maxItems: 10_000 },
    customer_feedback: { type: 'object' },
    conversation_history: { type: 'array', items: { type: 'string' } },
  },
});

export const validateEscalateRequest = ajv.compile<EscalateRequestBody>({
  type: 'object',
  required: ['interaction_id', 'customer_id', 'channel', 'escalation_reason'],
  properties: {
    interaction_id: nonEmptyString,
    customer_id: nonEmptyString,
    channel,
    escalation_reason: nonEmptyString,
    conversation_id: nonEmptyString,
    summary: { type: 'string' },
  },
});

export const validateFeedbackRequest = ajv.compile<FeedbackRequestBody>({
  type: 'object',
  required: ['interaction_id', 'feedback'],
  properties: {
    interaction_id: nonEmptyString,
    feedback: { type: 'object' },
    feedback_history: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          csat_score: { type: 'number' },
          sentiment_score: { type: 'number' },
        },
      },
    },
  },
});
