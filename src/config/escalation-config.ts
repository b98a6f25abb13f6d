import { env, escalationOverrides, EscalationOverrides } from './env';
import { ajv } from './validation';
import { loadYamlResource, ResourceFileError } from './yaml-loader';
import { logger } from '../observability/logger';
import { EscalationConfig } from '../escalation/types';

interface EscalationFile {
  escalation?: {
    sentiment_threshold?: number;
    trigger_emotions?: string[];
    consecutive_turns?: number;
    max_unresolved_turns?: number;
    escalation_intent?: string;
  };
  sentiment_agent?: {
    sentiment_threshold?: number;
    trigger_emotions?: string[];
    consecutive_turns?: number;
  };
}

const threshold = { type: 'number', minimum: -1, maximum: 1 };
const emotions = { type: 'array', items: { type: 'string' } };
const turns = { type: 'integer', minimum: 1 };

const validateEscalationFile = ajv.compile<EscalationFile>({
  type: 'object',
  additionalProperties: false,
  properties: {
    escalation: {
      type: 'object',
      additionalProperties: false,
      properties: {
        sentiment_threshold: threshold,
        trigger_emotions: emotions,
        consecutive_turns: turns,
        max_unresolved_turns: turns,
        escalation_intent: { type: 'string' },
      },
    },
    sentiment_agent: {
      type: 'object',
      additionalProperties: false,
      properties: {
        sentiment_threshold: threshold,
        trigger_emotions: emotions,
        consecutive_turns: turns,
      },
    },
  },
});

const BUILTIN_THRESHOLD = -0.65;
const BUILTIN_TRIGGER_EMOTIONS = ['anger', 'distress'];
const BUILTIN_CONSECUTIVE_TURNS = 2;
const BUILTIN_MAX_UNRESOLVED_TURNS = 3;
const BUILTIN_ESCALATION_INTENT = 'escalation_request';

/**
 * Resolve every key as environment, then thresholds file, then built-in default.
 * The env keys apply to both the coordinator and the sentiment agent.
 */
function resolveConfig(file: EscalationFile, overrides: EscalationOverrides): EscalationConfig {
  const escalation = file.escalation ?? {};
  const agent = file.sentiment_agent ?? {};

  return {
    thresholds: {
      sentimentThreshold: overrides.sentimentThreshold ?? escalation.sentiment_threshold ?? BUILTIN_THRESHOLD,
      triggerEmotions: overrides.triggerEmotions ?? escalation.trigger_emotions ?? BUILTIN_TRIGGER_EMOTIONS,
      consecutiveTurns: overrides.consecutiveTurns ?? escalation.consecutive_turns ?? BUILTIN_CONSECUTIVE_TURNS,
      maxUnresolvedTurns:
        overrides.maxUnresolvedTurns ?? escalation.max_unresolved_turns ?? BUILTIN_MAX_UNRESOLVED_TURNS,
      escalationIntent: escalation.escalation_intent ?? BUILTIN_ESCALATION_INTENT,
    },
    sentimentAgent: {
      sentimentThreshold: overrides.sentimentThreshold ?? agent.sentiment_threshold ?? BUILTIN_THRESHOLD,
      triggerEmotions: overrides.triggerEmotions ?? agent.trigger_emotions ?? BUILTIN_TRIGGER_EMOTIONS,
      consecutiveTurns: overrides.consecutiveTurns ?? agent.consecutive_turns ?? BUILTIN_CONSECUTIVE_TURNS,
    },
  };
}

/** Escalation settings without a thresholds file: environment over built-in defaults */
export function defaultEscalationConfig(overrides: EscalationOverrides = escalationOverrides()): EscalationConfig {
  return resolveConfig({}, overrides);
}

/**
 * Load the thresholds YAML. Keys set in the environment win over the file; a missing or
 * invalid file falls back to environment and built-in defaults.
 */
export function loadEscalationConfig(
  filePath: string = env.escalation.configPath,
  overrides: EscalationOverrides = escalationOverrides(),
): EscalationConfig {
  let file: EscalationFile | null;
  try {
    file = loadYamlResource(filePath, validateEscalationFile);
  } catch (err) {
    if (!(err instanceof ResourceFileError)) throw err;
    logger.error({ err, filePath }, 'Invalid escalation config; using defaults');
    return defaultEscalationConfig(overrides);
  }
  return resolveConfig(file ?? {}, overrides);
}
