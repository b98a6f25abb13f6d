import dotenv from 'dotenv';
import path from 'path';
import { Language } from './types';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (!val) return fallback;
  return val.split(',').map((item) => item.trim()).filter(Boolean);
}

function optionalLanguage(key: string, fallback: Language): Language {
  const val = process.env[key];
  return val === 'en' || val === 'ar' ? val : fallback;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8000),
  host: optional('HOST', '0.0.0.0'),
  logLevel: optional('LOG_LEVEL', process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  projectRoot,

  // Empty URL means in-memory stores only
  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'care:'),
  },

  // Only behind a trusted proxy may X-Forwarded-For decide the client address
  trustProxy: optionalBool('TRUST_PROXY', false),

  rateLimit: {
    maxRequests: optionalInt('RATE_LIMIT_MAX_REQUESTS', 100),
    windowSeconds: optionalInt('RATE_LIMIT_WINDOW_SECONDS', 60),
  },

  // ───── Agents ─────
  agents: {
    timeoutMs: optionalInt('AGENT_TIMEOUT_MS', 5000),
    knowledgeTopK: optionalInt('KNOWLEDGE_TOP_K', 5),
    defaultLanguage: optionalLanguage('DEFAULT_LANGUAGE', 'en'),
  },

  deferred: {
    concurrency: optionalInt('DEFERRED_CONCURRENCY', 2),
  },

  // ───── Escalation ─────
  escalation: {
    configPath: optional('ESCALATION_CONFIG_PATH', path.join(projectRoot, 'config', 'escalation-thresholds.yaml')),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
};

export interface EscalationOverrides {
  sentimentThreshold?: number;
  triggerEmotions?: string[];
  consecutiveTurns?: number;
  maxUnresolvedTurns?: number;
}

function presentNumber(key: string, parse: (raw: string) => number): number | undefined {
  const val = process.env[key];
  if (!val) return undefined;
  const parsed = parse(val);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Escalation keys explicitly set in the environment. Read on each call; these take
 * precedence over the thresholds file.
 */
export function escalationOverrides(): EscalationOverrides {
  const emotions = process.env.TRIGGER_EMOTIONS ? optionalList('TRIGGER_EMOTIONS', []) : [];
  return {
    sentimentThreshold: presentNumber('SENTIMENT_ESCALATION_THRESHOLD', parseFloat),
    triggerEmotions: emotions.length > 0 ? emotions : undefined,
    consecutiveTurns: presentNumber('CONSECUTIVE_EMOTION_TURNS', (raw) => parseInt(raw, 10)),
    maxUnresolvedTurns: presentNumber('MAX_UNRESOLVED_TURNS', (raw) => parseInt(raw, 10)),
  };
}
