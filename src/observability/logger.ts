import pino, { Logger } from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.logLevel,
  base: { service: 'care-orchestrator' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Customer text never reaches the log stream verbatim
  redact: {
    paths: ['customerMessage', 'customerFeedback', 'conversationText'],
    censor: '[redacted]',
  },
});

/** Create a child logger bound to one interaction */
export function childLogger(interactionId: string, extra?: Record<string, unknown>): Logger {
  return logger.child({ interactionId, ...extra });
}
