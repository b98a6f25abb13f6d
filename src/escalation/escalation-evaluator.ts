import { EscalationDecision, EscalationTrigger } from '../config/types';
import { AnomalyOutput, AgentOutcome, GeneratorOutput, SentimentOutput } from '../agents/types';
import { ContextSnapshot } from '../context/types';
import { EscalationThresholds } from './types';

export const REASON_SEPARATOR = ' | ';

/** Emotion recorded for the current turn when no sentiment result is available */
export const NEUTRAL_EMOTION = 'neutral';

export interface EscalationSignals {
  generator: AgentOutcome<GeneratorOutput>;
  sentiment: AgentOutcome<SentimentOutput>;
  anomaly: AgentOutcome<AnomalyOutput>;
  context: Pick<ContextSnapshot, 'emotionTrend' | 'unresolvedTurns'>;
}

/** Length of the run of trigger emotions at the end of the sequence */
export function countTrailingTriggers(emotions: readonly string[], triggers: ReadonlySet<string>): number {
  let count = 0;
  for (let i = emotions.length - 1; i >= 0; i--) {
    if (!triggers.has(emotions[i])) break;
    count++;
  }
  return count;
}

/**
 * Decide whether a turn goes to a human. Pure: the same signals always give the same
 * decision, and every check that fires contributes a reason, in a fixed order.
 */
export function evaluateEscalation(signals: EscalationSignals, thresholds: EscalationThresholds): EscalationDecision {
  const { generator, sentiment, anomaly, context } = signals;
  const reasons: string[] = [];
  const triggers: EscalationTrigger[] = [];
  const fire = (trigger: EscalationTrigger, reason: string): void => {
    triggers.push(trigger);
    reasons.push(reason);
  };

  if (generator?.escalationFlag) {
    fire('explicit_request', 'Customer explicitly requested a human agent.');
  }

  if (generator && generator.intent === thresholds.escalationIntent) {
    fire('escalation_intent', `Intent classified as ${thresholds.escalationIntent}.`);
  }

  if (sentiment && sentiment.sentimentScore < thresholds.sentimentThreshold) {
    fire(
      'negative_sentiment',
      `Sentiment score (${sentiment.sentimentScore.toFixed(2)}) below threshold (${thresholds.sentimentThreshold}).`,
    );
  }

  const current = sentiment?.dominantEmotion ?? NEUTRAL_EMOTION;
  const streak = countTrailingTriggers([...context.emotionTrend, current], new Set(thresholds.triggerEmotions));
  if (streak >= thresholds.consecutiveTurns) {
    fire('persistent_emotion', `Dominant emotion (${current}) persisted for ${streak} consecutive turns.`);
  }

  if (sentiment?.escalationFlag) {
    fire('sentiment_agent_flag', `Sentiment analysis flagged escalation: ${sentiment.escalationReason ?? 'no reason given'}.`);
  }

  const critical = anomaly?.proactiveAlerts.find((alert) => alert.severity === 'critical');
  if (critical) {
    fire('critical_alert', `Critical proactive alert detected: ${critical.alertType}.`);
  }

  if (context.unresolvedTurns >= thresholds.maxUnresolvedTurns) {
    fire(
      'unresolved_turns',
      `Unresolved for ${context.unresolvedTurns} consecutive turns (limit ${thresholds.maxUnresolvedTurns}).`,
    );
  }

  return {
    escalate: reasons.length > 0,
    reasons,
    triggers,
    reason: reasons.length > 0 ? reasons.join(REASON_SEPARATOR) : null,
  };
}
