/** Thresholds for the coordinator-level escalation decision */
export interface EscalationThresholds {
  sentimentThreshold: number;
  triggerEmotions: readonly string[];
  consecutiveTurns: number;
  maxUnresolvedTurns: number;
  escalationIntent: string;
}

/** The sentiment agent's own escalation policy, tuned independently of the coordinator's */
export interface SentimentAgentPolicy {
  sentimentThreshold: number;
  triggerEmotions: readonly string[];
  consecutiveTurns: number;
}

export interface EscalationConfig {
  thresholds: EscalationThresholds;
  sentimentAgent: SentimentAgentPolicy;
}
