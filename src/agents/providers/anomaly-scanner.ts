import { ProactiveAlert, Severity, UsageLogEntry } from '../../config/types';
import { AnomalyInput, AnomalyOutput, CapabilityProvider } from '../types';
import { round4 } from './text-utils';

export const MIN_ROWS = 3;
export const Z_THRESHOLD = 2.0;
const EPSILON = 1e-9;

// Lower |z| bounds, checked top-down
const SEVERITY_BANDS: ReadonlyArray<{ minZ: number; severity: Severity }> = [
  { minZ: 3.5, severity: 'critical' },
  { minZ: 3.0, severity: 'high' },
  { minZ: 2.5, severity: 'medium' },
];

const ALERT_PATTERNS: Record<string, { alertType: string; action: string }> = {
  error_count: {
    alertType: 'high_error_rate',
    action: "Investigate recent errors in the customer's account. Consider proactive outreach.",
  },
  login_failures: {
    alertType: 'suspicious_login_activity',
    action: 'Review login attempts for potential unauthorized access. Consider account security measures.',
  },
  latency_ms: {
    alertType: 'performance_degradation',
    action: 'Customer may be experiencing slow service. Check backend performance metrics.',
  },
  api_calls: {
    alertType: 'unusual_usage_pattern',
    action: 'Usage deviates from the normal pattern. Review for potential issues or plan upgrade needs.',
  },
};

export interface DetectedAnomaly {
  row: number;
  field: string;
  zScore: number;
  anomalyScore: number;
}

function numericFields(logs: readonly UsageLogEntry[]): string[] {
  const fields = new Set<string>();
  for (const entry of logs) {
    for (const [key, value] of Object.entries(entry)) {
      if (typeof value === 'number' && Number.isFinite(value)) fields.add(key);
    }
  }
  return [...fields].sort();
}

function numberAt(entry: UsageLogEntry, field: string): number {
  const value = entry[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Flag rows whose largest per-field z-score (population std) exceeds the threshold.
 * Non-numeric or missing values count as 0.
 */
export function detectAnomalies(logs: readonly UsageLogEntry[], threshold = Z_THRESHOLD): DetectedAnomaly[] {
  if (logs.length < MIN_ROWS) return [];
  const fields = numericFields(logs);
  if (fields.length === 0) return [];

  const stats = fields.map((field) => {
    const values = logs.map((entry) => numberAt(entry, field));
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
    return { field, mean, std: Math.sqrt(variance) + EPSILON };
  });

  const anomalies: DetectedAnomaly[] = [];
  logs.forEach((entry, row) => {
    let top = { field: fields[0], z: 0 };
    for (const { field, mean, std } of stats) {
      const z = Math.abs(numberAt(entry, field) - mean) / std;
      if (z > top.z) top = { field, z };
    }
    if (top.z > threshold) {
      anomalies.push({ row, field: top.field, zScore: round4(top.z), anomalyScore: round4(-top.z) });
    }
  });
  return anomalies;
}

export function severityFor(zScore: number): Severity {
  return SEVERITY_BANDS.find((band) => zScore >= band.minZ)?.severity ?? 'low';
}

export function buildAlert(anomaly: DetectedAnomaly, accountId: string, now: Date): ProactiveAlert {
  const pattern = ALERT_PATTERNS[anomaly.field];
  return {
    alertType: pattern ? pattern.alertType : 'general_anomaly',
    severity: severityFor(anomaly.zScore),
    anomalyScore: anomaly.anomalyScore,
    recommendedAction: pattern
      ? pattern.action
      : `Anomaly detected in account ${accountId} (${anomaly.field}). Review usage patterns.`,
    timestamp: now.toISOString(),
  };
}

/** Proactive-issue agent: scans account usage telemetry for outliers */
export class AnomalyScanner implements CapabilityProvider<'anomaly'> {
  readonly role = 'anomaly' as const;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async invoke(input: AnomalyInput): Promise<AnomalyOutput> {
    const now = this.clock();
    return {
      proactiveAlerts: detectAnomalies(input.usageLogs).map((anomaly) => buildAlert(anomaly, input.accountId, now)),
    };
  }
}
