import path from 'path';
import { env } from '../../config/env';
import { ajv } from '../../config/validation';
import { loadYamlResource } from '../../config/yaml-loader';
import { countTrailingTriggers, REASON_SEPARATOR } from '../../escalation/escalation-evaluator';
import { SentimentAgentPolicy } from '../../escalation/types';
import { logger } from '../../observability/logger';
import { CapabilityProvider, SentimentInput, SentimentOutput } from '../types';
import { clamp, containsPhrase, normalizeForMatching, round4 } from './text-utils';

export interface EmotionLexicon {
  positive: string[];
  negative: string[];
  emotions: Record<string, string[]>;
}

const validateLexicon = ajv.compile<EmotionLexicon>({
  type: 'object',
  required: ['positive', 'negative', 'emotions'],
  properties: {
    positive: { type: 'array', items: { type: 'string' } },
    negative: { type: 'array', items: { type: 'string' } },
    emotions: {
      type: 'object',
      additionalProperties: { type: 'array', items: { type: 'string' } },
    },
  },
});

export function loadEmotionLexicon(filePath = path.join(env.projectRoot, 'config', 'emotion-lexicon.yaml')): EmotionLexicon {
  const lexicon = loadYamlResource(filePath, validateLexicon);
  if (!lexicon) {
    throw new Error(`Emotion lexicon not found at ${filePath}`);
  }
  return lexicon;
}

// Lower bounds, checked top-down
const TONE_BANDS: ReadonlyArray<{ min: number; tone: string }> = [
  { min: 0.65, tone: 'enthusiastic and celebratory' },
  { min: 0.3, tone: 'friendly and positive' },
  { min: 0, tone: 'neutral and professional' },
  { min: -0.3, tone: 'warm and supportive' },
  { min: -0.65, tone: 'empathetic and understanding' },
  { min: -1, tone: 'highly empathetic and apologetic' },
];

export function recommendTone(score: number): string {
  const band = TONE_BANDS.find((b) => score >= b.min);
  return band ? band.tone : 'neutral and professional';
}

/** Share of cue-word hits per emotion; text without cues is fully neutral */
export function classifyEmotions(text: string, lexicon: EmotionLexicon): Record<string, number> {
  const normalized = normalizeForMatching(text);
  const hits: Record<string, number> = {};
  let total = 0;

  for (const [emotion, cues] of Object.entries(lexicon.emotions)) {
    const count = cues.filter((cue) => containsPhrase(normalized, cue)).length;
    if (count > 0) {
      hits[emotion] = count;
      total += count;
    }
  }

  if (total === 0) return { neutral: 1 };

  const scores: Record<string, number> = {};
  for (const [emotion, count] of Object.entries(hits)) {
    scores[emotion] = round4(count / total);
  }
  return scores;
}

export function computeSentiment(scores: Record<string, number>, lexicon: EmotionLexicon): number {
  const sum = (labels: string[]): number => labels.reduce((acc, label) => acc + (scores[label] ?? 0), 0);
  return round4(clamp(sum(lexicon.positive) - sum(lexicon.negative), -1, 1));
}

/** Highest-scoring emotion; ties go to the one listed first */
export function dominantEmotion(scores: Record<string, number>): string {
  let best = 'neutral';
  let bestScore = -Infinity;
  for (const [emotion, score] of Object.entries(scores)) {
    if (score > bestScore) {
      best = emotion;
      bestScore = score;
    }
  }
  return best;
}

export interface SentimentAnalyzerOptions {
  policy: SentimentAgentPolicy;
  lexicon?: EmotionLexicon;
  lexiconPath?: string;
}

/**
 * Emotional-intelligence agent: emotion distribution, sentiment score, tone advice
 * and its own escalation opinion.
 */
export class SentimentAnalyzer implements CapabilityProvider<'sentiment'> {
  readonly role = 'sentiment' as const;
  private lexicon: EmotionLexicon | null;
  private readonly log = logger.child({ component: 'sentiment-analyzer' });

  constructor(private readonly options: SentimentAnalyzerOptions) {
    this.lexicon = options.lexicon ?? null;
  }

  async init(): Promise<void> {
    if (this.lexicon) return;
    this.lexicon = loadEmotionLexicon(this.options.lexiconPath);
    this.log.info({ emotions: Object.keys(this.lexicon.emotions).length }, 'Emotion lexicon loaded');
  }

  async invoke(input: SentimentInput): Promise<SentimentOutput> {
    if (!this.lexicon) {
      throw new Error('Sentiment analyzer used before init()');
    }

    const emotionScores = classifyEmotions(input.conversationText, this.lexicon);
    const sentimentScore = computeSentiment(emotionScores, this.lexicon);
    const dominant = dominantEmotion(emotionScores);
    const reasons = this.evaluatePolicy(sentimentScore, dominant, input.emotionHistory);

    return {
      sentimentScore,
      dominantEmotion: dominant,
      emotionScores,
      escalationFlag: reasons.length > 0,
      escalationReason: reasons.length > 0 ? reasons.join(REASON_SEPARATOR) : null,
      toneRecommendation: recommendTone(sentimentScore),
    };
  }

  private evaluatePolicy(score: number, dominant: string, history: readonly string[]): string[] {
    const { policy } = this.options;
    const reasons: string[] = [];

    if (score < policy.sentimentThreshold) {
      reasons.push(`Sentiment score (${score.toFixed(2)}) below threshold (${policy.sentimentThreshold})`);
    }

    const streak = countTrailingTriggers([...history, dominant], new Set(policy.triggerEmotions));
    if (streak >= policy.consecutiveTurns) {
      reasons.push(`Trigger emotion '${dominant}' detected for ${streak} consecutive turns`);
    }

    return reasons;
  }
}
