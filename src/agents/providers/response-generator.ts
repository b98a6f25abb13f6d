import path from 'path';
import { env } from '../../config/env';
import { Language } from '../../config/types';
import { ajv } from '../../config/validation';
import { loadYamlResource } from '../../config/yaml-loader';
import { logger } from '../../observability/logger';
import { CapabilityProvider, GeneratorInput, GeneratorOutput } from '../types';
import { containsPhrase, detectLanguage, normalizeForMatching } from './text-utils';

export const MATCHED_INTENT_CONFIDENCE = 0.6;
export const FALLBACK_INTENT = 'general_inquiry';
export const FALLBACK_INTENT_CONFIDENCE = 0.3;
export const ESCALATION_INTENT = 'escalation_request';

export interface IntentRule {
  intent: string;
  keywords: string[];
}

export interface IntentCatalog {
  rules: IntentRule[];
  templates: Record<string, Partial<Record<Language, string>>>;
}

const validateCatalog = ajv.compile<IntentCatalog>({
  type: 'object',
  required: ['rules', 'templates'],
  properties: {
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['intent', 'keywords'],
        properties: {
          intent: { type: 'string' },
          keywords: { type: 'array', items: { type: 'string' } },
        },
      },
    },
    templates: {
      type: 'object',
      required: ['unknown'],
      additionalProperties: {
        type: 'object',
        properties: { en: { type: 'string' }, ar: { type: 'string' } },
      },
    },
  },
});

export function loadIntentCatalog(filePath = path.join(env.projectRoot, 'config', 'intents.yaml')): IntentCatalog {
  const catalog = loadYamlResource(filePath, validateCatalog);
  if (!catalog) {
    throw new Error(`Intent catalog not found at ${filePath}`);
  }
  return catalog;
}

export function classifyIntent(text: string, rules: readonly IntentRule[]): { intent: string; confidence: number } {
  if (!text.trim()) return { intent: 'unknown', confidence: 0 };

  const normalized = normalizeForMatching(text);
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => containsPhrase(normalized, keyword))) {
      return { intent: rule.intent, confidence: MATCHED_INTENT_CONFIDENCE };
    }
  }
  return { intent: FALLBACK_INTENT, confidence: FALLBACK_INTENT_CONFIDENCE };
}

export interface ResponseGeneratorOptions {
  catalog?: IntentCatalog;
  catalogPath?: string;
}

/**
 * Omni-channel reply generator: detects language, classifies intent by keyword rules
 * and answers with a localized template.
 */
export class ResponseGenerator implements CapabilityProvider<'generator'> {
  readonly role = 'generator' as const;
  private catalog: IntentCatalog | null;
  private readonly log = logger.child({ component: 'response-generator' });

  constructor(private readonly options: ResponseGeneratorOptions = {}) {
    this.catalog = options.catalog ?? null;
  }

  async init(): Promise<void> {
    if (this.catalog) return;
    this.catalog = loadIntentCatalog(this.options.catalogPath);
    this.log.info({ rules: this.catalog.rules.length }, 'Intent catalog loaded');
  }

  async shutdown(): Promise<void> {
    this.catalog = this.options.catalog ?? null;
  }

  async invoke(input: GeneratorInput): Promise<GeneratorOutput> {
    if (!this.catalog) {
      throw new Error('Response generator used before init()');
    }

    const language = detectLanguage(input.customerMessage, 'en');
    const { intent, confidence } = classifyIntent(input.customerMessage, this.catalog.rules);
    const templates = this.catalog.templates[intent] ?? this.catalog.templates.unknown;
    const responseText = templates[language] ?? templates.en ?? '';

    return {
      responseText,
      intent,
      confidence,
      escalationFlag: intent === ESCALATION_INTENT,
      language,
    };
  }
}
