import {
  classifyIntent,
  loadIntentCatalog,
  ResponseGenerator,
} from '../../src/agents/providers/response-generator';
import { detectLanguage } from '../../src/agents/providers/text-utils';
import { makeSnapshot } from '../helpers/fixtures';

describe('ResponseGenerator', () => {
  const catalog = loadIntentCatalog();
  const rules = catalog.rules;

  describe('classifyIntent', () => {
    it.each([
      ['My invoice shows a double charge', 'billing_inquiry'],
      ['The app keeps showing an error', 'technical_support'],
      ['I forgot my password', 'account_management'],
      ['I want to speak to a human', 'escalation_request'],
      ['Where is my delivery?', 'order_status'],
      ['Please cancel my plan', 'cancellation'],
      ['I would like my money back', 'refund_request'],
      ['Hello there', 'greeting'],
      ['Thanks, goodbye', 'farewell'],
    ])('classifies "%s" as %s', (text, intent) => {
      expect(classifyIntent(text, rules)).toEqual({ intent, confidence: 0.6 });
    });

    it('uses the first matching rule when several match', () => {
      // "account" (account_management) is listed before "cancel" (cancellation)
      expect(classifyIntent('cancel my account', rules).intent).toBe('account_management');
    });

    it('matches whole words only', () => {
      expect(classifyIntent('I think so', rules)).toEqual({ intent: 'general_inquiry', confidence: 0.3 });
    });

    it('returns unknown for blank text', () => {
      expect(classifyIntent('   ', rules)).toEqual({ intent: 'unknown', confidence: 0 });
    });
  });

  describe('detectLanguage', () => {
    it('detects Arabic script', () => {
      expect(detectLanguage('مرحبا، أين طلبي؟')).toBe('ar');
    });

    it('defaults to English for Latin text and empty input', () => {
      expect(detectLanguage('Where is my order?')).toBe('en');
      expect(detectLanguage('')).toBe('en');
    });
  });

  describe('invoke', () => {
    const input = (customerMessage: string) => ({
      interactionId: 'int-1',
      customerMessage,
      channel: 'chat' as const,
      context: makeSnapshot(),
    });

    it('requires init before use', async () => {
      await expect(new ResponseGenerator().invoke(input('hello'))).rejects.toThrow('before init()');
    });

    it('answers with the localized template for the intent', async () => {
      const generator = new ResponseGenerator({ catalog });
      const output = await generator.invoke(input('I need help with my invoice'));

      expect(output).toEqual({
        responseText: catalog.templates.billing_inquiry.en,
        intent: 'billing_inquiry',
        confidence: 0.6,
        escalationFlag: false,
        language: 'en',
      });
    });

    it('answers Arabic messages in Arabic', async () => {
      const generator = new ResponseGenerator({ catalog });
      const output = await generator.invoke(input('مرحبا'));

      expect(output.language).toBe('ar');
      expect(output.intent).toBe('greeting');
      expect(output.responseText).toBe(catalog.templates.greeting.ar);
    });

    it('raises its escalation flag for explicit requests', async () => {
      const generator = new ResponseGenerator();
      await generator.init();
      const output = await generator.invoke(input('Let me talk to your supervisor'));

      expect(output.intent).toBe('escalation_request');
      expect(output.escalationFlag).toBe(true);
    });

    it('falls back to the unknown template for empty messages', async () => {
      const generator = new ResponseGenerator({ catalog });
      const output = await generator.invoke(input(''));
      expect(output.responseText).toBe(catalog.templates.unknown.en);
    });
  });
});
