import {
  classifyEmotions,
  computeSentiment,
  dominantEmotion,
  EmotionLexicon,
  recommendTone,
  SentimentAnalyzer,
} from '../../src/agents/providers/sentiment-analyzer';

const lexicon: EmotionLexicon = {
  positive: ['joy', 'love', 'surprise'],
  negative: ['anger', 'disgust', 'fear', 'sadness', 'distress'],
  emotions: {
    anger: ['angry', 'furious', 'unacceptable'],
    distress: ['desperate', 'help me'],
    sadness: ['sad', 'disappointed'],
    joy: ['happy', 'thanks', 'great'],
  },
};

const policy = { sentimentThreshold: -0.65, triggerEmotions: ['anger', 'distress'], consecutiveTurns: 2 };

describe('SentimentAnalyzer', () => {
  describe('recommendTone', () => {
    const bands: Array<[number, string]> = [
      [-1, 'highly empathetic and apologetic'],
      [-0.66, 'highly empathetic and apologetic'],
      [-0.65, 'empathetic and understanding'],
      [-0.3, 'warm and supportive'],
      [-0.01, 'warm and supportive'],
      [0, 'neutral and professional'],
      [0.3, 'friendly and positive'],
      [0.65, 'enthusiastic and celebratory'],
      [1, 'enthusiastic and celebratory'],
    ];

    it.each(bands)('maps %d to "%s"', (score, tone) => {
      expect(recommendTone(score)).toBe(tone);
    });
  });

  describe('emotion scoring', () => {
    it('is fully neutral without cue words', () => {
      expect(classifyEmotions('Where is my parcel', lexicon)).toEqual({ neutral: 1 });
    });

    it('splits hits across emotions', () => {
      const scores = classifyEmotions('I am angry and sad, thanks for nothing', lexicon);
      expect(scores).toEqual({ anger: 0.3333, sadness: 0.3333, joy: 0.3333 });
      expect(computeSentiment(scores, lexicon)).toBe(-0.3333);
    });

    it('breaks ties by lexicon order', () => {
      expect(dominantEmotion({ anger: 0.5, joy: 0.5 })).toBe('anger');
      expect(dominantEmotion({ neutral: 1 })).toBe('neutral');
    });
  });

  describe('invoke', () => {
    it('reports a strongly negative message and its own escalation opinion', async () => {
      const analyzer = new SentimentAnalyzer({ policy, lexicon });
      const output = await analyzer.invoke({
        interactionId: 'int-1',
        conversationText: 'This is unacceptable, I am furious',
        emotionHistory: ['anger'],
      });

      expect(output).toEqual({
        sentimentScore: -1,
        dominantEmotion: 'anger',
        emotionScores: { anger: 1 },
        escalationFlag: true,
        escalationReason:
          "Sentiment score (-1.00) below threshold (-0.65) | Trigger emotion 'anger' detected for 2 consecutive turns",
        toneRecommendation: 'highly empathetic and apologetic',
      });
    });

    it('stays calm on a positive message', async () => {
      const analyzer = new SentimentAnalyzer({ policy, lexicon });
      const output = await analyzer.invoke({
        interactionId: 'int-1',
        conversationText: 'Great, thanks!',
        emotionHistory: ['anger', 'anger'],
      });

      expect(output.sentimentScore).toBe(1);
      expect(output.dominantEmotion).toBe('joy');
      expect(output.escalationFlag).toBe(false);
      expect(output.escalationReason).toBeNull();
    });

    it('applies its own thresholds, not the coordinator defaults', async () => {
      const strict = new SentimentAnalyzer({ policy: { ...policy, sentimentThreshold: -0.2 }, lexicon });
      const output = await strict.invoke({
        interactionId: 'int-1',
        conversationText: 'I am angry and sad, thanks for nothing',
        emotionHistory: [],
      });

      expect(output.escalationReason).toBe('Sentiment score (-0.33) below threshold (-0.2)');
    });

    it('loads the bundled lexicon on init', async () => {
      const analyzer = new SentimentAnalyzer({ policy });
      await analyzer.init();
      const output = await analyzer.invoke({
        interactionId: 'int-1',
        conversationText: 'I am so angry',
        emotionHistory: [],
      });
      expect(output.dominantEmotion).toBe('anger');
    });
  });
});
