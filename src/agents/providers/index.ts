import { SentimentAgentPolicy } from '../../escalation/types';
import { AgentProviders } from '../types';
import { AnomalyScanner } from './anomaly-scanner';
import { FeedbackAnalyzer } from './feedback-analyzer';
import { KnowledgeSearch } from './knowledge-search';
import { ResponseGenerator } from './response-generator';
import { SentimentAnalyzer } from './sentiment-analyzer';

export { AnomalyScanner, FeedbackAnalyzer, KnowledgeSearch, ResponseGenerator, SentimentAnalyzer };

/** Default rule-based providers reading their data from the project's YAML files */
export function createDefaultProviders(sentimentPolicy: SentimentAgentPolicy): AgentProviders {
  return {
    generator: new ResponseGenerator(),
    knowledge: new KnowledgeSearch(),
    sentiment: new SentimentAnalyzer({ policy: sentimentPolicy }),
    anomaly: new AnomalyScanner(),
    feedback: new FeedbackAnalyzer(),
  };
}
