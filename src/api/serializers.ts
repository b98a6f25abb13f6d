import { EscalationPayload, FeedbackAnalysis } from '../config/types';
import { UnifiedResponse } from '../orchestrator/types';

export function feedbackToWire(analysis: FeedbackAnalysis) {
  return {
    csat_score: analysis.csatScore,
    sentiment_trend: analysis.sentimentTrend,
    top_issues: [...analysis.topIssues],
    knowledge_gap_flags: [...analysis.knowledgeGapFlags],
  };
}

/** snake_case wire form of a unified response */
export function responseToWire(response: UnifiedResponse) {
  return {
    interaction_id: response.interactionId,
    timestamp: response.timestamp,
    conversation_id: response.conversationId,
    customer_id: response.customerId,
    channel: response.channel,
    language: response.language,
    response_text: response.responseText,
    intent: response.intent,
    sentiment_score: response.sentimentScore,
    dominant_emotion: response.dominantEmotion,
    tone_recommendation: response.toneRecommendation,
    escalation_flag: response.escalation.escalate,
    escalation_reason: response.escalation.reason,
    escalation_reasons: [...response.escalation.reasons],
    suggested_articles: response.suggestedArticles.map((article) => ({
      article_id: article.articleId,
      title: article.title,
      content_snippet: article.contentSnippet,
      confidence_score: article.confidenceScore,
    })),
    proactive_alerts: response.proactiveAlerts.map((alert) => ({
      alert_type: alert.alertType,
      severity: alert.severity,
      anomaly_score: alert.anomalyScore,
      recommended_action: alert.recommendedAction,
      timestamp: alert.timestamp,
    })),
    feedback_analysis: feedbackToWire(response.feedbackAnalysis),
    agent_logs: response.agentLogs,
  };
}

export function escalationToWire(payload: EscalationPayload) {
  return {
    interaction_id: payload.interactionId,
    conversation_id: payload.conversationId ?? null,
    customer_id: payload.customerId,
    channel: payload.channel,
    escalation_reason: payload.reason,
    reasons: [...payload.reasons],
    summary: payload.summary,
    timestamp: payload.timestamp,
  };
}
