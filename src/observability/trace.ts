import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  interactionId?: string;
  conversationId?: string;
  customerId?: string;
  channel?: string;
  spans: SpanRecord[];
}

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: SpanAttributes;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<Omit<TraceContext, 'spans'>>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    interactionId: overrides?.interactionId,
    conversationId: overrides?.conversationId,
    customerId: overrides?.customerId,
    channel: overrides?.channel,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: SpanAttributes): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}
