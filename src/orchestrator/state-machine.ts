import { Logger } from 'pino';
import { endSpan, SpanRecord, startSpan, TraceContext } from '../observability/trace';

export type PipelineStage =
  | 'Admitted'
  | 'ContextLoaded'
  | 'Generated'
  | 'Searched'
  | 'Scored'
  | 'Scanned'
  | 'Escalated'
  | 'Aggregated'
  | 'Persisted'
  | 'Deferred'
  | 'Completed';

/** Allowed next stages. Scored may jump to Escalated when the scan is structurally skipped. */
export const STAGE_TRANSITIONS: Readonly<Record<PipelineStage, readonly PipelineStage[]>> = {
  Admitted: ['ContextLoaded'],
  ContextLoaded: ['Generated'],
  Generated: ['Searched'],
  Searched: ['Scored'],
  Scored: ['Scanned', 'Escalated'],
  Scanned: ['Escalated'],
  Escalated: ['Aggregated'],
  Aggregated: ['Persisted'],
  Persisted: ['Deferred'],
  Deferred: ['Completed'],
  Completed: [],
};

/**
 * Tracks one request's walk through the pipeline stages. Each stage's work runs
 * inside a trace span named `stage.<Stage>`.
 */
export class PipelineStateMachine {
  private current: PipelineStage = 'Admitted';
  private readonly visited: PipelineStage[] = ['Admitted'];
  private readonly skipped: PipelineStage[] = [];

  constructor(
    private readonly trace: TraceContext,
    private readonly log: Logger,
  ) {}

  get stage(): PipelineStage {
    return this.current;
  }

  get history(): readonly PipelineStage[] {
    return this.visited;
  }

  get skippedStages(): readonly PipelineStage[] {
    return this.skipped;
  }

  /**
   * Move to the target stage. Invalid transitions are logged and leave the stage unchanged.
   */
  transition(target: PipelineStage): boolean {
    if (!STAGE_TRANSITIONS[this.current].includes(target)) {
      this.log.warn({ from: this.current, to: target }, 'Invalid pipeline stage transition attempted');
      return false;
    }
    this.current = target;
    this.visited.push(target);
    return true;
  }

  /** Enter a stage and run its work inside a span */
  async run<T>(target: PipelineStage, work: () => Promise<T>): Promise<T> {
    this.transition(target);
    const span = startSpan(this.trace, `stage.${target}`);
    try {
      const result = await work();
      endSpan(span);
      return result;
    } catch (err) {
      endSpan(span, 'error');
      throw err;
    }
  }

  /** Record a stage that is deliberately not executed for this request */
  skip(target: PipelineStage, reason: string): void {
    this.skipped.push(target);
    const span: SpanRecord = startSpan(this.trace, `stage.${target}`, { skipped: true, reason });
    endSpan(span);
    this.log.debug({ stage: target, reason }, 'Pipeline stage skipped');
  }
}
