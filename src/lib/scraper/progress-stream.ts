/**
 * Progress Stream - real-time progress events for a pipeline run
 *
 * One stream per run. Region jobs and the orchestrator emit into it; the
 * outward interface consumes it with `for await` or `subscribe`. Iterators
 * replay the retained history first, so a consumer attaching after the run
 * started still sees it from the beginning.
 */

import type { PipelineStage, ProgressEvent, ProgressEventType, ProgressLevel } from '@/types';

// Maximum events retained for replay per run
const MAX_EVENTS_PER_RUN = 5000;

type Listener = (event: ProgressEvent) => void;

export interface EmitInput {
  type: ProgressEventType;
  level?: ProgressLevel;
  region?: string;
  stage?: PipelineStage;
  message: string;
  details?: Record<string, unknown>;
}

export class ProgressStream implements AsyncIterable<ProgressEvent> {
  private readonly runId: string;
  private readonly history: ProgressEvent[] = [];
  private readonly listeners = new Set<Listener>();
  private readonly closeListeners = new Set<() => void>();
  private closed = false;
  private readonly echo: boolean;

  constructor(runId: string, options: { echo?: boolean } = {}) {
    this.runId = runId;
    this.echo = options.echo ?? true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Add an event and notify listeners. Ignored once the stream is closed.
   */
  emit(input: EmitInput): ProgressEvent | null {
    if (this.closed) return null;

    const event: ProgressEvent = {
      type: input.type,
      level: input.level ?? 'info',
      runId: this.runId,
      timestamp: new Date(),
      region: input.region,
      stage: input.stage,
      message: input.message,
      details: input.details,
    };

    this.history.push(event);
    if (this.history.length > MAX_EVENTS_PER_RUN) {
      this.history.shift();
    }

    if (this.echo) {
      const where = event.region ? ` [${event.region}]` : '';
      const log = event.level === 'error' ? console.error : console.log;
      log(`[Run ${this.runId}]${where} ${event.type}: ${event.message}`);
    }

    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (e) {
        console.log(`[ProgressStream] Listener error for ${this.runId}:`, e);
      }
    });

    return event;
  }

  /**
   * Events emitted so far (bounded)
   */
  getEvents(): ProgressEvent[] {
    return [...this.history];
  }

  /**
   * Subscribe to live events. Returns an unsubscribe function.
   */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * End the stream; pending iterators finish after draining.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.closeListeners.forEach((listener) => listener());
    this.closeListeners.clear();
    this.listeners.clear();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    const queue: ProgressEvent[] = [...this.history];
    let wake: (() => void) | null = null;

    const unsubscribe = this.subscribe((event) => {
      queue.push(event);
      wake?.();
    });
    const onClose = () => wake?.();
    this.closeListeners.add(onClose);

    try {
      while (true) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (this.closed) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      unsubscribe();
      this.closeListeners.delete(onClose);
    }
  }
}
