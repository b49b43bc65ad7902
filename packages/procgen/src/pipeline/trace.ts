/**
 * Trace collector implementation for debugging and observability.
 */

import type {
  TraceCollector,
  TraceEvent,
  TraceEventType,
  TraceStage,
} from "./types";

/**
 * Default trace collector implementation
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(stage: TraceStage, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      stage,
      eventType,
      data,
    });
  }

  start(stage: TraceStage): void {
    this.emit(stage, "start");
  }

  end(stage: TraceStage, durationMs: number): void {
    this.emit(stage, "end", { durationMs });
  }

  decision(
    stage: TraceStage,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(stage, "decision", { question, options, chosen, reason });
  }

  warning(stage: TraceStage, message: string, details?: Record<string, unknown>): void {
    this.emit(stage, "warning", details ? { message, ...details } : { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  getEventsByStage(stage: TraceStage): readonly TraceEvent[] {
    return this.events.filter((e) => e.stage === stage);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_stage: TraceStage): void {}
  end(_stage: TraceStage, _durationMs: number): void {}
  decision(
    _stage: TraceStage,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_stage: TraceStage, _message: string, _details?: Record<string, unknown>): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  getEventsByStage(_stage: TraceStage): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

/**
 * Create a trace collector based on configuration
 */
export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
