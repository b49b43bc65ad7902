/**
 * Generation trace types.
 *
 * The engine never prints; it records what it decided and why into a
 * trace the caller may read.
 */

// =============================================================================
// TRACE TYPES
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "warning";

/**
 * Stage of generation an event belongs to.
 */
export type TraceStage =
  | "layout" // dimensions, wall carving, goal placement
  | "reverse-play" // pulls and repositioning steps
  | "verification" // forward solve of the produced level
  | "validation" // validity rules
  | "fallback"; // bank selection and entry re-verification

/**
 * Base trace event
 */
export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly stage: TraceStage;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(stage: TraceStage): void;
  end(stage: TraceStage, durationMs: number): void;
  decision(
    stage: TraceStage,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(stage: TraceStage, message: string, details?: Record<string, unknown>): void;
  getEvents(): readonly TraceEvent[];
  getEventsByStage(stage: TraceStage): readonly TraceEvent[];
  clear(): void;
}
