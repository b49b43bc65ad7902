export type {
  TraceCollector,
  TraceEvent,
  TraceEventType,
  TraceStage,
} from "./trace";
