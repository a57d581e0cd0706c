/**
 * Trace context
 *
 * Carries per-tick trace entries through the driver when tracing is on.
 */

export interface TraceContext {
  enabled: boolean;
  trace: TraceEntry[];
}

export interface TraceEntry {
  tick: number;
  cycles: number;
  added: number;    // Nodes appended during the tick
  killed: number;   // Attractors killed during the tick
  durationMs: number;
  timestamp: number;
}

export function createTraceContext(
  overrides: Partial<TraceContext> = {}
): TraceContext {
  return {
    enabled: false,
    trace: [],
    ...overrides,
  };
}

export function addTrace(
  context: TraceContext,
  entry: Omit<TraceEntry, 'timestamp'>
): TraceContext {
  if (!context.enabled) {
    return context;
  }

  return {
    ...context,
    trace: [...context.trace, { ...entry, timestamp: Date.now() }],
  };
}

export function lastTrace(context: TraceContext): TraceEntry | undefined {
  return context.trace[context.trace.length - 1];
}
