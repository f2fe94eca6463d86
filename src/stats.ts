/**
 * Per-tool call statistics and a bounded log of recent invocations, served
 * at /api/stats and streamed to /events subscribers.
 */

export type CallSource  = "http" | "mcp";
export type CallOutcome = "completed" | "failed" | "cancelled" | "rejected";

export interface ToolStats {
  calls:     number;
  bytesIn:   number;
  bytesOut:  number;
  totalMs:   number;
  errors:    number;
  cancelled: number;
}

export interface RequestEntry {
  ts:       number;
  tool:     string;
  source:   CallSource;
  bytesIn:  number;
  bytesOut: number;
  ms:       number;
  outcome:  CallOutcome;
}

export interface StatsSnapshotEntry extends ToolStats {
  avgMs: number;
}

export type StatsListener = (entry: RequestEntry, stats: Record<string, StatsSnapshotEntry>) => void;

const LOG_MAX = 200;

export class CallStats {
  private readonly toolStats = new Map<string, ToolStats>();
  private readonly requestLog: RequestEntry[] = [];
  private readonly listeners = new Set<StatsListener>();

  record(tool: string, source: CallSource, bytesIn: number, bytesOut: number, ms: number, outcome: CallOutcome): void {
    const prev = this.toolStats.get(tool) ?? { calls: 0, bytesIn: 0, bytesOut: 0, totalMs: 0, errors: 0, cancelled: 0 };
    this.toolStats.set(tool, {
      calls:     prev.calls     + 1,
      bytesIn:   prev.bytesIn   + bytesIn,
      bytesOut:  prev.bytesOut  + bytesOut,
      totalMs:   prev.totalMs   + ms,
      errors:    prev.errors    + (outcome === "failed" || outcome === "rejected" ? 1 : 0),
      cancelled: prev.cancelled + (outcome === "cancelled" ? 1 : 0),
    });

    const entry: RequestEntry = { ts: Date.now(), tool, source, bytesIn, bytesOut, ms, outcome };
    this.requestLog.push(entry);
    if (this.requestLog.length > LOG_MAX) this.requestLog.shift();

    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of new Set(this.listeners)) listener(entry, snapshot);
  }

  snapshot(): Record<string, StatsSnapshotEntry> {
    const out: Record<string, StatsSnapshotEntry> = {};
    for (const [tool, s] of this.toolStats) {
      out[tool] = { ...s, avgMs: s.calls > 0 ? Math.round(s.totalMs / s.calls) : 0 };
    }
    return out;
  }

  recent(): RequestEntry[] {
    return [...this.requestLog];
  }

  subscribe(listener: StatsListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }
}
