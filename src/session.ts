/**
 * Invocation table and per-invocation state machine:
 *
 *   received → dispatched → streaming → completed | failed | cancelled
 *
 * The table is the only mutable process-wide structure. Every mutation runs
 * on the event loop, from the transport's request handlers or from the
 * coordinator's sink callback; workers never touch it directly.
 */

import { BridgeError, ConsistencyError } from "./errors.js";
import type { TaskHandle, TaskRunner } from "./coordinator.js";
import type { OperationRegistry } from "./registry.js";
import type { CallStats, CallSource } from "./stats.js";
import {
  isTerminal,
  type CoordinatorEvent,
  type DurationClass,
  type Invocation,
  type InvocationFrame,
  type InvocationState,
  type JsonObject,
  type JsonValue,
} from "./types.js";

const RANK: Record<InvocationState, number> = {
  received:   0,
  dispatched: 1,
  streaming:  2,
  completed:  3,
  failed:     3,
  cancelled:  3,
};

export type FrameListener = (frame: InvocationFrame) => void;

export type SubmitResult =
  | { ok: false; reason: "unknown_tool" | "invalid_input"; error: BridgeError }
  | { ok: true;  kind: "probe"; data: JsonValue }
  | {
      ok:            true;
      kind:          "invocation";
      invocation:    Invocation;
      durationClass: DurationClass;
      done:          Promise<InvocationFrame>;
    };

export type CancelOutcome = "cancelled" | "cancelling" | "already_terminal" | "not_found";

export interface SubmitOptions {
  source?:   CallSource;
  listener?: FrameListener;
}

export interface SessionOptions {
  registry:    OperationRegistry;
  coordinator: TaskRunner;
  graceMs:     number;
  stats?:      CallStats;
}

export interface InvocationSummary {
  invocation_id: string;
  tool:          string;
  state:         InvocationState;
  started_at:    string;
}

export class SessionTable {
  private readonly registry: OperationRegistry;
  private readonly coordinator: TaskRunner;
  private readonly graceMs: number;
  private readonly stats: CallStats | undefined;

  private readonly invocations = new Map<string, Invocation>();
  private readonly tasks       = new Map<string, TaskHandle>();
  private readonly retention   = new Map<string, NodeJS.Timeout>();
  private counter = 0;
  private running = 0;
  private readonly bootedAt = Date.now();

  constructor(opts: SessionOptions) {
    this.registry    = opts.registry;
    this.coordinator = opts.coordinator;
    this.graceMs     = opts.graceMs;
    this.stats       = opts.stats;
  }

  /**
   * Resolve, validate and dispatch one tool invocation. Nothing reaches the
   * coordinator unless the input passed validation.
   */
  submit(toolName: string, rawInput: unknown, opts: SubmitOptions = {}): SubmitResult {
    const source = opts.source ?? "http";
    const descriptor = this.registry.resolve(toolName);
    if (!descriptor) {
      this.stats?.record(toolName, source, 0, 0, 0, "rejected");
      return { ok: false, reason: "unknown_tool", error: new BridgeError("ValidationError", `unknown tool: ${toolName}`) };
    }

    if (descriptor.kind === "probe") {
      const data = descriptor.answer();
      this.stats?.record(toolName, source, 0, 0, 0, "completed");
      return { ok: true, kind: "probe", data };
    }

    const bound = descriptor.bind(rawInput);
    if (!bound.ok) {
      this.stats?.record(toolName, source, 0, 0, 0, "rejected");
      return { ok: false, reason: "invalid_input", error: bound.error };
    }

    const id = `inv-${++this.counter}`;
    const invocation: Invocation = {
      id,
      toolName,
      input:     bound.input,
      startedAt: new Date().toISOString(),
      state:     "received",
      history:   ["received"],
    };
    this.invocations.set(id, invocation);
    this.running += 1;

    const bytesIn = JSON.stringify(bound.input ?? {}).length;
    const t0 = Date.now();
    let resolveDone: (frame: InvocationFrame) => void = () => undefined;
    const done = new Promise<InvocationFrame>((resolve) => { resolveDone = resolve; });

    const sink = (event: CoordinatorEvent): void => {
      const frame: InvocationFrame = { invocation_id: id, event_type: event.type };
      if ("data" in event && event.data !== undefined) frame.data = event.data;

      if (isTerminal(event.type)) {
        this.finish(invocation, frame);
        this.stats?.record(
          toolName, source, bytesIn, frame.data === undefined ? 0 : JSON.stringify(frame.data).length,
          Date.now() - t0, event.type,
        );
        resolveDone(frame);
      }
      this.deliver(opts.listener, frame);
    };

    this.transition(invocation, "dispatched");
    const handle = this.coordinator.start(
      { invocationId: id, toolName, durationClass: descriptor.durationClass, work: bound.work },
      sink,
    );
    this.tasks.set(id, handle);
    this.transition(invocation, "streaming");
    process.stderr.write(`[session] ${id} ${toolName} dispatched (${descriptor.durationClass})\n`);

    return { ok: true, kind: "invocation", invocation, durationClass: descriptor.durationClass, done };
  }

  cancel(id: string, reason?: string): CancelOutcome {
    const invocation = this.invocations.get(id);
    if (!invocation) return "not_found";
    if (isTerminal(invocation.state)) return "already_terminal";
    const handle = this.tasks.get(id);
    if (!handle) {
      throw new ConsistencyError(`${id} is ${invocation.state} but has no running task`);
    }
    handle.cancel(reason);
    return isTerminal(invocation.state) ? "cancelled" : "cancelling";
  }

  /** The terminal frame reached the client; drop the invocation now rather than after the grace window. */
  acknowledge(id: string): void {
    const invocation = this.invocations.get(id);
    if (!invocation || !isTerminal(invocation.state)) return;
    this.forget(id);
  }

  get(id: string): Invocation | undefined {
    return this.invocations.get(id);
  }

  list(): InvocationSummary[] {
    return [...this.invocations.values()].map((inv) => ({
      invocation_id: inv.id,
      tool:          inv.toolName,
      state:         inv.state,
      started_at:    inv.startedAt,
    }));
  }

  get activeCount(): number {
    return this.running;
  }

  get trackedCount(): number {
    return this.invocations.size;
  }

  /** Constant-time liveness snapshot; touches neither the coordinator nor the add-in. */
  liveness(): JsonObject {
    return {
      status:             "ok",
      uptime_s:           Math.floor((Date.now() - this.bootedAt) / 1000),
      active_invocations: this.running,
      tools:              this.registry.size,
    };
  }

  /** Cancel everything still running and clear the table. */
  shutdown(): void {
    for (const [id, handle] of this.tasks) {
      if (!handle.settled) handle.cancel("server shutting down");
      this.tasks.delete(id);
    }
    for (const timer of this.retention.values()) clearTimeout(timer);
    this.retention.clear();
    this.invocations.clear();
    this.running = 0;
  }

  private finish(invocation: Invocation, frame: InvocationFrame): void {
    if (isTerminal(invocation.state)) {
      throw new ConsistencyError(
        `${invocation.id} already ended as ${invocation.state}; refusing a second terminal ${frame.event_type}`,
      );
    }
    this.transition(invocation, frame.event_type);
    invocation.terminal = frame;
    this.tasks.delete(invocation.id);
    // Cleared by shutdown() while an add-in call was still in flight.
    if (!this.invocations.has(invocation.id)) return;
    this.running -= 1;

    const timer = setTimeout(() => this.forget(invocation.id), this.graceMs);
    timer.unref();
    this.retention.set(invocation.id, timer);
  }

  private forget(id: string): void {
    const timer = this.retention.get(id);
    if (timer) clearTimeout(timer);
    this.retention.delete(id);
    this.invocations.delete(id);
  }

  private transition(invocation: Invocation, next: InvocationFrame["event_type"] | InvocationState): void {
    if (next === "keepalive" || next === "progress") return;
    if (RANK[next] <= RANK[invocation.state]) {
      throw new ConsistencyError(`${invocation.id}: illegal transition ${invocation.state} → ${next}`);
    }
    invocation.state = next;
    invocation.history.push(next);
  }

  private deliver(listener: FrameListener | undefined, frame: InvocationFrame): void {
    if (!listener) return;
    try {
      listener(frame);
    } catch (err) {
      process.stderr.write(
        `[session] ${frame.invocation_id} listener failed on ${frame.event_type}: ${err instanceof Error ? err.message : String(err)}\n`,
      );
    }
  }
}
