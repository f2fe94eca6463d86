/**
 * Long-operation coordinator.
 *
 * Runs one bound tool as a cancellable task, emits keepalive events while it is
 * running, and guarantees a single terminal event per task:
 *
 *   completed  handler resolved
 *   failed     handler rejected, or the absolute ceiling elapsed
 *   cancelled  cancel() was called; honored immediately when no add-in call
 *              is in flight, otherwise as soon as the in-flight call settles
 *
 * In-flight add-in calls are never aborted. After cancellation the task's
 * context refuses further calls, so the handler cannot reach the host again.
 */

import type { AddinClient, AddinEndpoint } from "./addin.js";
import { BridgeError, normalizeError } from "./errors.js";
import type { BoundWork } from "./registry.js";
import type {
  AddinCallResult,
  CoordinatorEvent,
  DurationClass,
  HttpMethod,
  JsonValue,
} from "./types.js";

export type TerminalEvent = Extract<CoordinatorEvent, { type: "completed" | "failed" | "cancelled" }>;

export type EventSink = (event: CoordinatorEvent) => void;

/** What a tool handler sees while it runs. */
export interface ToolContext {
  readonly invocationId: string;
  /** Aborted on cancellation or ceiling; for waits that are not add-in calls. */
  readonly signal:       AbortSignal;
  call(endpoint: AddinEndpoint, method?: HttpMethod, payload?: JsonValue, timeoutMs?: number): Promise<AddinCallResult>;
  image(endpoint: AddinEndpoint, timeoutMs?: number): Promise<AddinCallResult>;
  /** Report progress; the latest value is attached to a cancelled event. */
  progress(data: JsonValue): void;
  /** Throws a Cancelled error once cancellation or the ceiling has fired. */
  throwIfCancelled(): void;
}

export interface TaskHandle {
  readonly invocationId: string;
  readonly settled:      boolean;
  /** Returns false when the task had already reached a terminal event. */
  cancel(reason?: string): boolean;
}

export interface CoordinatorOptions {
  addin:       AddinClient;
  keepaliveMs: number;
  ceilingMs:   number;
}

export interface StartRequest {
  invocationId:  string;
  toolName:      string;
  durationClass: DurationClass;
  work:          BoundWork;
}

/** The part of the coordinator the session layer depends on. */
export interface TaskRunner {
  start(req: StartRequest, sink: EventSink): TaskHandle;
}

export class Coordinator implements TaskRunner {
  readonly keepaliveMs: number;
  readonly ceilingMs:   number;
  private readonly addin: AddinClient;

  constructor(opts: CoordinatorOptions) {
    this.addin       = opts.addin;
    this.keepaliveMs = opts.keepaliveMs;
    this.ceilingMs   = opts.ceilingMs;
  }

  start(req: StartRequest, sink: EventSink): TaskHandle {
    return new Task(req, sink, this.addin, this.keepaliveMs, this.ceilingMs);
  }
}

class Task implements TaskHandle {
  readonly invocationId: string;

  private readonly toolName: string;
  private readonly sink: EventSink;
  private readonly addin: AddinClient;
  private readonly abort = new AbortController();
  private readonly keepaliveTimer: NodeJS.Timeout;
  private readonly ceilingTimer: NodeJS.Timeout;
  private readonly t0 = Date.now();

  private inFlight = 0;
  private cancelRequested = false;
  private lastProgress: JsonValue | undefined;
  private _settled = false;

  constructor(req: StartRequest, sink: EventSink, addin: AddinClient, keepaliveMs: number, ceilingMs: number) {
    this.invocationId = req.invocationId;
    this.toolName     = req.toolName;
    this.sink         = sink;
    this.addin        = addin;

    this.keepaliveTimer = setInterval(() => this.emit({ type: "keepalive" }), keepaliveMs);
    this.ceilingTimer   = setTimeout(() => {
      this.cancelRequested = true;
      this.abort.abort();
      this.settle({
        type: "failed",
        data: new BridgeError("Timeout", `${this.toolName} exceeded the ${ceilingMs}ms ceiling`).toDetail(),
      });
    }, ceilingMs);

    const ctx = this.context();
    if (req.durationClass === "fast") {
      this.run(req.work, ctx);
    } else {
      // Off the dispatching call stack: the caller gets its handle before any handler code runs.
      void Promise.resolve().then(() => this.run(req.work, ctx));
    }
  }

  get settled(): boolean {
    return this._settled;
  }

  cancel(reason = "cancelled by client"): boolean {
    if (this._settled) return false;
    if (!this.cancelRequested) {
      process.stderr.write(`[coordinator] ${this.invocationId} cancel requested (${reason}); in-flight=${this.inFlight}\n`);
    }
    this.cancelRequested = true;
    this.abort.abort();
    if (this.inFlight === 0) this.settleCancelled();
    return true;
  }

  private run(work: BoundWork, ctx: ToolContext): void {
    let pending: Promise<JsonValue>;
    try {
      pending = work(ctx);
    } catch (err) {
      pending = Promise.reject(err);
    }
    pending.then(
      (data) => { this.settle({ type: "completed", data }); },
      (err: unknown) => {
        if (err instanceof BridgeError && err.kind === "Cancelled") {
          this.settleCancelled();
          return;
        }
        if (!(err instanceof BridgeError)) {
          const detail = err instanceof Error ? (err.stack ?? err.message) : String(err);
          process.stderr.write(`[coordinator] ${this.invocationId} ${this.toolName} raised: ${detail}\n`);
        }
        this.settle({ type: "failed", data: normalizeError(err) });
      },
    );
  }

  private context(): ToolContext {
    const task = this;
    const guarded = async (issue: () => Promise<AddinCallResult>): Promise<AddinCallResult> => {
      task.assertRunnable();
      task.inFlight += 1;
      try {
        return await issue();
      } finally {
        task.inFlight -= 1;
        if (task.cancelRequested && task.inFlight === 0) task.settleCancelled();
      }
    };

    return {
      invocationId: this.invocationId,
      signal:       this.abort.signal,
      call: (endpoint, method, payload, timeoutMs) =>
        guarded(() => task.addin.call(endpoint, method, payload, timeoutMs)),
      image: (endpoint, timeoutMs) =>
        guarded(() => task.addin.image(endpoint, timeoutMs)),
      progress: (data) => {
        if (task._settled) return;
        task.lastProgress = data;
        task.emit({ type: "progress", data });
      },
      throwIfCancelled: () => task.assertRunnable(),
    };
  }

  private assertRunnable(): void {
    if (this.cancelRequested || this._settled) {
      throw new BridgeError("Cancelled", `${this.toolName} was cancelled`);
    }
  }

  private settleCancelled(): void {
    if (this._settled) return;
    const data = this.lastProgress === undefined ? undefined : { partial: this.lastProgress };
    this.settle(data === undefined ? { type: "cancelled" } : { type: "cancelled", data });
  }

  private emit(event: CoordinatorEvent): void {
    if (this._settled) return;
    this.sink(event);
  }

  private settle(event: TerminalEvent): void {
    if (this._settled) {
      process.stderr.write(`[coordinator] ${this.invocationId} dropped late ${event.type} (already terminal)\n`);
      return;
    }
    this._settled = true;
    clearInterval(this.keepaliveTimer);
    clearTimeout(this.ceilingTimer);
    process.stderr.write(
      `[coordinator] ${this.invocationId} ${this.toolName} ${event.type} after ${Date.now() - this.t0}ms\n`,
    );
    this.sink(event);
  }
}
