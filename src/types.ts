export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type DurationClass = "fast" | "long-running";

export type HttpMethod = "GET" | "POST";

// ── Add-in results ────────────────────────────────────────────────────────────

export type AddinStatus = "ok" | "host_unreachable" | "host_error" | "timeout";

export interface AddinFailure {
  message:    string;
  /** HTTP status returned by the add-in, when it answered at all */
  status?:    number;
  /** Traceback reported by the host (only ever surfaced for run_script) */
  traceback?: string;
}

export type AddinCallResult =
  | { status: "ok"; payload: JsonValue }
  | { status: Exclude<AddinStatus, "ok">; error: AddinFailure };

// ── Invocations ───────────────────────────────────────────────────────────────

export type TerminalEventType    = "completed" | "failed" | "cancelled";
export type NonTerminalEventType = "keepalive" | "progress";
export type InvocationEventType  = NonTerminalEventType | TerminalEventType;

export type InvocationState =
  | "received"
  | "dispatched"
  | "streaming"
  | TerminalEventType;

/** One frame on an invocation's stream, as written to the wire. */
export interface InvocationFrame {
  invocation_id: string;
  event_type:    InvocationEventType;
  data?:         JsonValue;
}

/** A probe answer has the frame's shape but no invocation behind it. */
export interface ProbeFrame {
  invocation_id: null;
  event_type:    "completed";
  data:          JsonValue;
}

/** Emitted by the coordinator; the session layer stamps the invocation id. */
export type CoordinatorEvent =
  | { type: "keepalive" }
  | { type: "progress";  data: JsonValue }
  | { type: "completed"; data: JsonValue }
  | { type: "failed";    data: JsonObject }
  | { type: "cancelled"; data?: JsonValue };

export interface Invocation {
  id:        string;
  toolName:  string;
  input:     unknown;
  startedAt: string;
  state:     InvocationState;
  history:   InvocationState[];
  terminal?: InvocationFrame;
}

export function isTerminal(type: InvocationEventType | InvocationState): type is TerminalEventType {
  return type === "completed" || type === "failed" || type === "cancelled";
}
