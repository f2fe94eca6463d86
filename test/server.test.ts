import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { createRuntime, type BridgeRuntime } from "../src/runtime.js";
import { createServer } from "../src/server.js";
import { StubAddin, testConfig } from "./stub-host.js";

interface SseEvent {
  event: string;
  data:  unknown;
}

function parseSse(payload: string): SseEvent[] {
  return payload
    .split("\n\n")
    .filter((block) => block.trim() !== "")
    .map((block) => {
      const lines = block.split("\n");
      const event = lines.find((l) => l.startsWith("event: "))?.slice("event: ".length) ?? "";
      const data: unknown = JSON.parse(lines.find((l) => l.startsWith("data: "))?.slice("data: ".length) ?? "null");
      return { event, data };
    });
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("HTTP surface", () => {
  let stub: StubAddin;
  let rt: BridgeRuntime;
  let app: FastifyInstance;

  beforeEach(() => {
    stub = new StubAddin();
    stub.on("GET", "/document", { json: { name: "Housing", units: "mm" } });
    rt = createRuntime(testConfig({ keepaliveMs: 40 }), { fetchImpl: stub.fetch });
    app = createServer(rt);
  });

  afterEach(async () => {
    await app.close();
  });

  it("GET /health answers from session state", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok", uptime_s: 0, active_invocations: 0, tools: 20 });
    expect(stub.calls).toEqual([]);
  });

  it("GET /tools lists the catalogue with schemas", async () => {
    const res = await app.inject({ method: "GET", url: "/tools" });
    const body: { tools: Array<{ name: string; inputSchema: { required: string[] } }> } = res.json();
    expect(body.tools).toHaveLength(20);
    expect(body.tools.find((t) => t.name === "body_details")?.inputSchema.required).toEqual(["name"]);
  });

  it("answers a fast tool with one JSON frame", async () => {
    const res = await app.inject({ method: "POST", url: "/invoke", payload: { tool: "document_info" } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ invocation_id: "inv-1", event_type: "completed", data: { name: "Housing", units: "mm" } });
  });

  it("answers the health check as a frame without an invocation", async () => {
    const res = await app.inject({ method: "POST", url: "/invoke", payload: { tool: "health" } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      invocation_id: null,
      event_type:    "completed",
      data:          { status: "ok", uptime_s: 0, active_invocations: 0, tools: 20 },
    });
    expect(rt.sessions.list()).toEqual([]);
  });

  it("maps failures onto HTTP statuses", async () => {
    stub.down = true;
    const res = await app.inject({ method: "POST", url: "/invoke", payload: { tool: "bodies", stream: false } });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      invocation_id: "inv-1",
      event_type:    "failed",
      data:          { kind: "HostUnreachable", message: "CAD add-in not running or not loaded" },
    });
  });

  it("rejects unknown tools with 404 and bad input with 400", async () => {
    const unknown = await app.inject({ method: "POST", url: "/invoke", payload: { tool: "fillet" } });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({ error: { kind: "ValidationError", message: "unknown tool: fillet" } });

    const invalid = await app.inject({ method: "POST", url: "/invoke", payload: { tool: "restore_version", input: { version_number: 0 } } });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({
      error: { kind: "ValidationError", message: "invalid input for restore_version: version_number: Number must be greater than or equal to 1" },
    });

    const envelope = await app.inject({ method: "POST", url: "/invoke", payload: { input: {} } });
    expect(envelope.statusCode).toBe(400);
    expect(envelope.json()).toEqual({ error: { kind: "ValidationError", message: "invalid request: tool: Required" } });
    expect(stub.calls).toEqual([]);
  });

  it("streams keepalives and one terminal frame for a long-running tool", async () => {
    stub.on("POST", "/run_script", { delayMs: 130, json: { success: true, result: "done" } });
    const res = await app.inject({ method: "POST", url: "/invoke", payload: { tool: "run_script", input: { code: "x = 1" } } });

    expect(res.headers["content-type"]).toBe("text/event-stream");
    expect(res.headers["x-invocation-id"]).toBe("inv-1");
    const events = parseSse(res.payload);
    const last = events[events.length - 1];
    expect(events.length).toBeGreaterThanOrEqual(3);
    expect(events.slice(0, -1).every((e) => e.event === "keepalive")).toBe(true);
    expect(events[0]?.data).toEqual({ invocation_id: "inv-1", event_type: "keepalive" });
    expect(last).toEqual({
      event: "completed",
      data:  { invocation_id: "inv-1", event_type: "completed", data: { success: true, result: "done" } },
    });
    expect(rt.sessions.get("inv-1")).toBeUndefined();
  });

  it("streams a fast tool when the client asks for event-stream", async () => {
    const res = await app.inject({
      method:  "POST",
      url:     "/invoke",
      headers: { accept: "text/event-stream" },
      payload: { tool: "document_info" },
    });
    expect(parseSse(res.payload).map((e) => e.event)).toEqual(["completed"]);
  });

  it("answers a long-running tool in JSON when stream is false", async () => {
    stub.on("POST", "/version/restore", { json: { success: true, version: 2 } });
    const res = await app.inject({
      method: "POST", url: "/invoke", payload: { tool: "restore_version", input: { version_number: 2 }, stream: false },
    });
    expect(res.headers["content-type"]).toContain("application/json");
    expect(res.json()).toEqual({ invocation_id: "inv-1", event_type: "completed", data: { success: true, version: 2 } });
  });

  it("cancels the invocation when the client drops the stream", async () => {
    stub.on("POST", "/sketch/create", { json: { success: true, sketch_name: "Sketch9" } });
    stub.on("POST", "/sketch/circle", { delayMs: 50, json: { success: true } });
    const base = await app.listen({ port: 0, host: "127.0.0.1" });

    const abort = new AbortController();
    const res = await fetch(`${base}/invoke`, {
      method:  "POST",
      headers: { "content-type": "application/json" },
      body:    JSON.stringify({
        tool:   "sketch_profile",
        stream: true,
        input:  {
          plane:  "XY",
          shapes: [0, 1, 2, 3].map((i) => ({ shape: "circle", center_x: i * 3, center_y: 0, radius: 1 })),
        },
      }),
      signal: abort.signal,
    });
    expect(res.headers.get("x-invocation-id")).toBe("inv-1");
    const reader = res.body?.getReader();
    if (!reader) throw new Error("no response body");
    const first = await reader.read();
    expect(first.done).toBe(false);

    abort.abort();
    await sleep(300);

    expect(rt.stats.recent().map((e) => [e.tool, e.outcome])).toEqual([["sketch_profile", "cancelled"]]);
    expect(stub.count("POST", "/sketch/circle")).toBeLessThan(4);
    expect(rt.sessions.activeCount).toBe(0);
  });

  it("cancels a running invocation through DELETE", async () => {
    stub.on("POST", "/run_script", { delayMs: 80, json: { success: true } });
    const sub = rt.sessions.submit("run_script", { code: "slow()" });
    if (!sub.ok || sub.kind !== "invocation") throw new Error("not dispatched");
    await sleep(10);

    const listed = await app.inject({ method: "GET", url: "/invocations" });
    expect(listed.json()).toEqual({
      invocations: [{ invocation_id: "inv-1", tool: "run_script", state: "streaming", started_at: sub.invocation.startedAt }],
    });

    const del = await app.inject({ method: "DELETE", url: "/invocations/inv-1" });
    expect(del.statusCode).toBe(202);
    expect(del.json()).toEqual({ invocation_id: "inv-1", outcome: "cancelling" });

    await sub.done;
    const after = await app.inject({ method: "GET", url: "/invocations/inv-1" });
    expect(after.json()).toMatchObject({
      state:    "cancelled",
      history:  ["received", "dispatched", "streaming", "cancelled"],
      terminal: { invocation_id: "inv-1", event_type: "cancelled" },
    });

    const again = await app.inject({ method: "DELETE", url: "/invocations/inv-1" });
    expect(again.statusCode).toBe(409);
    const missing = await app.inject({ method: "GET", url: "/invocations/inv-42" });
    expect(missing.statusCode).toBe(404);
  });

  it("keeps per-tool statistics", async () => {
    await app.inject({ method: "POST", url: "/invoke", payload: { tool: "document_info" } });
    const res = await app.inject({ method: "GET", url: "/api/stats" });
    expect(res.json()).toMatchObject({ document_info: { calls: 1, errors: 0, cancelled: 0 } });
  });

  it("refuses GET on the stateless MCP endpoint", async () => {
    const res = await app.inject({ method: "GET", url: "/mcp" });
    expect(res.statusCode).toBe(405);
  });
});
