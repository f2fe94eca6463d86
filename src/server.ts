import Fastify, { type FastifyInstance } from "fastify";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { ServerResponse } from "node:http";
import { z } from "zod";

import { httpStatusFor, isErrorKind } from "./errors.js";
import { buildMcpServer } from "./mcp.js";
import { describeIssues } from "./registry.js";
import type { BridgeRuntime } from "./runtime.js";
import type { FrameListener } from "./session.js";
import { isTerminal, type InvocationFrame, type ProbeFrame } from "./types.js";
import { PKG_VERSION } from "./version.js";

const InvokeBody = z.object({
  tool:   z.string().min(1),
  input:  z.unknown().optional(),
  stream: z.boolean().optional(),
});

const IdParams = z.object({ id: z.string().min(1) });

function sseFrame(frame: InvocationFrame): string {
  return `event: ${frame.event_type}\ndata: ${JSON.stringify(frame)}\n\n`;
}

function openEventStream(raw: ServerResponse): void {
  raw.setHeader("Content-Type",  "text/event-stream");
  raw.setHeader("Cache-Control", "no-cache");
  raw.setHeader("Connection",    "keep-alive");
  raw.flushHeaders();
}

/** HTTP status for a terminal frame answered in JSON mode. */
export function statusForFrame(frame: InvocationFrame): number {
  if (frame.event_type === "completed") return 200;
  if (frame.event_type === "cancelled") return httpStatusFor("Cancelled");
  const data = frame.data;
  const kind = typeof data === "object" && data !== null && !Array.isArray(data) ? data["kind"] : undefined;
  return isErrorKind(kind) ? httpStatusFor(kind) : 500;
}

function acceptsEventStream(accept: string | undefined): boolean {
  return accept !== undefined && accept.includes("text/event-stream");
}

const MCP_METHOD_NOT_ALLOWED = {
  jsonrpc: "2.0",
  error:   { code: -32000, message: "Method not allowed: this endpoint is stateless, use POST" },
  id:      null,
} as const;

export function createServer(rt: BridgeRuntime): FastifyInstance {
  const app = Fastify({ logger: false });
  const statsClients = new Set<ServerResponse>();

  // ── Invocations ─────────────────────────────────────────────────────────────

  app.post("/invoke", async (req, reply) => {
    const body = InvokeBody.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.code(400).send({
        error: { kind: "ValidationError", message: `invalid request: ${describeIssues(body.error)}` },
      });
    }
    const { tool, input, stream } = body.data;

    // Frames that arrive before the response mode is settled are held here.
    const held: InvocationFrame[] = [];
    let forward: FrameListener | null = null;
    const listener: FrameListener = (frame) => {
      if (forward) forward(frame);
      else held.push(frame);
    };

    const submitted = rt.sessions.submit(tool, input, { source: "http", listener });
    if (!submitted.ok) {
      return reply.code(submitted.reason === "unknown_tool" ? 404 : 400).send({ error: submitted.error.toDetail() });
    }
    if (submitted.kind === "probe") {
      const answer: ProbeFrame = { invocation_id: null, event_type: "completed", data: submitted.data };
      return answer;
    }

    const id  = submitted.invocation.id;
    const raw = reply.raw;
    raw.on("close", () => {
      if (raw.writableFinished) return;
      const outcome = rt.sessions.cancel(id, "client disconnected");
      if (outcome === "cancelled" || outcome === "cancelling") {
        process.stderr.write(`[http] ${id} client disconnected (${outcome})\n`);
      }
    });

    const streaming = stream ?? (acceptsEventStream(req.headers.accept) || submitted.durationClass === "long-running");
    if (!streaming) {
      const frame = await submitted.done;
      raw.once("finish", () => rt.sessions.acknowledge(id));
      return reply.code(statusForFrame(frame)).send(frame);
    }

    reply.hijack();
    raw.setHeader("X-Invocation-Id", id);
    openEventStream(raw);
    forward = (frame) => {
      const terminal = isTerminal(frame.event_type);
      if (!raw.writableEnded && !raw.destroyed) {
        raw.write(sseFrame(frame));
        if (terminal) raw.end();
      }
      if (terminal) rt.sessions.acknowledge(id);
    };
    for (const frame of held.splice(0)) forward(frame);
    await submitted.done;
    return reply;
  });

  app.get("/invocations", async () => ({ invocations: rt.sessions.list() }));

  app.get("/invocations/:id", async (req, reply) => {
    const { id } = IdParams.parse(req.params);
    const inv = rt.sessions.get(id);
    if (!inv) return reply.code(404).send({ error: { message: `no such invocation: ${id}` } });
    return {
      invocation_id: inv.id,
      tool:          inv.toolName,
      state:         inv.state,
      history:       inv.history,
      started_at:    inv.startedAt,
      ...(inv.terminal ? { terminal: inv.terminal } : {}),
    };
  });

  app.delete("/invocations/:id", async (req, reply) => {
    const { id } = IdParams.parse(req.params);
    const outcome = rt.sessions.cancel(id, "cancelled over HTTP");
    switch (outcome) {
      case "not_found":        return reply.code(404).send({ invocation_id: id, outcome });
      case "already_terminal": return reply.code(409).send({ invocation_id: id, outcome });
      case "cancelling":       return reply.code(202).send({ invocation_id: id, outcome });
      case "cancelled":        return { invocation_id: id, outcome };
    }
  });

  // ── Introspection ───────────────────────────────────────────────────────────

  app.get("/health", async () => rt.sessions.liveness());

  app.get("/tools", async () => ({ tools: rt.registry.list() }));

  app.get("/api/stats", async () => rt.stats.snapshot());

  app.get("/events", (req, reply) => {
    reply.hijack();
    const raw = reply.raw;
    openEventStream(raw);
    raw.write(`data: ${JSON.stringify({ type: "init", stats: rt.stats.snapshot(), log: rt.stats.recent() })}\n\n`);
    statsClients.add(raw);
    const unsubscribe = rt.stats.subscribe((entry, stats) => {
      raw.write(`data: ${JSON.stringify({ type: "entry", entry, stats })}\n\n`);
    });
    req.raw.on("close", () => {
      unsubscribe();
      statsClients.delete(raw);
    });
  });

  // ── MCP over Streamable HTTP (stateless) ────────────────────────────────────

  app.post("/mcp", async (req, reply) => {
    const connection = new AbortController();
    const server = buildMcpServer(rt, { signal: connection.signal });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.hijack();
    const raw = reply.raw;
    raw.on("close", () => {
      if (!raw.writableFinished) connection.abort();
      server.close().catch((err: unknown) => {
        process.stderr.write(`[mcp] close error: ${String(err)}\n`);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req.raw, raw, req.body);
    } catch (err) {
      process.stderr.write(`[mcp] request failed: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
      if (!raw.headersSent) {
        raw.writeHead(500, { "Content-Type": "application/json" });
        raw.end(JSON.stringify({ jsonrpc: "2.0", error: { code: -32603, message: "Internal server error" }, id: null }));
      }
    }
    return reply;
  });

  app.get("/mcp",    async (_req, reply) => reply.code(405).send(MCP_METHOD_NOT_ALLOWED));
  app.delete("/mcp", async (_req, reply) => reply.code(405).send(MCP_METHOD_NOT_ALLOWED));

  app.addHook("onClose", async () => {
    const data = `data: ${JSON.stringify({ type: "shutdown" })}\n\n`;
    for (const raw of new Set(statsClients)) raw.end(data);
    statsClients.clear();
    rt.sessions.shutdown();
  });

  return app;
}

// ── Process lifecycle ────────────────────────────────────────────────────────

let handlersInstalled = false;

/** Log and exit on anything that escaped a handler. */
export function installProcessHandlers(tag = "cad-bridge"): void {
  if (handlersInstalled) return;
  handlersInstalled = true;

  process.on("uncaughtException", (err: Error) => {
    process.stderr.write(`[${tag}] uncaughtException: ${err.stack ?? err.message}\n`);
    setTimeout(() => process.exit(1), 250);
  });

  process.on("unhandledRejection", (reason: unknown) => {
    const err = reason instanceof Error ? reason : new Error(String(reason));
    process.stderr.write(`[${tag}] unhandledRejection: ${err.stack ?? err.message}\n`);
    setTimeout(() => process.exit(1), 250);
  });
}

export async function startServer(rt: BridgeRuntime): Promise<FastifyInstance> {
  installProcessHandlers();
  const app = createServer(rt);

  const stop = (signal: string): void => {
    process.stderr.write(`[cad-bridge] ${signal}: shutting down\n`);
    app.close()
      .catch((err: unknown) => {
        process.stderr.write(`[cad-bridge] close error: ${String(err)}\n`);
      })
      .finally(() => process.exit(0));
  };
  process.once("SIGINT",  () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  await app.listen({ port: rt.config.port, host: rt.config.host });
  const addr = app.server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : rt.config.port;
  process.stderr.write(
    `[cad-bridge] v${PKG_VERSION} listening on http://${rt.config.host}:${actualPort} ` +
    `(${rt.registry.size} tools, addin=${rt.config.addinUrl})\n`,
  );
  return app;
}
