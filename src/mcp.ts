import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type ServerNotification,
} from "@modelcontextprotocol/sdk/types.js";

import type { BridgeRuntime } from "./runtime.js";
import type { FrameListener } from "./session.js";
import { isTerminal, type InvocationFrame, type JsonValue } from "./types.js";
import { PKG_VERSION, SERVER_NAME } from "./version.js";

function isImagePayload(v: JsonValue | undefined): v is { data: string; mimeType: string } {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const data = v["data"];
  const mimeType = v["mimeType"];
  return typeof data === "string" && typeof mimeType === "string" && mimeType.startsWith("image/");
}

function textResult(data: JsonValue | undefined, isError = false): CallToolResult {
  const text = typeof data === "string" ? data : JSON.stringify(data ?? null, null, 2);
  return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] };
}

/** Map a terminal frame onto an MCP tool result; failures are results, not protocol errors. */
export function toCallResult(frame: InvocationFrame): CallToolResult {
  if (frame.event_type === "completed") {
    if (isImagePayload(frame.data)) {
      return { content: [{ type: "image", data: frame.data.data, mimeType: frame.data.mimeType }] };
    }
    return textResult(frame.data);
  }
  return textResult({ invocation_id: frame.invocation_id, event_type: frame.event_type, data: frame.data ?? null }, true);
}

export interface McpServerOptions {
  /** Aborted when the underlying connection goes away; cancels every call still running on it. */
  signal?: AbortSignal;
}

/**
 * Build an MCP server over the shared registry and session table. Stateless:
 * the HTTP surface builds one per request, stdio mode builds one per process.
 */
export function buildMcpServer(rt: BridgeRuntime, opts: McpServerOptions = {}): Server {
  const server = new Server(
    { name: SERVER_NAME, version: PKG_VERSION },
    { capabilities: { tools: {}, logging: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: rt.registry.list().map((t) => ({
      name:        t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name } = request.params;
    const progressToken = request.params._meta?.progressToken;

    let ticks = 0;
    const listener: FrameListener = (frame) => {
      if (isTerminal(frame.event_type)) return;
      ticks += 1;
      const message = frame.event_type === "progress" ? JSON.stringify(frame.data ?? null) : `${name} still running`;
      // Without a progress token the client still needs traffic on the request to keep it open.
      const notification: ServerNotification = progressToken === undefined
        ? {
            method: "notifications/message",
            params: { level: "info", logger: SERVER_NAME, data: `${message} (${frame.invocation_id})` },
          }
        : {
            method: "notifications/progress",
            params: { progressToken, progress: ticks, message },
          };
      extra.sendNotification(notification).catch((err: unknown) => {
        process.stderr.write(`[mcp] ${frame.invocation_id} ${notification.method} failed: ${String(err)}\n`);
      });
    };

    const submitted = rt.sessions.submit(name, request.params.arguments ?? {}, { source: "mcp", listener });
    if (!submitted.ok) {
      throw new McpError(
        submitted.reason === "unknown_tool" ? ErrorCode.MethodNotFound : ErrorCode.InvalidParams,
        submitted.error.message,
      );
    }
    if (submitted.kind === "probe") return textResult(submitted.data);

    const id = submitted.invocation.id;
    const onAbort = (): void => {
      const outcome = rt.sessions.cancel(id, "MCP request aborted");
      process.stderr.write(`[mcp] ${id} request aborted (${outcome})\n`);
    };
    const signals = opts.signal ? [extra.signal, opts.signal] : [extra.signal];
    if (signals.some((s) => s.aborted)) onAbort();
    else for (const s of signals) s.addEventListener("abort", onAbort, { once: true });

    try {
      const frame = await submitted.done;
      rt.sessions.acknowledge(id);
      return toCallResult(frame);
    } finally {
      for (const s of signals) s.removeEventListener("abort", onAbort);
    }
  });

  server.onerror = (err: Error) => {
    process.stderr.write(`[mcp] ${err.stack ?? err.message}\n`);
  };

  return server;
}

/** Serve MCP on stdin/stdout until stdin closes. */
export async function startStdio(rt: BridgeRuntime): Promise<void> {
  const server = buildMcpServer(rt);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.stderr.write(`[mcp] stdio server ready (${rt.registry.size} tools, addin=${rt.config.addinUrl})\n`);

  process.stdin.once("close", () => {
    rt.sessions.shutdown();
    void server.close().finally(() => process.exit(0));
  });
}
