import { describe, it, expect, beforeEach } from "vitest";
import { AddinClient, HOST_UNREACHABLE_MESSAGE, isKnownEndpoint } from "../src/addin.js";
import { StubAddin } from "./stub-host.js";

describe("AddinClient", () => {
  let stub: StubAddin;
  let client: AddinClient;

  beforeEach(() => {
    stub = new StubAddin();
    client = new AddinClient({ baseUrl: "http://127.0.0.1:3001/", timeoutMs: 1_000, fetchImpl: stub.fetch });
  });

  it("strips trailing slashes from the base URL", () => {
    expect(client.baseUrl).toBe("http://127.0.0.1:3001");
  });

  it("returns the JSON body of a 2xx response as payload", async () => {
    stub.on("GET", "/document", { json: { name: "Bracket", units: "mm" } });
    const result = await client.call("/document");
    expect(result).toEqual({ status: "ok", payload: { name: "Bracket", units: "mm" } });
  });

  it("sends POST payloads as JSON", async () => {
    stub.on("POST", "/component/activate", { json: { success: true } });
    await client.call("/component/activate", "POST", { name: "Arm" });
    expect(stub.calls).toEqual([{ method: "POST", path: "/component/activate", body: { name: "Arm" } }]);
  });

  it("reports host_unreachable when the add-in is not listening", async () => {
    stub.down = true;
    const result = await client.call("/health");
    expect(result).toEqual({ status: "host_unreachable", error: { message: HOST_UNREACHABLE_MESSAGE } });
  });

  it("carries the add-in's error string, status and traceback", async () => {
    stub.on("POST", "/run_script", {
      status: 500,
      json:   { error: "name 'x' is not defined", traceback: "Traceback (most recent call last): ..." },
    });
    const result = await client.call("/run_script", "POST", { code: "x" });
    expect(result).toEqual({
      status: "host_error",
      error:  { message: "name 'x' is not defined", status: 500, traceback: "Traceback (most recent call last): ..." },
    });
  });

  it("treats a 2xx body carrying an error field as host_error", async () => {
    stub.on("GET", "/document", { json: { error: "No active design" } });
    const result = await client.call("/document");
    expect(result).toEqual({ status: "host_error", error: { message: "No active design", status: 200 } });
  });

  it("falls back to the HTTP status line for non-JSON error bodies", async () => {
    stub.on("GET", "/bodies", { status: 502, body: "Bad gateway", contentType: "text/plain" });
    const result = await client.call("/bodies");
    expect(result).toEqual({ status: "host_error", error: { message: "HTTP 502: Bad gateway", status: 502 } });
  });

  it("rejects a malformed 2xx body", async () => {
    stub.on("GET", "/parameters", { body: "{not json", contentType: "application/json" });
    const result = await client.call("/parameters");
    expect(result).toEqual({ status: "host_error", error: { message: "malformed response body from add-in", status: 200 } });
  });

  it("refuses unknown endpoints without a network call", async () => {
    const result = await client.call("/sketches/a/b");
    expect(result).toEqual({ status: "host_error", error: { message: "unknown add-in endpoint: /sketches/a/b" } });
    expect(stub.calls).toHaveLength(0);
  });

  it("bounds a single round trip by its timeout", async () => {
    stub.on("GET", "/document", { delayMs: 500, json: {} });
    const result = await client.call("/document", "GET", undefined, 20);
    expect(result).toEqual({ status: "timeout", error: { message: "add-in did not answer /document within 20ms" } });
  });

  it("encodes image responses as base64", async () => {
    stub.on("GET", "/screenshot", { body: new Uint8Array([0x89, 0x50, 0x4e, 0x47]), contentType: "image/png" });
    const result = await client.image("/screenshot");
    expect(result).toEqual({ status: "ok", payload: { data: "iVBORw==", mimeType: "image/png" } });
  });

  it("surfaces the add-in's error when no image came back", async () => {
    stub.on("GET", "/screenshot", { status: 500, json: { error: "No active viewport" } });
    const result = await client.image("/screenshot");
    expect(result).toEqual({ status: "host_error", error: { message: "No active viewport", status: 500 } });
  });

  it("rejects an empty image", async () => {
    stub.on("GET", "/screenshot", { body: new Uint8Array([]), contentType: "image/png" });
    const result = await client.image("/screenshot");
    expect(result).toEqual({ status: "host_error", error: { message: "add-in returned an empty image", status: 200 } });
  });
});

describe("isKnownEndpoint", () => {
  it("accepts named sub-resources and rejects everything else", () => {
    expect(isKnownEndpoint("/bodies/Body1")).toBe(true);
    expect(isKnownEndpoint("/sketch/circle")).toBe(true);
    expect(isKnownEndpoint("/sketch/polygon")).toBe(false);
    expect(isKnownEndpoint("/bodies/")).toBe(false);
  });
});
