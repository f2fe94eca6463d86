import { describe, it, expect, beforeEach } from "vitest";
import { EXIT_ADDIN_DOWN, EXIT_BRIDGE_DOWN, EXIT_HEALTHY, runHealth } from "../src/health.js";
import { StubAddin, testConfig } from "./stub-host.js";

const BRIDGE = "http://127.0.0.1:8765/";

describe("cad-bridge health", () => {
  let stub: StubAddin;
  let bridgeUp: boolean;
  let lines: string[];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    if (!url.startsWith(BRIDGE)) return stub.fetch(input, init);
    if (!bridgeUp) throw new TypeError("fetch failed");
    return new Response(JSON.stringify({ status: "ok" }), { headers: { "content-type": "application/json" } });
  };

  beforeEach(() => {
    stub = new StubAddin();
    bridgeUp = true;
    lines = [];
  });

  const check = () =>
    runHealth(testConfig({ host: "0.0.0.0", port: 8765 }), { fetchImpl, out: (l) => { lines.push(l); } });

  it("exits 0 when the bridge and the add-in both answer", async () => {
    expect(await check()).toBe(EXIT_HEALTHY);
    expect(lines).toEqual(["bridge: ok (http://127.0.0.1:8765/health)", "add-in: ok (http://127.0.0.1:3001)"]);
  });

  it("exits 2 when the bridge is not running and still reports the add-in", async () => {
    bridgeUp = false;
    expect(await check()).toBe(EXIT_BRIDGE_DOWN);
    expect(lines).toEqual([
      "bridge: not reachable at http://127.0.0.1:8765/health (fetch failed)",
      "add-in: ok (http://127.0.0.1:3001)",
    ]);
    expect(stub.calls).toEqual([{ method: "GET", path: "/health", body: undefined }]);
  });

  it("exits 2 when neither the bridge nor the add-in answers", async () => {
    bridgeUp = false;
    stub.down = true;
    expect(await check()).toBe(EXIT_BRIDGE_DOWN);
    expect(lines[1]).toBe("add-in: host_unreachable (CAD add-in not running or not loaded)");
  });

  it("exits 1 when the add-in is not loaded", async () => {
    stub.down = true;
    expect(await check()).toBe(EXIT_ADDIN_DOWN);
    expect(lines[1]).toBe("add-in: host_unreachable (CAD add-in not running or not loaded)");
  });

  it("exits 1 when the add-in reports itself unhealthy", async () => {
    stub.on("GET", "/health", { json: { status: "starting" } });
    expect(await check()).toBe(EXIT_ADDIN_DOWN);
    expect(lines[1]).toBe('add-in: unhealthy {"status":"starting"}');
  });
});
