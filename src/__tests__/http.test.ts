import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "node:http";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { createHttpApp } from "../http.ts";
import { createMcpServer } from "../mcp-server.ts";
import { BUILTIN_DEFAULTS } from "../config.ts";
import { CommandDispatcher } from "../dispatcher.ts";
import { DeviceManager } from "../device-manager.ts";
import type { HttpReply } from "../pixoo-client.ts";

let server: Server;
let rootUrl: string;
let deviceHttp: ReturnType<typeof fakeDevice>;
const clients: Client[] = [];

function fakeDevice() {
  return vi.fn(async (_path: string, _body: string): Promise<HttpReply> => ({ status: 200, body: '{"error_code":0}' }));
}

beforeEach(async () => {
  deviceHttp = fakeDevice();
  const manager = new DeviceManager({
    discover: vi.fn(async () => []),
    diagnostics: { info: vi.fn(), warn: vi.fn() },
    client: { http: deviceHttp, retryDelayMs: 0 },
  });
  await manager.load([
    { name: "office", host: "10.0.0.5", autoDiscover: false, family: "pixoo", resolution: 64, debug: false, retryBudget: 2 },
    { name: "hallway", host: "10.0.0.9", autoDiscover: false, family: "time_gate", resolution: 128, debug: false, retryBudget: 2 },
  ]);
  const dispatcher = new CommandDispatcher(manager);
  const app = createHttpApp(
    () => createMcpServer(manager, dispatcher, BUILTIN_DEFAULTS),
    manager,
    dispatcher,
    BUILTIN_DEFAULTS
  );
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  rootUrl = typeof address === "object" && address ? `http://127.0.0.1:${address.port}` : "";
});

afterEach(async () => {
  await Promise.all(clients.splice(0).map((c) => c.close()));
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

async function connect() {
  const transport = new StreamableHTTPClientTransport(new URL(`${rootUrl}/mcp`));
  const client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(transport);
  clients.push(client);
  return { client, transport };
}

describe("HTTP app", () => {
  it("redirects the root to the API docs", async () => {
    const res = await fetch(`${rootUrl}/`, { redirect: "manual" });
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("api/docs");
  });

  it("serves the REST API under /api", async () => {
    const res = await fetch(`${rootUrl}/api/health`);
    expect(res.status).toBe(200);
  });
});

describe("MCP over streamable HTTP", () => {
  it("gives each client its own session", async () => {
    const first = await connect();
    const second = await connect();

    expect(first.transport.sessionId).toBeTruthy();
    expect(second.transport.sessionId).toBeTruthy();
    expect(first.transport.sessionId).not.toBe(second.transport.sessionId);

    const { tools } = await second.client.listTools();
    expect(tools.map((t) => t.name)).toEqual(
      expect.arrayContaining(["list_devices", "reload_devices", "display_text", "gate_send_text", "send_raw_command"])
    );
    await expect(first.client.listTools()).resolves.toMatchObject({ tools: expect.any(Array) });
  });

  it("routes a tool call to the named device", async () => {
    const { client } = await connect();
    const result = await client.callTool({ name: "set_brightness", arguments: { device: "hallway", brightness: 30 } });

    expect(result).toMatchObject({ content: [{ type: "text", text: "OK on hallway" }] });
    expect(deviceHttp).toHaveBeenCalledTimes(1);
    expect(deviceHttp).toHaveBeenCalledWith("/post", '{"Command":"Channel/SetBrightness","Brightness":30}');
  });

  it("reports unsupported commands as tool errors", async () => {
    const { client } = await connect();
    const result = await client.callTool({ name: "gate_send_text", arguments: { lcdIndex: 0, text: "hi" } });

    expect(result).toMatchObject({
      isError: true,
      content: [
        {
          type: "text",
          text: 'Error: Command "gate-send-text" is not supported by single-panel devices [unsupported on office]',
        },
      ],
    });
    expect(deviceHttp).not.toHaveBeenCalled();
  });

  it("lists devices with reachability", async () => {
    const { client } = await connect();
    const result = await client.callTool({ name: "list_devices", arguments: {} });

    expect(result).toMatchObject({
      content: [
        {
          type: "text",
          text: [
            "Configured devices (first is the default):",
            "office — 10.0.0.5 — single-panel, 64px — reachable",
            "hallway — 10.0.0.9 — multi-panel, 128px — reachable",
          ].join("\n"),
        },
      ],
    });
  });

  it("reloads the device list", async () => {
    const { client } = await connect();
    const reload = await client.callTool({
      name: "reload_devices",
      arguments: { devices: [{ name: "lab", host: "10.0.0.40", device_type: "pixoo" }] },
    });
    expect(reload).toMatchObject({ content: [{ type: "text", text: "Loaded 1 device(s): lab" }] });

    const result = await client.callTool({ name: "screen_power", arguments: { on: true } });
    expect(result).toMatchObject({ content: [{ type: "text", text: "OK on lab" }] });
  });

  it("forgets a session once it is terminated", async () => {
    const { transport } = await connect();
    const sessionId = transport.sessionId ?? "";
    await transport.terminateSession();

    const res = await fetch(`${rootUrl}/mcp`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json, text/event-stream",
        "mcp-session-id": sessionId,
      },
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Bad Request: No valid session ID" },
      id: null,
    });
  });

  it("rejects session requests without a known session", async () => {
    const res = await fetch(`${rootUrl}/mcp`, { method: "GET", headers: { "mcp-session-id": "unknown" } });
    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Invalid or missing session ID");
  });
});
