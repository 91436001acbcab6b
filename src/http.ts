import express, { type Request } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { randomUUID } from "node:crypto";
import { createRestApi } from "./rest-api.ts";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DeviceDefaults } from "./config.ts";
import type { CommandDispatcher } from "./dispatcher.ts";
import type { DeviceManager } from "./device-manager.ts";

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

// One McpServer per session: a server instance binds to a single transport
export type McpServerFactory = () => McpServer;

export function createHttpApp(
  createServer: McpServerFactory,
  deviceManager: DeviceManager,
  dispatcher: CommandDispatcher,
  defaults: DeviceDefaults
) {
  const transports: Record<string, StreamableHTTPServerTransport> = {};
  const app = express();

  app.use("/api", createRestApi(deviceManager, dispatcher, defaults));

  app.get("/", (_req, res) => {
    res.redirect("api/docs");
  });

  app.post("/mcp", express.json({ limit: "5mb" }), async (req, res) => {
    const sessionId = sessionIdOf(req);

    try {
      if (sessionId && transports[sessionId]) {
        await transports[sessionId].handleRequest(req, res, req.body);
      } else if (!sessionId && isInitializeRequest(req.body)) {
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            transports[sid] = transport;
          },
        });
        // The server detaches itself when its transport closes
        const server = createServer();
        transport.onclose = () => {
          if (transport.sessionId) delete transports[transport.sessionId];
        };
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } else {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID" },
          id: null,
        });
      }
    } catch (e) {
      console.error("[pixoo-gateway] MCP request failed:", e);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const sessionRequest = async (req: Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    if (!sessionId || !transports[sessionId]) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transports[sessionId].handleRequest(req, res);
  };
  app.get("/mcp", sessionRequest);
  app.delete("/mcp", sessionRequest);

  return app;
}

export async function startHttp(
  createServer: McpServerFactory,
  deviceManager: DeviceManager,
  dispatcher: CommandDispatcher,
  defaults: DeviceDefaults,
  port: number
) {
  const app = createHttpApp(createServer, deviceManager, dispatcher, defaults);

  app.listen(port, () => {
    console.log(`Pixoo gateway running on http://0.0.0.0:${port}`);
    console.log(`REST API:   http://0.0.0.0:${port}/api`);
    console.log(`Swagger UI: http://0.0.0.0:${port}/api/docs`);
    console.log(`MCP:        http://0.0.0.0:${port}/mcp`);
    const devices = deviceManager.current().listAll();
    console.log(`Registered devices (${devices.length}):`);
    for (const { profile } of devices) {
      console.log(
        `  ${profile.alias} — ${profile.ip} — ${profile.family}, ${profile.resolution}px${profile.reportedName ? ` (${profile.reportedName})` : ""}`
      );
    }
  });
}
