import { Router, json, type NextFunction, type Request, type Response } from "express";
import { parseDeviceEntries, type DeviceDefaults } from "./config.ts";
import { GatewayError, describeError, type GatewayErrorCode } from "./errors.ts";
import { isRecord } from "./wire-codec.ts";
import type { CommandKind } from "./commands.ts";
import type { CommandDispatcher, DispatchResult } from "./dispatcher.ts";
import type { DeviceManager } from "./device-manager.ts";
import type { DeviceRegistry } from "./device-registry.ts";
import type { DeviceProfile, TargetRef } from "./types.ts";

interface CommandRoute {
  method: "post" | "put";
  path: string;
  kind: CommandKind;
  tag: "Pixoo" | "Time Gate" | "Common";
  summary: string;
  fields: Record<string, string>;
}

// One route per command kind; also drives the OpenAPI document below
export const COMMAND_ROUTES: readonly CommandRoute[] = [
  {
    method: "post",
    path: "/device/text",
    kind: "display-text",
    tag: "Pixoo",
    summary: "Draw scrolling text (Draw/SendHttpText)",
    fields: {
      text: "string, 1-512 chars (required)",
      x: "integer, 0..resolution-1",
      y: "integer, 0..resolution-1",
      color: "CSS colour or 24-bit integer (default #FFFFFF)",
      font: "integer 0-7",
      textWidth: "integer 16-64 (default 56)",
      speed: "ms per scroll step (default 10)",
      direction: "left | right",
      textId: "integer 0-19 (default 1)",
      align: "left | center | right",
    },
  },
  {
    method: "post",
    path: "/device/image",
    kind: "show-image-url",
    tag: "Pixoo",
    summary: "Play an image or GIF the device downloads itself (Device/PlayTFGif)",
    fields: { url: "http(s) URL (required)" },
  },
  {
    method: "post",
    path: "/device/animation",
    kind: "play-animation",
    tag: "Pixoo",
    summary: "Push 1-60 raw RGB frames as an animation (Draw/SendHttpGif)",
    fields: {
      frames: "array of frames, each base64 or an array of resolution*resolution*3 channel values",
      speed: "frame delay in ms (default 100)",
    },
  },
  {
    method: "put",
    path: "/device/channel",
    kind: "set-channel",
    tag: "Pixoo",
    summary: "Select a channel (Channel/SetIndex)",
    fields: { channel: "faces | cloud | visualizer | custom" },
  },
  {
    method: "put",
    path: "/device/brightness",
    kind: "set-brightness",
    tag: "Common",
    summary: "Set brightness (Channel/SetBrightness)",
    fields: { brightness: "0-100, clamped" },
  },
  {
    method: "put",
    path: "/device/screen",
    kind: "screen-power",
    tag: "Common",
    summary: "Switch the screen on or off (Channel/OnOffScreen)",
    fields: { on: "boolean" },
  },
  {
    method: "post",
    path: "/device/reset-gif-id",
    kind: "reset-gif-id",
    tag: "Common",
    summary: "Reset the HTTP GIF cache (Draw/ResetHttpGifId)",
    fields: {},
  },
  {
    method: "post",
    path: "/device/command-list",
    kind: "command-list",
    tag: "Common",
    summary: "Send several commands at once (Draw/CommandList)",
    fields: { commands: "array of objects, each with a Command field" },
  },
  {
    method: "post",
    path: "/device/command",
    kind: "raw",
    tag: "Common",
    summary: "Send a raw command payload and return the device reply",
    fields: { payload: "object with a Command field" },
  },
  {
    method: "post",
    path: "/timegate/send-text",
    kind: "gate-send-text",
    tag: "Time Gate",
    summary: "Scrolling text on one screen; needs an active animation layer (Draw/SendHttpText)",
    fields: {
      lcdIndex: "integer 0-4 (required)",
      text: "string, 1-512 chars (required)",
      x: "integer, 0..resolution-1",
      y: "integer, 0..resolution-1",
      color: "CSS colour or 24-bit integer",
      font: "integer 0-7",
      textWidth: "integer 16-64",
      speed: "ms per scroll step",
      direction: "left | right",
      textId: "integer 0-19",
      align: "left | center | right",
    },
  },
  {
    method: "post",
    path: "/timegate/send-gif",
    kind: "gate-send-gif",
    tag: "Time Gate",
    summary: "Send one GIF frame (Draw/SendHttpGif)",
    fields: {
      lcdArray: "5 values of 0/1 (default all 1)",
      picNum: "integer 1-60",
      picWidth: "16 | 32 | 64 | 128 (default device resolution)",
      picOffset: "integer, below picNum",
      picId: "integer >= 1",
      picSpeed: "frame delay in ms",
      picData: "base64 JPG data",
    },
  },
  {
    method: "post",
    path: "/timegate/play-gif",
    kind: "gate-play-gif",
    tag: "Time Gate",
    summary: "Play GIFs from URLs (Device/PlayGif)",
    fields: { lcdArray: "5 values of 0/1", fileNames: "array of GIF URLs" },
  },
];

const STATUS_BY_CODE: Partial<Record<GatewayErrorCode, number>> = {
  CONFIG_ERROR: 400,
  NO_VALID_DEVICES: 422,
  NO_DEVICE_FOUND: 422,
  DISCOVERY_FAILED: 502,
  DEVICE_NOT_FOUND: 404,
  REGISTRY_NOT_READY: 503,
};

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function profileView(profile: DeviceProfile) {
  return {
    alias: profile.alias,
    ip: profile.ip,
    family: profile.family,
    resolution: profile.resolution,
    autoDiscover: profile.autoDiscover,
    retryBudget: profile.retryBudget,
    debug: profile.debug,
    reportedName: profile.reportedName ?? null,
  };
}

function sendResult(res: Response, result: DispatchResult) {
  const { httpStatus, ...body } = result;
  res.status(httpStatus).json(body);
}

function sendError(res: Response, e: unknown) {
  if (e instanceof GatewayError) {
    res.status(STATUS_BY_CODE[e.code] ?? 500).json({ error: e.message, errorCode: e.code });
    return;
  }
  res.status(500).json({ error: describeError(e) });
}

async function listDevices(registry: DeviceRegistry) {
  return Promise.all(
    registry.listAll().map(async (d, index) => ({
      ...profileView(d.profile),
      default: index === 0,
      status: (await d.client.probe()) ? "reachable" : "unreachable",
    }))
  );
}

export function createRestApi(
  deviceManager: DeviceManager,
  dispatcher: CommandDispatcher,
  defaults: DeviceDefaults
): Router {
  const router = Router();
  // Animation frames travel inline as base64
  router.use(json({ limit: "5mb" }));

  function target(req: Request): TargetRef {
    return {
      device: queryString(req.query.device) ?? req.get("X-Pixoo-Device"),
      host: queryString(req.query.host) ?? req.get("X-Pixoo-Host"),
    };
  }

  // ==========================================
  // DEVICES
  // ==========================================

  router.get("/health", (_req, res) => {
    const ready = deviceManager.ready;
    res.status(ready ? 200 : 503).json({
      status: ready ? "healthy" : "starting",
      devices: ready ? deviceManager.current().size : 0,
      loadedAt: deviceManager.lastLoaded?.toISOString() ?? null,
    });
  });

  router.get("/devices", async (_req, res) => {
    try {
      res.json({ devices: await listDevices(deviceManager.current()) });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.put("/devices", async (req, res) => {
    const body: unknown = req.body;
    const raw = Array.isArray(body) ? body : isRecord(body) ? body.devices : undefined;
    try {
      const configs = parseDeviceEntries(raw, defaults);
      const registry = await deviceManager.load(configs);
      res.json({ devices: registry.listAll().map((d) => profileView(d.profile)) });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get("/device", (req, res) => {
    try {
      const device = deviceManager.current().resolveTarget(target(req));
      res.json(profileView(device.profile));
    } catch (e) {
      sendError(res, e);
    }
  });

  // ==========================================
  // COMMANDS
  // ==========================================

  for (const route of COMMAND_ROUTES) {
    const handler = async (req: Request, res: Response) => {
      sendResult(res, await dispatcher.dispatchPayload(target(req), route.kind, req.body));
    };
    if (route.method === "put") router.put(route.path, handler);
    else router.post(route.path, handler);
  }

  // ==========================================
  // OPENAPI SPEC & DOCS
  // ==========================================

  router.get("/openapi.json", (_req, res) => {
    res.json(openApiSpec);
  });

  router.get("/docs", (_req, res) => {
    res.type("html").send(SWAGGER_HTML);
  });

  // Unparseable JSON bodies get the same error shape as every other failure
  router.use((e: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isRecord(e) && e.type === "entity.parse.failed") {
      res.status(422).json({ error: `Invalid JSON body: ${describeError(e)}`, errorCode: "INVALID_FIELD" });
      return;
    }
    next(e);
  });

  return router;
}

// ==========================================
// OpenAPI 3.1 Specification
// ==========================================

const targetParams = [
  { name: "device", in: "query", required: false, schema: { type: "string" }, description: "Device alias (defaults to the first device)" },
  { name: "host", in: "query", required: false, schema: { type: "string" }, description: "Device IP; takes precedence over alias" },
  { name: "X-Pixoo-Device", in: "header", required: false, schema: { type: "string" } },
  { name: "X-Pixoo-Host", in: "header", required: false, schema: { type: "string" } },
];

const resultRef = { $ref: "#/components/schemas/Result" };
const errRef = { $ref: "#/components/schemas/Error" };
const resultResponse = (description: string) => ({
  description,
  content: { "application/json": { schema: resultRef } },
});
const errResponse = (description: string) => ({
  description,
  content: { "application/json": { schema: errRef } },
});

const commandResponses = {
  "200": resultResponse("Delivered; ok=false when the device rejected the command"),
  "400": resultResponse("Command not supported by this device family"),
  "404": resultResponse("Device not found"),
  "422": resultResponse("Invalid field"),
  "502": resultResponse("Device unreachable or unreadable reply"),
  "503": resultResponse("Registry not ready"),
};

const commandPaths: Record<string, Record<string, unknown>> = {};
for (const route of COMMAND_ROUTES) {
  commandPaths[route.path] = {
    [route.method]: {
      tags: [route.tag],
      summary: route.summary,
      operationId: route.kind,
      parameters: targetParams,
      requestBody: {
        required: Object.keys(route.fields).length > 0,
        content: {
          "application/json": {
            schema: {
              type: "object",
              properties: Object.fromEntries(
                Object.entries(route.fields).map(([name, description]) => [name, { description }])
              ),
            },
          },
        },
      },
      responses: commandResponses,
    },
  };
}

const openApiSpec = {
  openapi: "3.1.0",
  info: {
    title: "Pixoo LAN Gateway",
    version: "1.0.0",
    description: "REST API for Divoom Pixoo and Time Gate displays on the local network.",
  },
  servers: [{ url: "/api" }],
  components: {
    schemas: {
      Result: {
        type: "object",
        properties: {
          ok: { type: "boolean" },
          message: { type: "string" },
          outcome: {
            type: "string",
            enum: ["ok", "device-error", "malformed-ack", "invalid-request", "unsupported", "not-found", "not-ready", "unreachable", "internal"],
          },
          errorCode: { type: "string" },
          device: { type: "string" },
          data: { type: "object" },
        },
      },
      Error: {
        type: "object",
        properties: { error: { type: "string" }, errorCode: { type: "string" } },
      },
    },
  },
  paths: {
    "/health": {
      get: { tags: ["Devices"], summary: "Health check", operationId: "health", responses: { "200": { description: "Healthy" }, "503": { description: "Starting" } } },
    },
    "/devices": {
      get: {
        tags: ["Devices"],
        summary: "List configured devices with reachability",
        operationId: "listDevices",
        responses: { "200": { description: "Devices" }, "503": errResponse("Registry not ready") },
      },
      put: {
        tags: ["Devices"],
        summary: "Replace the device list (re-runs discovery and classification)",
        operationId: "reloadDevices",
        requestBody: {
          required: true,
          content: {
            "application/json": {
              schema: {
                type: "object",
                properties: {
                  devices: {
                    type: "array",
                    items: {
                      type: "object",
                      properties: {
                        name: { type: "string" },
                        host: { type: "string" },
                        host_auto: { type: "boolean" },
                        device_type: { type: "string", enum: ["auto", "pixoo", "time_gate"] },
                        screen_size: { type: "integer" },
                        debug: { type: "boolean" },
                        connection_retries: { type: "integer", minimum: 1, maximum: 30 },
                      },
                    },
                  },
                },
              },
            },
          },
        },
        responses: {
          "200": { description: "New device list" },
          "400": errResponse("Invalid configuration"),
          "422": errResponse("No valid devices"),
          "502": errResponse("Discovery service failed"),
        },
      },
    },
    "/device": {
      get: {
        tags: ["Devices"],
        summary: "Show the profile a request would be routed to",
        operationId: "getDevice",
        parameters: targetParams,
        responses: { "200": { description: "Device profile" }, "404": errResponse("Device not found") },
      },
    },
    ...commandPaths,
  },
};

const SWAGGER_HTML = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Pixoo LAN Gateway</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css">
  <style>body{margin:0}</style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
  <script>SwaggerUIBundle({url:'./openapi.json',dom_id:'#swagger-ui',deepLinking:true})</script>
</body>
</html>`;
