import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  commandListSchema,
  displayTextSchema,
  gatePlayGifSchema,
  gateSendGifSchema,
  gateSendTextSchema,
  playAnimationSchema,
  rawCommandSchema,
  screenPowerSchema,
  setBrightnessSchema,
  setChannelSchema,
  showImageUrlSchema,
  type CommandKind,
} from "./commands.ts";
import { deviceEntrySchema, parseDeviceEntries, type DeviceDefaults } from "./config.ts";
import { describeError } from "./errors.ts";
import type { CommandDispatcher, DispatchResult } from "./dispatcher.ts";
import type { DeviceManager } from "./device-manager.ts";

const targetShape = {
  device: z.string().optional().describe("Device alias. Defaults to the first configured device."),
  host: z.string().optional().describe("Device IP. Takes precedence over the alias."),
};

// Helpers for tool responses
const ok = (text: string) => ({ content: [{ type: "text" as const, text }] });
const err = (text: string) => ({ content: [{ type: "text" as const, text: `Error: ${text}` }], isError: true });

function formatResult(result: DispatchResult) {
  const where = result.device ? ` on ${result.device}` : "";
  if (!result.ok) return err(`${result.message} [${result.outcome}${where}]`);
  const data = result.data ? `\n\n${JSON.stringify(result.data, null, 2)}` : "";
  return ok(`${result.message}${where}${data}`);
}

export function createMcpServer(
  deviceManager: DeviceManager,
  dispatcher: CommandDispatcher,
  defaults: DeviceDefaults
): McpServer {
  const server = new McpServer({
    name: "pixoo-lan-gateway",
    version: "1.0.0",
  });

  function commandTool(name: string, title: string, description: string, kind: CommandKind, shape: z.ZodRawShape) {
    server.registerTool(
      name,
      { title, description, inputSchema: { ...targetShape, ...shape } },
      async (args: Record<string, unknown>) => {
        const { device, host, ...payload } = args;
        const target = {
          device: typeof device === "string" ? device : undefined,
          host: typeof host === "string" ? host : undefined,
        };
        return formatResult(await dispatcher.dispatchPayload(target, kind, payload));
      }
    );
  }

  // ============================================
  // DEVICE MANAGEMENT TOOLS
  // ============================================

  server.registerTool(
    "list_devices",
    {
      title: "List Devices",
      description: "Show configured Pixoo / Time Gate devices with alias, IP, family, resolution and reachability.",
    },
    async () => {
      if (!deviceManager.ready) return err("Device registry is not initialized");
      const lines: string[] = [];
      for (const { profile, client } of deviceManager.current().listAll()) {
        const status = (await client.probe()) ? "reachable" : "unreachable";
        lines.push(
          `${profile.alias} — ${profile.ip} — ${profile.family}, ${profile.resolution}px${profile.reportedName ? ` (${profile.reportedName})` : ""} — ${status}`
        );
      }
      return ok(`Configured devices (first is the default):\n${lines.join("\n")}`);
    }
  );

  server.registerTool(
    "reload_devices",
    {
      title: "Reload Devices",
      description:
        "Replace the device list. Re-runs discovery and type detection; the previous list keeps serving if this fails.",
      inputSchema: { devices: z.array(deviceEntrySchema).min(1) },
    },
    async ({ devices }) => {
      try {
        const registry = await deviceManager.load(parseDeviceEntries(devices, defaults));
        return ok(`Loaded ${registry.size} device(s): ${registry.aliases().join(", ")}`);
      } catch (e) {
        return err(describeError(e));
      }
    }
  );

  // ============================================
  // PIXOO TOOLS
  // ============================================

  commandTool(
    "display_text",
    "Display Text",
    "Draw scrolling text on a Pixoo. The device only renders text over an animation layer; push one with play_animation first.",
    "display-text",
    displayTextSchema.omit({ kind: true }).shape
  );
  commandTool(
    "show_image",
    "Show Image",
    "Have a Pixoo download and play an image or GIF from a URL.",
    "show-image-url",
    showImageUrlSchema.omit({ kind: true }).shape
  );
  commandTool(
    "play_animation",
    "Play Animation",
    "Push 1-60 raw RGB frames (resolution*resolution*3 bytes each, base64 or number arrays) as an animation.",
    "play-animation",
    playAnimationSchema.omit({ kind: true }).shape
  );
  commandTool(
    "set_channel",
    "Set Channel",
    "Switch a Pixoo to the faces, cloud, visualizer or custom channel.",
    "set-channel",
    setChannelSchema.omit({ kind: true }).shape
  );

  // ============================================
  // TIME GATE TOOLS
  // ============================================

  commandTool(
    "gate_send_text",
    "Time Gate Text",
    "Scrolling text on one Time Gate screen (0-4). Requires an active animation: call gate_play_gif or gate_send_gif first.",
    "gate-send-text",
    gateSendTextSchema.omit({ kind: true }).shape
  );
  commandTool(
    "gate_send_gif",
    "Time Gate GIF Frame",
    "Send one base64 JPG frame of an animation to the selected Time Gate screens.",
    "gate-send-gif",
    gateSendGifSchema.omit({ kind: true }).shape
  );
  commandTool(
    "gate_play_gif",
    "Time Gate Play GIF",
    "Play GIFs from URLs on the selected Time Gate screens.",
    "gate-play-gif",
    gatePlayGifSchema.omit({ kind: true }).shape
  );

  // ============================================
  // COMMON TOOLS
  // ============================================

  commandTool(
    "set_brightness",
    "Set Brightness",
    "Set display brightness (0-100).",
    "set-brightness",
    setBrightnessSchema.omit({ kind: true }).shape
  );
  commandTool(
    "screen_power",
    "Screen Power",
    "Turn the screen on or off.",
    "screen-power",
    screenPowerSchema.omit({ kind: true }).shape
  );
  commandTool("reset_gif_id", "Reset GIF ID", "Reset the device's HTTP GIF cache.", "reset-gif-id", {});
  commandTool(
    "send_command_list",
    "Send Command List",
    "Send several raw command payloads in one Draw/CommandList request.",
    "command-list",
    commandListSchema.omit({ kind: true }).shape
  );
  commandTool(
    "send_raw_command",
    "Send Raw Command",
    "Send any command payload (an object with a Command field) and return the device's reply.",
    "raw",
    rawCommandSchema.omit({ kind: true }).shape
  );

  return server;
}
