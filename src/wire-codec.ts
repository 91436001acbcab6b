import { colord, extend } from "colord";
import names from "colord/plugins/names";
import { commandSchema, supportsCommand, type Command, type CommandInput, type CommandKind } from "./commands.ts";
import { InvalidFieldError, MalformedAckError, UnsupportedOperationError } from "./errors.ts";
import type { DeviceProfile, Resolution } from "./types.ts";

// CSS colour names ("red", "teal", ...) on top of hex/rgb/hsl strings
extend([names]);

export interface WirePayload {
  Command: string;
  [field: string]: unknown;
}

export interface WireFrame {
  readonly kind: CommandKind;
  readonly payload: WirePayload;
}

export interface Ack {
  ok: boolean;
  message: string;
  errorCode: number;
  data: Record<string, unknown>;
}

const DIRECTION = { left: 0, right: 1 } as const;
const ALIGN = { left: 1, center: 2, right: 3 } as const;
const CHANNEL = { faces: 0, cloud: 1, visualizer: 2, custom: 3 } as const;

// Device-side 16-bit millisecond fields
const MAX_DELAY_MS = 65535;

// Numbering restarts at 1 after Draw/ResetHttpGifId
const FIRST_PIC_ID = 1;

type TextCommand = Extract<Command, { kind: "display-text" | "gate-send-text" }>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseCommand(input: unknown): Command {
  const result = commandSchema.safeParse(input);
  if (result.success) return result.data;
  const [issue] = result.error.issues;
  const field = issue?.path.join(".") || "command";
  throw new InvalidFieldError(field, issue?.message ?? "invalid command");
}

/** Rounds and clamps a magnitude to the range the device accepts. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.round(value)));
}

export function toDeviceColor(value: string | number, field = "color"): string {
  if (typeof value === "number") {
    return `#${value.toString(16).padStart(6, "0").toUpperCase()}`;
  }
  const parsed = colord(value);
  if (!parsed.isValid()) {
    throw new InvalidFieldError(field, `"${value}" is not a valid colour`);
  }
  const { r, g, b } = parsed.toRgb();
  return `#${[r, g, b].map((c) => c.toString(16).padStart(2, "0")).join("").toUpperCase()}`;
}

/**
 * Packs one frame of RGB bytes as the device expects it: base64 of exactly
 * `resolution * resolution * 3` bytes, row-major. Array channel values are
 * clamped to 0-255.
 */
export function encodePixels(frame: string | number[], resolution: Resolution, field: string): string {
  const expected = resolution * resolution * 3;
  const bytes =
    typeof frame === "string"
      ? Buffer.from(frame, "base64")
      : Buffer.from(frame.map((v) => clamp(v, 0, 255)));
  if (bytes.length !== expected) {
    throw new InvalidFieldError(
      field,
      `expected ${expected} RGB bytes for a ${resolution}x${resolution} display, got ${bytes.length}`
    );
  }
  return bytes.toString("base64");
}

function checkCoordinate(field: string, value: number, resolution: Resolution): void {
  if (value < 0 || value >= resolution) {
    throw new InvalidFieldError(field, `${value} is outside 0..${resolution - 1}`);
  }
}

function textPayload(command: TextCommand, profile: DeviceProfile): Record<string, unknown> {
  checkCoordinate("x", command.x, profile.resolution);
  checkCoordinate("y", command.y, profile.resolution);
  return {
    TextId: command.textId,
    x: command.x,
    y: command.y,
    dir: DIRECTION[command.direction],
    font: command.font,
    TextWidth: command.textWidth,
    TextString: command.text,
    speed: clamp(command.speed, 0, MAX_DELAY_MS),
    color: toDeviceColor(command.color),
    align: ALIGN[command.align],
  };
}

function buildPayload(command: Command, profile: DeviceProfile): WirePayload {
  switch (command.kind) {
    case "display-text":
      return { Command: "Draw/SendHttpText", ...textPayload(command, profile) };

    case "gate-send-text":
      return {
        Command: "Draw/SendHttpText",
        LcdIndex: command.lcdIndex,
        ...textPayload(command, profile),
      };

    case "show-image-url":
      // FileType 2: the device downloads the file itself
      return { Command: "Device/PlayTFGif", FileType: 2, FileName: command.url };

    case "play-animation": {
      const speed = clamp(command.speed, 1, MAX_DELAY_MS);
      const frames = command.frames.map((frame, offset) => ({
        Command: "Draw/SendHttpGif",
        PicNum: command.frames.length,
        PicWidth: profile.resolution,
        PicOffset: offset,
        PicID: FIRST_PIC_ID,
        PicSpeed: speed,
        PicData: encodePixels(frame, profile.resolution, `frames.${offset}`),
      }));
      return {
        Command: "Draw/CommandList",
        CommandList: [{ Command: "Draw/ResetHttpGifId" }, ...frames],
      };
    }

    case "set-channel":
      return { Command: "Channel/SetIndex", SelectIndex: CHANNEL[command.channel] };

    case "gate-send-gif":
      if (command.picOffset >= command.picNum) {
        throw new InvalidFieldError("picOffset", `${command.picOffset} is not below picNum ${command.picNum}`);
      }
      return {
        Command: "Draw/SendHttpGif",
        LcdArray: command.lcdArray,
        PicNum: command.picNum,
        PicWidth: command.picWidth ?? profile.resolution,
        PicOffset: command.picOffset,
        PicID: command.picId,
        PicSpeed: clamp(command.picSpeed, 1, MAX_DELAY_MS),
        PicData: command.picData,
      };

    case "gate-play-gif":
      return { Command: "Device/PlayGif", LcdArray: command.lcdArray, FileName: command.fileNames };

    case "set-brightness":
      return { Command: "Channel/SetBrightness", Brightness: clamp(command.brightness, 0, 100) };

    case "screen-power":
      return { Command: "Channel/OnOffScreen", OnOff: command.on ? 1 : 0 };

    case "reset-gif-id":
      return { Command: "Draw/ResetHttpGifId" };

    case "command-list":
      return { Command: "Draw/CommandList", CommandList: command.commands };

    case "raw":
      return command.payload;
  }
}

/**
 * Validates a command against a device profile and builds the frame to POST.
 * Throws InvalidFieldError or UnsupportedOperationError; never touches the network.
 */
export function encode(input: CommandInput, profile: DeviceProfile): WireFrame {
  return encodeCommand(parseCommand(input), profile);
}

export function encodeCommand(command: Command, profile: DeviceProfile): WireFrame {
  if (!supportsCommand(profile.family, command.kind)) {
    throw new UnsupportedOperationError(command.kind, profile.family);
  }
  return { kind: command.kind, payload: buildPayload(command, profile) };
}

function pickMessage(body: Record<string, unknown>): string | undefined {
  for (const key of ["error_message", "ReturnMessage", "message"]) {
    const value = body[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

/**
 * Parses a device acknowledgement. A non-zero error_code is reported as
 * `ok: false` with the device's own message; only an unreadable envelope throws.
 */
export function decode(raw: string | Uint8Array): Ack {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (e) {
    throw new MalformedAckError(`Device acknowledgement is not JSON: ${text.slice(0, 80)}`, { cause: e });
  }
  if (!isRecord(body)) {
    throw new MalformedAckError("Device acknowledgement is not a JSON object");
  }
  const errorCode = body.error_code;
  if (typeof errorCode !== "number" || !Number.isInteger(errorCode)) {
    throw new MalformedAckError("Device acknowledgement has no numeric error_code");
  }
  const message = pickMessage(body);
  if (errorCode === 0) {
    return { ok: true, message: message ?? "OK", errorCode, data: body };
  }
  return {
    ok: false,
    message: message ?? `Device reported error code ${errorCode}`,
    errorCode,
    data: body,
  };
}
