import { z } from "zod";
import type { DeviceFamily } from "./types.ts";

// Anything colord can parse, or a 24-bit RGB integer
export const colorSchema = z.union([z.string().min(1), z.number().int().min(0).max(0xffffff)]);

const lcdArraySchema = z
  .array(z.union([z.literal(0), z.literal(1)]))
  .length(5)
  .default([1, 1, 1, 1, 1])
  .describe("Target screens, 5 values of 0/1");

const base64Schema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9+/]+={0,2}$/, "must be base64")
  .refine((s) => s.length % 4 === 0, "must be padded base64");

// RGB bytes either as base64 or as a flat array of channel values
const pixelFrameSchema = z.union([base64Schema, z.array(z.number()).min(3)]);

const textFields = {
  text: z.string().min(1).max(512),
  x: z.number().int().default(0).describe("Start X position"),
  y: z.number().int().default(0).describe("Start Y position"),
  color: colorSchema.default("#FFFFFF"),
  font: z.number().int().min(0).max(7).default(0),
  textWidth: z.number().int().min(16).max(64).default(56),
  speed: z.number().default(10).describe("Scroll speed in ms per step"),
  direction: z.enum(["left", "right"]).default("left"),
  textId: z.number().int().min(0).max(19).default(1),
  align: z.enum(["left", "center", "right"]).default("left"),
};

export const displayTextSchema = z.object({
  kind: z.literal("display-text"),
  ...textFields,
});

export const showImageUrlSchema = z.object({
  kind: z.literal("show-image-url"),
  url: z.string().trim().url(),
});

export const playAnimationSchema = z.object({
  kind: z.literal("play-animation"),
  frames: z.array(pixelFrameSchema).min(1).max(60),
  speed: z.number().default(100).describe("Frame delay in ms"),
});

export const setChannelSchema = z.object({
  kind: z.literal("set-channel"),
  channel: z.enum(["faces", "cloud", "visualizer", "custom"]),
});

export const gateSendTextSchema = z.object({
  kind: z.literal("gate-send-text"),
  lcdIndex: z.number().int().min(0).max(4),
  ...textFields,
});

export const gateSendGifSchema = z.object({
  kind: z.literal("gate-send-gif"),
  lcdArray: lcdArraySchema,
  picNum: z.number().int().min(1).max(60),
  picWidth: z.union([z.literal(16), z.literal(32), z.literal(64), z.literal(128)]).optional(),
  picOffset: z.number().int().min(0),
  picId: z.number().int().min(1),
  picSpeed: z.number(),
  picData: base64Schema.describe("Base64-encoded JPG data"),
});

export const gatePlayGifSchema = z.object({
  kind: z.literal("gate-play-gif"),
  lcdArray: lcdArraySchema,
  fileNames: z.array(z.string().trim().url()).min(1),
});

export const setBrightnessSchema = z.object({
  kind: z.literal("set-brightness"),
  brightness: z.number(),
});

export const screenPowerSchema = z.object({
  kind: z.literal("screen-power"),
  on: z.boolean(),
});

export const resetGifIdSchema = z.object({
  kind: z.literal("reset-gif-id"),
});

const wirePayloadSchema = z.object({ Command: z.string().min(1) }).passthrough();

export const commandListSchema = z.object({
  kind: z.literal("command-list"),
  commands: z.array(wirePayloadSchema).min(1),
});

export const rawCommandSchema = z.object({
  kind: z.literal("raw"),
  payload: wirePayloadSchema,
});

export const commandSchema = z.discriminatedUnion("kind", [
  displayTextSchema,
  showImageUrlSchema,
  playAnimationSchema,
  setChannelSchema,
  gateSendTextSchema,
  gateSendGifSchema,
  gatePlayGifSchema,
  setBrightnessSchema,
  screenPowerSchema,
  resetGifIdSchema,
  commandListSchema,
  rawCommandSchema,
]);

/** A command after validation, with defaults filled in. */
export type Command = z.output<typeof commandSchema>;
/** A command as callers write it; optional fields may be left out. */
export type CommandInput = z.input<typeof commandSchema>;
export type CommandKind = Command["kind"];

const BOTH: readonly DeviceFamily[] = ["single-panel", "multi-panel"];
const SINGLE: readonly DeviceFamily[] = ["single-panel"];
const MULTI: readonly DeviceFamily[] = ["multi-panel"];

export const COMMAND_FAMILIES: Record<CommandKind, readonly DeviceFamily[]> = {
  "display-text": SINGLE,
  "show-image-url": SINGLE,
  "play-animation": SINGLE,
  "set-channel": SINGLE,
  "gate-send-text": MULTI,
  "gate-send-gif": MULTI,
  "gate-play-gif": MULTI,
  "set-brightness": BOTH,
  "screen-power": BOTH,
  "reset-gif-id": BOTH,
  "command-list": BOTH,
  raw: BOTH,
};

export function supportsCommand(family: DeviceFamily, kind: CommandKind): boolean {
  return COMMAND_FAMILIES[kind].includes(family);
}
