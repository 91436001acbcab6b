import { z } from "zod";
import { DISCOVERY_URL } from "./discovery.ts";
import { ConfigError } from "./errors.ts";
import { DEFAULT_RETRY_DELAY_MS, DEFAULT_TIMEOUT_MS } from "./pixoo-client.ts";
import type { DeviceConfig, FamilyHint } from "./types.ts";

const TRUTHY = ["1", "true", "yes", "y", "on"];

const booleanish = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "boolean" ? v : TRUTHY.includes(v.trim().toLowerCase())));

export function normalizeFamilyHint(value: string | undefined): FamilyHint {
  const normalized = (value ?? "pixoo").trim().toLowerCase().replace(/[-\s]/g, "_");
  if (normalized === "timegate" || normalized === "time_gate") return "time_gate";
  if (normalized === "auto") return "auto";
  return "pixoo";
}

const familyHint = z.string().transform(normalizeFamilyHint);
const retryBudget = z.coerce.number().int().min(1).max(30);
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v?.trim() || undefined);

export const deviceEntrySchema = z.object({
  name: optionalText,
  host: optionalText,
  host_auto: booleanish.nullish(),
  device_type: familyHint.nullish(),
  screen_size: z.coerce.number().int().nullish(),
  debug: booleanish.nullish(),
  connection_retries: retryBudget.nullish(),
});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  PIXOO_DEVICES: z.string().optional(),
  PIXOO_HOST: optionalText,
  PIXOO_HOST_AUTO: booleanish.default(false),
  PIXOO_DEVICE_TYPE: familyHint.default("auto"),
  PIXOO_SCREEN_SIZE: z.coerce.number().int().default(64),
  PIXOO_DEBUG: booleanish.default(false),
  PIXOO_CONNECTION_RETRIES: retryBudget.default(10),
  PIXOO_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  PIXOO_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
  PIXOO_DISCOVERY_URL: z.string().url().default(DISCOVERY_URL),
});

export interface DeviceDefaults {
  family: FamilyHint;
  resolution: number;
  debug: boolean;
  retryBudget: number;
}

export interface GatewayConfig {
  port: number;
  devices: DeviceConfig[];
  defaults: DeviceDefaults;
  timeoutMs: number;
  retryDelayMs: number;
  discoveryUrl: string;
}

export const BUILTIN_DEFAULTS: DeviceDefaults = {
  family: "auto",
  resolution: 64,
  debug: false,
  retryBudget: 10,
};

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "value"}: ${i.message}`).join("; ");
}

/** Validates a raw device list (as found in PIXOO_DEVICES or a reload request). */
export function parseDeviceEntries(raw: unknown, defaults: DeviceDefaults = BUILTIN_DEFAULTS): DeviceConfig[] {
  const parsed = z.array(deviceEntrySchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid device list: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.map((entry) => ({
    name: entry.name,
    host: entry.host,
    autoDiscover: entry.host_auto ?? false,
    family: entry.device_type ?? defaults.family,
    resolution: entry.screen_size ?? defaults.resolution,
    debug: entry.debug ?? defaults.debug,
    retryBudget: entry.connection_retries ?? defaults.retryBudget,
  }));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;
  const defaults: DeviceDefaults = {
    family: e.PIXOO_DEVICE_TYPE,
    resolution: e.PIXOO_SCREEN_SIZE,
    debug: e.PIXOO_DEBUG,
    retryBudget: e.PIXOO_CONNECTION_RETRIES,
  };

  let devices: DeviceConfig[] = [];
  if (e.PIXOO_DEVICES?.trim()) {
    let raw: unknown;
    try {
      raw = JSON.parse(e.PIXOO_DEVICES);
    } catch (err) {
      throw new ConfigError("PIXOO_DEVICES is not valid JSON", { cause: err });
    }
    if (!Array.isArray(raw)) {
      throw new ConfigError("PIXOO_DEVICES must be a JSON array");
    }
    devices = parseDeviceEntries(raw, defaults);
  }

  // Single-device mode
  if (devices.length === 0) {
    devices = [
      {
        host: e.PIXOO_HOST,
        autoDiscover: e.PIXOO_HOST_AUTO,
        family: defaults.family,
        resolution: defaults.resolution,
        debug: defaults.debug,
        retryBudget: defaults.retryBudget,
      },
    ];
  }

  return {
    port: e.PORT,
    devices,
    defaults,
    timeoutMs: e.PIXOO_TIMEOUT_MS,
    retryDelayMs: e.PIXOO_RETRY_DELAY_MS,
    discoveryUrl: e.PIXOO_DISCOVERY_URL,
  };
}
