import {
  ConfigError,
  DiscoveryFailedError,
  NoDeviceFoundError,
  describeError,
} from "./errors.ts";
import { isTimeGateName, normalizeDeviceName } from "./discovery.ts";
import {
  MULTI_PANEL_MIN_RESOLUTION,
  SINGLE_PANEL_RESOLUTIONS,
  type DeviceConfig,
  type DeviceFamily,
  type DeviceProfile,
  type Diagnostics,
  type DiscoveryFetcher,
  type DiscoveryRecord,
  type Resolution,
} from "./types.ts";

export interface ClassifyContext {
  discover: DiscoveryFetcher;
  /** IPs already taken by earlier entries of the same registration pass. */
  claimedIps: ReadonlySet<string>;
  diagnostics: Diagnostics;
}

function label(config: DeviceConfig): string {
  return config.name ?? config.host ?? "(unnamed device)";
}

export function matchDiscoveryRecord(
  records: readonly DiscoveryRecord[],
  name: string | undefined,
  claimedIps: ReadonlySet<string>
): DiscoveryRecord | undefined {
  if (name) {
    const wanted = normalizeDeviceName(name);
    const byName = records.find((r) => normalizeDeviceName(r.deviceName) === wanted);
    if (byName) return byName;
  }
  return records.find((r) => !claimedIps.has(r.privateIp));
}

export function clampResolution(family: DeviceFamily, configured: number, device = "device"): Resolution {
  if (family === "multi-panel") {
    if (configured <= MULTI_PANEL_MIN_RESOLUTION) return MULTI_PANEL_MIN_RESOLUTION;
    throw new ConfigError(
      `${device}: resolution ${configured} is not supported by multi-panel devices (max ${MULTI_PANEL_MIN_RESOLUTION})`
    );
  }
  const supported = SINGLE_PANEL_RESOLUTIONS.find((r) => r === configured);
  if (supported === undefined) {
    throw new ConfigError(
      `${device}: resolution ${configured} is not one of ${SINGLE_PANEL_RESOLUTIONS.join(", ")}`
    );
  }
  return supported;
}

function detectFamily(
  config: DeviceConfig,
  ip: string,
  record: DiscoveryRecord | undefined,
  diagnostics: Diagnostics
): DeviceFamily {
  if (config.family === "pixoo") return "single-panel";
  if (config.family === "time_gate") return "multi-panel";

  if (!record?.deviceName) {
    diagnostics.warn(`Could not detect device type for ${ip}; defaulting to single-panel`);
    return "single-panel";
  }
  const family = isTimeGateName(record.deviceName) ? "multi-panel" : "single-panel";
  diagnostics.info(`Detected device type for ${ip}: ${family} (${record.deviceName})`);
  return family;
}

/**
 * Resolves a configured device to a concrete profile: IP (from config or the
 * discovery service), family and resolution. Only auto-discovered entries
 * call the fetcher.
 */
export async function classifyDevice(config: DeviceConfig, ctx: ClassifyContext): Promise<DeviceProfile> {
  let ip = config.host?.trim() ?? "";
  let record: DiscoveryRecord | undefined;

  if (config.autoDiscover) {
    let records: DiscoveryRecord[];
    try {
      records = await ctx.discover();
    } catch (e) {
      if (e instanceof DiscoveryFailedError) throw e;
      throw new DiscoveryFailedError(`Discovery failed: ${describeError(e)}`, { cause: e });
    }
    record = matchDiscoveryRecord(records, config.name, ctx.claimedIps);
    if (!record) {
      throw new NoDeviceFoundError(
        records.length === 0
          ? `No device found on the local network for ${label(config)}`
          : `All discovered devices are already claimed; none left for ${label(config)}`
      );
    }
    ip = record.privateIp;
    ctx.diagnostics.info(`Auto-detected device host for ${label(config)}: ${ip}`);
  } else if (!ip) {
    throw new ConfigError(`Device ${label(config)}: host is required when auto-discovery is disabled`);
  }

  const family = detectFamily(config, ip, record, ctx.diagnostics);
  const resolution = clampResolution(family, config.resolution, label(config));

  return {
    alias: config.name ?? ip,
    name: config.name,
    ip,
    family,
    resolution,
    autoDiscover: config.autoDiscover,
    retryBudget: config.retryBudget,
    debug: config.debug,
    reportedName: record?.deviceName || undefined,
  };
}
