import { classifyDevice } from "./classifier.ts";
import { PixooClient, type PixooClientOptions } from "./pixoo-client.ts";
import {
  DeviceNotFoundError,
  NoDeviceFoundError,
  NoValidDevicesError,
} from "./errors.ts";
import {
  consoleDiagnostics,
  type DeviceConfig,
  type DeviceProfile,
  type Diagnostics,
  type DiscoveryFetcher,
  type DiscoveryRecord,
  type TargetRef,
} from "./types.ts";

export interface RegisteredDevice {
  readonly profile: DeviceProfile;
  readonly client: PixooClient;
}

export interface RegisterOptions {
  discover: DiscoveryFetcher;
  diagnostics?: Diagnostics;
  client?: PixooClientOptions;
}

// The fetcher runs at most once per registration pass, failure included
function once(fetch: DiscoveryFetcher): DiscoveryFetcher {
  let pending: Promise<DiscoveryRecord[]> | undefined;
  return () => (pending ??= fetch());
}

export function uniqueAlias(alias: string, taken: Set<string>): string {
  let candidate = alias;
  let suffix = 2;
  while (taken.has(candidate.toLowerCase())) {
    candidate = `${alias}-${suffix++}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Immutable set of resolved devices. Build a new one with `register` to
 * change the device list; lookups never observe a partial update.
 */
export class DeviceRegistry {
  private readonly byAlias = new Map<string, RegisteredDevice>();
  private readonly byIp = new Map<string, RegisteredDevice>();

  private constructor(private readonly devices: readonly RegisteredDevice[]) {
    for (const device of devices) {
      this.byAlias.set(device.profile.alias.toLowerCase(), device);
      if (!this.byIp.has(device.profile.ip)) this.byIp.set(device.profile.ip, device);
    }
  }

  static async register(configs: readonly DeviceConfig[], options: RegisterOptions): Promise<DeviceRegistry> {
    if (configs.length === 0) {
      throw new NoValidDevicesError("No devices configured");
    }
    const diagnostics = options.diagnostics ?? consoleDiagnostics;
    const discover = once(options.discover);
    const claimedIps = new Set<string>();
    const aliases = new Set<string>();
    const devices: RegisteredDevice[] = [];
    const failures: NoDeviceFoundError[] = [];

    for (const config of configs) {
      let resolved: DeviceProfile;
      try {
        resolved = await classifyDevice(config, { discover, claimedIps, diagnostics });
      } catch (e) {
        // Config and discovery-service failures abort the whole pass
        if (!(e instanceof NoDeviceFoundError)) throw e;
        diagnostics.warn(e.message);
        failures.push(e);
        continue;
      }
      claimedIps.add(resolved.ip);
      const profile: DeviceProfile = { ...resolved, alias: uniqueAlias(resolved.alias, aliases) };
      devices.push({ profile, client: new PixooClient(profile, options.client) });
    }

    if (devices.length === 0) {
      throw new NoValidDevicesError("No valid devices could be resolved", failures);
    }
    return new DeviceRegistry(devices);
  }

  /** First successfully resolved device. */
  get defaultDevice(): RegisteredDevice {
    return this.devices[0];
  }

  /**
   * IP match first, then alias (case-insensitive), then the default device
   * when no reference is given.
   */
  resolveTarget(target: TargetRef = {}): RegisteredDevice {
    const host = target.host?.trim();
    const alias = target.device?.trim();

    if (host) {
      const byIp = this.byIp.get(host);
      if (byIp) return byIp;
    }
    if (alias) {
      const byAlias = this.byAlias.get(alias.toLowerCase());
      if (byAlias) return byAlias;
    }
    if (host || alias) {
      throw new DeviceNotFoundError(host || alias || "", this.aliases());
    }
    return this.defaultDevice;
  }

  listAll(): readonly RegisteredDevice[] {
    return this.devices;
  }

  aliases(): string[] {
    return this.devices.map((d) => d.profile.alias);
  }

  get size(): number {
    return this.devices.length;
  }
}
