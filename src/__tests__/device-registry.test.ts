import { describe, it, expect, vi } from "vitest";
import { DeviceRegistry, uniqueAlias, type RegisterOptions } from "../device-registry.ts";
import { DeviceManager } from "../device-manager.ts";
import {
  ConfigError,
  DeviceNotFoundError,
  DiscoveryFailedError,
  NoValidDevicesError,
  RegistryNotReadyError,
} from "../errors.ts";
import type { DeviceConfig, DiscoveryRecord } from "../types.ts";

function config(overrides: Partial<DeviceConfig> = {}): DeviceConfig {
  return {
    autoDiscover: false,
    family: "auto",
    resolution: 64,
    debug: false,
    retryBudget: 3,
    ...overrides,
  };
}

function options(found: DiscoveryRecord[] = []) {
  const discover = vi.fn(async () => found);
  const diagnostics = { info: vi.fn(), warn: vi.fn() };
  const opts: RegisterOptions = { discover, diagnostics };
  return { opts, discover, diagnostics };
}

describe("DeviceRegistry.register", () => {
  it("resolves a mixed manual and auto-discovered setup", async () => {
    const { opts } = options([{ deviceName: "Hallway TimeGate", privateIp: "10.0.0.9" }]);
    const registry = await DeviceRegistry.register(
      [
        config({ name: "office", host: "10.0.0.5", family: "pixoo", resolution: 64 }),
        config({ name: "hallway", autoDiscover: true, family: "auto" }),
      ],
      opts
    );

    const hallway = registry.resolveTarget({ device: "hallway" }).profile;
    expect(hallway.ip).toBe("10.0.0.9");
    expect(hallway.family).toBe("multi-panel");
    expect(hallway.resolution).toBe(128);

    const fallback = registry.resolveTarget({}).profile;
    expect(fallback.alias).toBe("office");
    expect(fallback.ip).toBe("10.0.0.5");
  });

  it("never gives two unnamed auto entries the same IP", async () => {
    const { opts } = options([
      { deviceName: "Pixoo A", privateIp: "10.0.0.20" },
      { deviceName: "Pixoo B", privateIp: "10.0.0.21" },
    ]);
    const registry = await DeviceRegistry.register(
      [config({ autoDiscover: true }), config({ autoDiscover: true })],
      opts
    );
    expect(registry.listAll().map((d) => d.profile.ip)).toEqual(["10.0.0.20", "10.0.0.21"]);
  });

  it("skips discovered IPs that a manual entry already uses", async () => {
    const { opts } = options([
      { deviceName: "Pixoo A", privateIp: "10.0.0.20" },
      { deviceName: "Pixoo B", privateIp: "10.0.0.21" },
    ]);
    const registry = await DeviceRegistry.register(
      [config({ host: "10.0.0.20" }), config({ autoDiscover: true })],
      opts
    );
    expect(registry.listAll()[1].profile.ip).toBe("10.0.0.21");
  });

  it("fetches the discovery list once per pass", async () => {
    const { opts, discover } = options([
      { deviceName: "Pixoo A", privateIp: "10.0.0.20" },
      { deviceName: "Pixoo B", privateIp: "10.0.0.21" },
    ]);
    await DeviceRegistry.register([config({ autoDiscover: true }), config({ autoDiscover: true })], opts);
    expect(discover).toHaveBeenCalledTimes(1);
  });

  it("suffixes duplicate aliases", async () => {
    const { opts } = options();
    const registry = await DeviceRegistry.register(
      [config({ name: "desk", host: "10.0.0.1" }), config({ name: "Desk", host: "10.0.0.2" }), config({ name: "desk", host: "10.0.0.3" })],
      opts
    );
    expect(registry.aliases()).toEqual(["desk", "Desk-2", "desk-3"]);
  });

  it("skips entries with no device and keeps the rest", async () => {
    const { opts, diagnostics } = options([{ deviceName: "Pixoo A", privateIp: "10.0.0.20" }]);
    const registry = await DeviceRegistry.register(
      [config({ autoDiscover: true }), config({ autoDiscover: true }), config({ name: "tv", host: "10.0.0.30" })],
      opts
    );
    expect(registry.aliases()).toEqual(["10.0.0.20", "tv"]);
    expect(diagnostics.warn).toHaveBeenCalledWith(
      "All discovered devices are already claimed; none left for (unnamed device)"
    );
  });

  it("fails with NoValidDevices for an empty list", async () => {
    await expect(DeviceRegistry.register([], options().opts)).rejects.toBeInstanceOf(NoValidDevicesError);
  });

  it("fails with NoValidDevices when every entry fails to resolve", async () => {
    const error = await DeviceRegistry.register([config({ autoDiscover: true })], options([]).opts).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(NoValidDevicesError);
    if (error instanceof NoValidDevicesError) expect(error.failures).toHaveLength(1);
  });

  it("aborts on configuration errors", async () => {
    await expect(
      DeviceRegistry.register([config({ name: "ok", host: "10.0.0.1" }), config({ name: "broken" })], options().opts)
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("aborts when required discovery fails", async () => {
    const { opts, discover } = options();
    discover.mockRejectedValue(new DiscoveryFailedError("offline"));
    await expect(
      DeviceRegistry.register([config({ host: "10.0.0.1" }), config({ autoDiscover: true })], opts)
    ).rejects.toBeInstanceOf(DiscoveryFailedError);
  });
});

describe("DeviceRegistry.resolveTarget", () => {
  async function registry() {
    return DeviceRegistry.register(
      [config({ name: "office", host: "10.0.0.5" }), config({ name: "Bedroom", host: "10.0.0.6" })],
      options().opts
    );
  }

  it("prefers an IP match over the alias", async () => {
    const r = await registry();
    expect(r.resolveTarget({ device: "office", host: "10.0.0.6" }).profile.alias).toBe("Bedroom");
  });

  it("matches aliases case-insensitively", async () => {
    const r = await registry();
    expect(r.resolveTarget({ device: "bedroom" }).profile.ip).toBe("10.0.0.6");
  });

  it("falls back to the alias when the IP is unknown", async () => {
    const r = await registry();
    expect(r.resolveTarget({ device: "bedroom", host: "10.0.0.99" }).profile.alias).toBe("Bedroom");
  });

  it("throws DeviceNotFound for unknown references", async () => {
    const r = await registry();
    expect(() => r.resolveTarget({ device: "garage" })).toThrow(DeviceNotFoundError);
    expect(() => r.resolveTarget({ host: "10.0.0.99" })).toThrow(
      'Device "10.0.0.99" not found. Available: office, Bedroom'
    );
  });
});

describe("uniqueAlias", () => {
  it("counts upwards past taken suffixes", () => {
    const taken = new Set(["lamp", "lamp-2"]);
    expect(uniqueAlias("lamp", taken)).toBe("lamp-3");
    expect(taken.has("lamp-3")).toBe(true);
  });
});

describe("DeviceManager", () => {
  it("is not ready before the first load", () => {
    const manager = new DeviceManager(options().opts);
    expect(manager.ready).toBe(false);
    expect(() => manager.current()).toThrow(RegistryNotReadyError);
  });

  it("swaps in a new registry on reload", async () => {
    const manager = new DeviceManager(options().opts);
    const first = await manager.load([config({ name: "office", host: "10.0.0.5" })]);
    const second = await manager.load([config({ name: "lab", host: "10.0.0.40" })]);
    expect(second).not.toBe(first);
    expect(manager.current()).toBe(second);
    expect(first.aliases()).toEqual(["office"]);
  });

  it("keeps the most recently requested list when reloads overlap", async () => {
    let release: (records: DiscoveryRecord[]) => void = () => {};
    const discover = vi.fn(
      () =>
        new Promise<DiscoveryRecord[]>((resolve) => {
          release = resolve;
        })
    );
    const manager = new DeviceManager({ discover, diagnostics: { info: vi.fn(), warn: vi.fn() } });

    const slow = manager.load([config({ name: "old", autoDiscover: true })]);
    const fast = await manager.load([config({ name: "new", host: "10.0.0.2" })]);
    release([{ deviceName: "old", privateIp: "10.0.0.1" }]);
    const stale = await slow;

    expect(stale.aliases()).toEqual(["old"]);
    expect(manager.current()).toBe(fast);
    expect(manager.current().aliases()).toEqual(["new"]);
  });

  it("keeps the previous registry when a reload fails", async () => {
    const manager = new DeviceManager(options().opts);
    const first = await manager.load([config({ name: "office", host: "10.0.0.5" })]);
    await expect(manager.load([config({ name: "broken" })])).rejects.toBeInstanceOf(ConfigError);
    expect(manager.current()).toBe(first);
  });
});
