import { DeviceRegistry, type RegisterOptions } from "./device-registry.ts";
import { RegistryNotReadyError } from "./errors.ts";
import type { DeviceConfig } from "./types.ts";

/**
 * Owns the live DeviceRegistry. Loading builds a complete new registry
 * first and swaps the reference only on success, so a failed reload
 * leaves the previous device list serving. When loads overlap, the one
 * requested last wins regardless of which finishes first.
 */
export class DeviceManager {
  private registry: DeviceRegistry | null = null;
  private loadedAt: Date | null = null;
  private generation = 0;

  constructor(private readonly options: RegisterOptions) {}

  async load(configs: readonly DeviceConfig[]): Promise<DeviceRegistry> {
    const generation = ++this.generation;
    const next = await DeviceRegistry.register(configs, this.options);
    if (generation === this.generation) {
      this.registry = next;
      this.loadedAt = new Date();
    }
    return next;
  }

  current(): DeviceRegistry {
    if (!this.registry) throw new RegistryNotReadyError();
    return this.registry;
  }

  get ready(): boolean {
    return this.registry !== null;
  }

  get lastLoaded(): Date | null {
    return this.loadedAt;
  }
}
