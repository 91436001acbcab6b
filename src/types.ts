export type DeviceFamily = "single-panel" | "multi-panel";

// Family hint as written in configuration
export type FamilyHint = "auto" | "pixoo" | "time_gate";

export type Resolution = 16 | 32 | 64 | 128;

export const SINGLE_PANEL_RESOLUTIONS: readonly Resolution[] = [16, 32, 64];
export const MULTI_PANEL_MIN_RESOLUTION = 128;

export interface DeviceConfig {
  name?: string;
  host?: string;
  autoDiscover: boolean;
  family: FamilyHint;
  resolution: number;
  debug: boolean;
  retryBudget: number;
}

export interface DeviceProfile {
  readonly alias: string;
  readonly name?: string;
  readonly ip: string;
  readonly family: DeviceFamily;
  readonly resolution: Resolution;
  readonly autoDiscover: boolean;
  readonly retryBudget: number;
  readonly debug: boolean;
  /** Name reported by the discovery service, when the device was matched there. */
  readonly reportedName?: string;
}

export interface DiscoveryRecord {
  deviceName: string;
  privateIp: string;
}

export type DiscoveryFetcher = () => Promise<DiscoveryRecord[]>;

export interface TargetRef {
  device?: string;
  host?: string;
}

export interface Diagnostics {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleDiagnostics: Diagnostics = {
  info: (message) => console.error(`[pixoo-gateway] ${message}`),
  warn: (message) => console.error(`[pixoo-gateway] WARNING: ${message}`),
};
