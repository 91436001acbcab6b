import axios from "axios";
import { z } from "zod";
import { DiscoveryFailedError, describeError } from "./errors.ts";
import type { DiscoveryFetcher, DiscoveryRecord } from "./types.ts";

export const DISCOVERY_URL = "https://app.divoom-gz.com/Device/ReturnSameLANDevice";

const discoveryResponseSchema = z.object({
  DeviceList: z
    .array(
      z
        .object({
          DeviceName: z.string().nullish(),
          DevicePrivateIP: z.string().nullish(),
        })
        .passthrough()
    )
    .nullish(),
});

export interface DiscoveryOptions {
  url?: string;
  timeoutMs?: number;
  /** Replaces the axios POST; resolves with the parsed response body. */
  post?: (url: string) => Promise<unknown>;
}

// Lowercase with spaces, underscores and hyphens removed
export function normalizeDeviceName(name: string): string {
  return name.toLowerCase().replace(/[\s_-]+/g, "");
}

export function isTimeGateName(name: string): boolean {
  return normalizeDeviceName(name).includes("timegate");
}

export function parseDiscoveryResponse(body: unknown): DiscoveryRecord[] {
  const parsed = discoveryResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new DiscoveryFailedError("Discovery service returned an unexpected response");
  }
  const records: DiscoveryRecord[] = [];
  for (const entry of parsed.data.DeviceList ?? []) {
    const privateIp = entry.DevicePrivateIP?.trim();
    if (!privateIp) continue;
    records.push({ deviceName: entry.DeviceName?.trim() ?? "", privateIp });
  }
  return records;
}

/**
 * Asks the vendor cloud which devices share this network. One attempt per
 * call; callers decide what a failure means.
 */
export function createDiscoveryFetcher(options: DiscoveryOptions = {}): DiscoveryFetcher {
  const url = options.url ?? DISCOVERY_URL;
  const timeout = options.timeoutMs ?? 10000;
  const post =
    options.post ??
    (async (target: string) => {
      const response = await axios.post<unknown>(target, {}, { timeout });
      return response.data;
    });

  return async () => {
    let body: unknown;
    try {
      body = await post(url);
    } catch (e) {
      throw new DiscoveryFailedError(`Discovery service request failed: ${describeError(e)}`, { cause: e });
    }
    return parseDiscoveryResponse(body);
  };
}
