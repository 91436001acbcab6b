import axios, { isAxiosError } from "axios";
import createDebug, { type Debugger } from "debug";
import { decode, type Ack, type WireFrame } from "./wire-codec.ts";
import { DeviceUnreachableError, MalformedAckError, describeError } from "./errors.ts";
import type { DeviceProfile } from "./types.ts";

export const PIXOO_PORT = 80;
export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_RETRY_DELAY_MS = 500;

// Failures worth another attempt; everything else fails on the first try
const TRANSIENT_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ECONNABORTED"]);

export interface HttpReply {
  status: number;
  body: string;
}

export type HttpPost = (path: string, body: string) => Promise<HttpReply>;

export interface PixooClientOptions {
  timeoutMs?: number;
  retryDelayMs?: number;
  /** Replaces the axios transport, e.g. with an in-process fake. */
  http?: HttpPost;
}

export interface TransportSession {
  attempts: number;
  lastError: unknown;
}

export function transportErrorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) return error.code;
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  const code = transportErrorCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PixooClient {
  private readonly http: HttpPost;
  private readonly retryDelayMs: number;
  private readonly log: Debugger;

  constructor(
    readonly profile: DeviceProfile,
    options: PixooClientOptions = {}
  ) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.http = options.http ?? axiosPost(profile.ip, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.log = createDebug(`pixoo-gateway:device:${profile.alias}`);
    if (profile.debug) this.log.enabled = true;
  }

  /**
   * POSTs one frame, retrying connection-level failures up to the profile's
   * retry budget. Device rejections and unreadable replies are not retried.
   */
  async send(frame: WireFrame, budget = this.profile.retryBudget): Promise<Ack> {
    const session: TransportSession = { attempts: 0, lastError: undefined };
    const body = JSON.stringify(frame.payload);

    while (session.attempts < budget) {
      session.attempts++;
      this.log("-> %s attempt %d/%d %s", frame.payload.Command, session.attempts, budget, body.slice(0, 200));
      let reply: HttpReply;
      try {
        reply = await this.http("/post", body);
      } catch (e) {
        session.lastError = e;
        this.log("!! %s", describeError(e));
        if (!isTransientError(e)) break;
        if (session.attempts < budget) await sleep(this.retryDelayMs);
        continue;
      }
      this.log("<- HTTP %d %s", reply.status, reply.body.slice(0, 200));
      if (reply.status < 200 || reply.status >= 300) {
        throw new MalformedAckError(`Device responded with HTTP ${reply.status}`);
      }
      return decode(reply.body);
    }

    throw new DeviceUnreachableError(this.profile.ip, session.attempts, session.lastError);
  }

  // Single-attempt reachability check
  async probe(): Promise<boolean> {
    try {
      await this.send({ kind: "raw", payload: { Command: "Channel/GetAllConf" } }, 1);
      return true;
    } catch (e) {
      this.log("probe failed: %s", describeError(e));
      return false;
    }
  }
}

function axiosPost(ip: string, timeoutMs: number): HttpPost {
  const client = axios.create({
    baseURL: `http://${ip}:${PIXOO_PORT}`,
    timeout: timeoutMs,
    headers: {
      "Content-Type": "application/json",
    },
    responseType: "text",
    validateStatus: () => true,
  });
  return async (path, body) => {
    const response = await client.post<string>(path, body);
    return { status: response.status, body: String(response.data) };
  };
}
