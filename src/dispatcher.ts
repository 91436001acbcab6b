import { encodeCommand, isRecord, parseCommand, type Ack } from "./wire-codec.ts";
import { GatewayError, describeError, type GatewayErrorCode } from "./errors.ts";
import type { Command, CommandInput, CommandKind } from "./commands.ts";
import type { DeviceManager } from "./device-manager.ts";
import type { RegisteredDevice } from "./device-registry.ts";
import type { TargetRef } from "./types.ts";

export type DispatchOutcome =
  | "ok"
  | "device-error"
  | "malformed-ack"
  | "invalid-request"
  | "unsupported"
  | "not-found"
  | "not-ready"
  | "unreachable"
  | "internal";

export interface DispatchResult {
  ok: boolean;
  message: string;
  outcome: DispatchOutcome;
  httpStatus: number;
  errorCode?: GatewayErrorCode;
  /** Alias of the device the command was routed to, once resolved. */
  device?: string;
  /** Full acknowledgement body, for raw commands. */
  data?: Record<string, unknown>;
}

interface Classification {
  outcome: DispatchOutcome;
  httpStatus: number;
}

const INTERNAL: Classification = { outcome: "internal", httpStatus: 500 };

const OUTCOME_BY_CODE: Partial<Record<GatewayErrorCode, Classification>> = {
  INVALID_FIELD: { outcome: "invalid-request", httpStatus: 422 },
  UNSUPPORTED_OPERATION: { outcome: "unsupported", httpStatus: 400 },
  DEVICE_NOT_FOUND: { outcome: "not-found", httpStatus: 404 },
  REGISTRY_NOT_READY: { outcome: "not-ready", httpStatus: 503 },
  DEVICE_UNREACHABLE: { outcome: "unreachable", httpStatus: 502 },
  MALFORMED_ACK: { outcome: "malformed-ack", httpStatus: 502 },
};

function withKind(kind: CommandKind, payload: unknown): unknown {
  return isRecord(payload) ? { ...payload, kind } : { kind };
}

export class CommandDispatcher {
  constructor(private readonly devices: DeviceManager) {}

  /**
   * Routes a command to its device and reports the outcome. Never throws:
   * validation, lookup and transport failures all come back as results.
   *
   * Time Gate text only renders over an active animation layer; send a
   * gate-play-gif or gate-send-gif first or the device rejects the text.
   */
  async dispatch(target: TargetRef, command: CommandInput): Promise<DispatchResult> {
    return this.run(target, () => parseCommand(command));
  }

  /** Same as dispatch, for untyped request bodies. */
  async dispatchPayload(target: TargetRef, kind: CommandKind, payload: unknown): Promise<DispatchResult> {
    return this.run(target, () => parseCommand(withKind(kind, payload)));
  }

  private async run(target: TargetRef, parse: () => Command): Promise<DispatchResult> {
    let device: RegisteredDevice | undefined;
    try {
      device = this.devices.current().resolveTarget(target);
      const frame = encodeCommand(parse(), device.profile);
      const ack = await device.client.send(frame);
      return fromAck(ack, device, frame.kind === "raw");
    } catch (e) {
      return fromError(e, device);
    }
  }
}

function fromAck(ack: Ack, device: RegisteredDevice, includeData: boolean): DispatchResult {
  return {
    ok: ack.ok,
    message: ack.message,
    outcome: ack.ok ? "ok" : "device-error",
    httpStatus: 200,
    device: device.profile.alias,
    ...(includeData ? { data: ack.data } : {}),
  };
}

function fromError(error: unknown, device: RegisteredDevice | undefined): DispatchResult {
  const alias = device?.profile.alias;
  if (error instanceof GatewayError) {
    const mapped = OUTCOME_BY_CODE[error.code] ?? INTERNAL;
    return { ok: false, message: error.message, errorCode: error.code, device: alias, ...mapped };
  }
  return { ok: false, message: `Unexpected error: ${describeError(error)}`, device: alias, ...INTERNAL };
}
