import type { DeviceFamily } from "./types.ts";

export type GatewayErrorCode =
  | "CONFIG_ERROR"
  | "DISCOVERY_FAILED"
  | "NO_DEVICE_FOUND"
  | "NO_VALID_DEVICES"
  | "REGISTRY_NOT_READY"
  | "DEVICE_NOT_FOUND"
  | "INVALID_FIELD"
  | "UNSUPPORTED_OPERATION"
  | "DEVICE_UNREACHABLE"
  | "MALFORMED_ACK";

export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends GatewayError {
  readonly code = "CONFIG_ERROR";
}

export class DiscoveryFailedError extends GatewayError {
  readonly code = "DISCOVERY_FAILED";
}

export class NoDeviceFoundError extends GatewayError {
  readonly code = "NO_DEVICE_FOUND";
}

export class NoValidDevicesError extends GatewayError {
  readonly code = "NO_VALID_DEVICES";

  constructor(
    message: string,
    readonly failures: readonly GatewayError[] = [],
  ) {
    super(message);
  }
}

export class RegistryNotReadyError extends GatewayError {
  readonly code = "REGISTRY_NOT_READY";

  constructor() {
    super("Device registry is not initialized");
  }
}

export class DeviceNotFoundError extends GatewayError {
  readonly code = "DEVICE_NOT_FOUND";

  constructor(
    readonly reference: string,
    readonly available: readonly string[],
  ) {
    super(`Device "${reference}" not found. Available: ${available.join(", ") || "none"}`);
  }
}

export class InvalidFieldError extends GatewayError {
  readonly code = "INVALID_FIELD";

  constructor(
    readonly field: string,
    reason: string,
  ) {
    super(`Invalid ${field}: ${reason}`);
  }
}

export class UnsupportedOperationError extends GatewayError {
  readonly code = "UNSUPPORTED_OPERATION";

  constructor(
    readonly kind: string,
    readonly family: DeviceFamily,
  ) {
    super(`Command "${kind}" is not supported by ${family} devices`);
  }
}

export class DeviceUnreachableError extends GatewayError {
  readonly code = "DEVICE_UNREACHABLE";

  constructor(
    readonly ip: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Device at ${ip} unreachable after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}

export class MalformedAckError extends GatewayError {
  readonly code = "MALFORMED_ACK";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
