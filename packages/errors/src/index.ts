/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// Identity pool exhausted (all instance slots taken)
export const ResourceExhaustedError = TaggedError("ResourceExhaustedError")<{
  message: string;
  limit: number;
}>();

export type ResourceExhaustedError = InstanceType<typeof ResourceExhaustedError>;

// Executable path checks before spawn
export const NotAccessibleError = TaggedError("NotAccessibleError")<{
  message: string;
  path: string;
}>();

export type NotAccessibleError = InstanceType<typeof NotAccessibleError>;

export const NotExecutableError = TaggedError("NotExecutableError")<{
  message: string;
  path: string;
}>();

export type NotExecutableError = InstanceType<typeof NotExecutableError>;

// Spawn failure, carries whatever the process wrote before dying
export const LaunchFailedError = TaggedError("LaunchFailedError")<{
  message: string;
  path: string;
  output: string;
  cause?: unknown;
}>();

export type LaunchFailedError = InstanceType<typeof LaunchFailedError>;

// Binding operations
export const InvalidSlotError = TaggedError("InvalidSlotError")<{
  message: string;
  device: string;
  slotId: number;
}>();

export type InvalidSlotError = InstanceType<typeof InvalidSlotError>;

export const InvalidPortError = TaggedError("InvalidPortError")<{
  message: string;
  portId: number;
  device?: string;
}>();

export type InvalidPortError = InstanceType<typeof InvalidPortError>;

// Working directory could not be created
export const WorkingDirectoryError = TaggedError("WorkingDirectoryError")<{
  message: string;
  path: string;
  cause?: unknown;
}>();

export type WorkingDirectoryError = InstanceType<typeof WorkingDirectoryError>;

// Console channel (TCP control connection) errors
export const ConsoleChannelError = TaggedError("ConsoleChannelError")<{
  message: string;
  host: string;
  port: number;
  cause?: unknown;
}>();

export type ConsoleChannelError = InstanceType<typeof ConsoleChannelError>;

// Operation on a device whose identity was already released
export const DeviceDeletedError = TaggedError("DeviceDeletedError")<{
  message: string;
  device: string;
}>();

export type DeviceDeletedError = InstanceType<typeof DeviceDeletedError>;

// Validation errors
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Timeout errors
export const TimeoutError = TaggedError("TimeoutError")<{
  message: string;
}>();

export type TimeoutError = InstanceType<typeof TimeoutError>;

// Union type for all errors a device can return
export type VpcsError =
  | ResourceExhaustedError
  | NotAccessibleError
  | NotExecutableError
  | LaunchFailedError
  | InvalidSlotError
  | InvalidPortError
  | WorkingDirectoryError
  | ConsoleChannelError
  | DeviceDeletedError
  | ValidationError
  | TimeoutError;

/**
 * Whether the caller can fix the error by changing the device configuration
 * and trying again. Pool exhaustion and deletion are terminal.
 */
export function isConfigurationError(error: VpcsError): boolean {
  switch (error._tag) {
    case "NotAccessibleError":
    case "NotExecutableError":
    case "InvalidSlotError":
    case "InvalidPortError":
    case "ValidationError":
    case "WorkingDirectoryError":
      return true;
    case "ResourceExhaustedError":
    case "DeviceDeletedError":
    case "LaunchFailedError":
    case "ConsoleChannelError":
    case "TimeoutError":
    default:
      return false;
  }
}
