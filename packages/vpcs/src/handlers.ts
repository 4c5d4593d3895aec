/**
 * Pre-start validation chain for vpcs devices
 */

import { constants } from "node:fs";
import { access, mkdir, stat } from "node:fs/promises";
import { Result } from "better-result";
import {
  NotAccessibleError,
  NotExecutableError,
  ValidationError,
  WorkingDirectoryError,
  type VpcsError,
} from "@vnetlab/errors";
import { HandlerList, type RuntimeHandler } from "@vnetlab/runtime";
import type { VpcsDevice } from "./device";

export type Handler = RuntimeHandler<VpcsDevice, VpcsError>;

export class Handlers {
  validation = new HandlerList<VpcsDevice, VpcsError>();
}

export const ConsolePortHandler: Handler = async (device) => {
  if (device.console === undefined) {
    return Result.err(
      new ValidationError({ message: `${device.label}: console port is not set` })
    );
  }
  return Result.ok(undefined);
};

export const ExecutableAccessHandler: Handler = async (device) => {
  const notAccessible = () =>
    new NotAccessibleError({
      message: `vpcs image '${device.path}' is not accessible`,
      path: device.path,
    });

  try {
    const info = await stat(device.path);
    if (!info.isFile()) {
      return Result.err(notAccessible());
    }
  } catch {
    return Result.err(notAccessible());
  }
  return Result.ok(undefined);
};

export const ExecutableModeHandler: Handler = async (device) => {
  try {
    await access(device.path, constants.X_OK);
  } catch {
    return Result.err(
      new NotExecutableError({
        message: `vpcs image '${device.path}' is not executable`,
        path: device.path,
      })
    );
  }
  return Result.ok(undefined);
};

// The directory may have been removed since the device was configured
export const WorkingDirectoryHandler: Handler = async (device) => {
  try {
    await mkdir(device.workingDir, { recursive: true });
  } catch (err) {
    return Result.err(
      new WorkingDirectoryError({
        message: `Could not create working directory ${device.workingDir}: ${String(err)}`,
        path: device.workingDir,
        cause: err,
      })
    );
  }
  return Result.ok(undefined);
};

export function createDefaultHandlers(): Handlers {
  const handlers = new Handlers();

  handlers.validation
    .append("ConsolePort", ConsolePortHandler)
    .append("ExecutableAccess", ExecutableAccessHandler)
    .append("ExecutableMode", ExecutableModeHandler)
    .append("WorkingDirectory", WorkingDirectoryHandler);

  return handlers;
}
