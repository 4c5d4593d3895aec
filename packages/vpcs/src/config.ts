/**
 * Settings read from the environment
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { Result } from "better-result";
import { ValidationError } from "@vnetlab/errors";
import { isLogLevel, type LogLevel } from "@vnetlab/logger";
import { DEFAULT_CONSOLE_TIMEOUT_MS } from "./console-channel";

export interface VpcsSettings {
  /** VPCS_PATH */
  vpcsPath: string;
  /** VPCS_WORKING_DIR */
  workingDir: string;
  /** VPCS_HOST */
  host: string;
  /** VPCS_CONSOLE_TIMEOUT_MS */
  consoleTimeoutMs: number;
  /** LOG_LEVEL */
  logLevel: LogLevel | "silent";
}

export const DEFAULT_VPCS_PATH = "vpcs";
export const DEFAULT_HOST = "127.0.0.1";

export function loadVpcsSettings(
  env: NodeJS.ProcessEnv = process.env
): Result<VpcsSettings, ValidationError> {
  let consoleTimeoutMs = DEFAULT_CONSOLE_TIMEOUT_MS;
  if (env.VPCS_CONSOLE_TIMEOUT_MS) {
    const parsed = Number(env.VPCS_CONSOLE_TIMEOUT_MS);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      return Result.err(
        new ValidationError({ message: "VPCS_CONSOLE_TIMEOUT_MS must be a positive integer" })
      );
    }
    consoleTimeoutMs = parsed;
  }

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    return Result.err(
      new ValidationError({ message: "LOG_LEVEL must be one of debug, info, warn, error, silent" })
    );
  }

  return Result.ok({
    vpcsPath: env.VPCS_PATH || DEFAULT_VPCS_PATH,
    workingDir: env.VPCS_WORKING_DIR || join(tmpdir(), "vnetlab"),
    host: env.VPCS_HOST || DEFAULT_HOST,
    consoleTimeoutMs,
    logLevel,
  });
}
