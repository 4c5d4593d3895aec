/**
 * @vnetlab/vpcs
 *
 * Supervision of vpcs (virtual PC simulator) processes
 */

// Re-export runtime types for convenience
export type { Runtime, RuntimeInfo, RuntimeStatus, RuntimeType } from "@vnetlab/runtime";

// Device
export {
  VpcsDevice,
  LOG_FILE_NAME,
  withIdentityAllocator,
  withLogger,
  withConsoleChannel,
  withLauncher,
  withHandlers,
} from "./device";
export type { VpcsDeviceConfig, VpcsDeviceOptions, VpcsDeviceOpt, VpcsDefaults } from "./device";

// Identity
export {
  IdentityAllocator,
  MIN_IDENTITY,
  MAX_IDENTITY,
  getGlobalIdentityAllocator,
  resetGlobalIdentityAllocator,
} from "./identity";

// Bindings
export { EthernetAdapter } from "./adapter";
export { udpTunnel, tap, validateBinding, describeBinding } from "./binding";
export type { PortBinding, UdpTunnelBinding, TapBinding } from "./binding";

// Command line
export { buildCommand } from "./command";
export type { CommandOptions } from "./command";

// Console channel
export { TcpConsoleChannel, QUIT_COMMAND, DEFAULT_CONSOLE_TIMEOUT_MS } from "./console-channel";
export type { ConsoleChannel, TcpConsoleChannelConfig } from "./console-channel";

// Process launcher
export { ChildProcessLauncher } from "./launcher";
export type { LaunchOptions, LaunchedProcess, ProcessLauncher, ExitListener } from "./launcher";

// Handlers
export {
  Handlers,
  createDefaultHandlers,
  ConsolePortHandler,
  ExecutableAccessHandler,
  ExecutableModeHandler,
  WorkingDirectoryHandler,
} from "./handlers";
export type { Handler } from "./handlers";

// Settings
export { loadVpcsSettings, DEFAULT_VPCS_PATH, DEFAULT_HOST } from "./config";
export type { VpcsSettings } from "./config";
