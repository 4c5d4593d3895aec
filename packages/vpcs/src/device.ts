/**
 * vpcs device: identity, configuration, bindings and the supervised process
 *
 * Usage:
 *   const device = VpcsDevice.create({ path: "/usr/bin/vpcs", workingDir: "/tmp/lab" }).unwrap();
 *   device.setConsole(4501);
 *   device.addPortBinding(0, 0, udpTunnel(20001, "127.0.0.1", 30001));
 *   await device.start();
 *   ...
 *   await device.delete();
 */

import { mkdirSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Result } from "better-result";
import {
  DeviceDeletedError,
  InvalidPortError,
  InvalidSlotError,
  LaunchFailedError,
  ValidationError,
  WorkingDirectoryError,
  isConfigurationError,
  type ResourceExhaustedError,
  type VpcsError,
} from "@vnetlab/errors";
import { createLogger, type Logger } from "@vnetlab/logger";
import type { Runtime, RuntimeInfo, RuntimeStatus } from "@vnetlab/runtime";
import { EthernetAdapter } from "./adapter";
import { describeBinding, validateBinding, type PortBinding } from "./binding";
import { buildCommand } from "./command";
import { TcpConsoleChannel, type ConsoleChannel } from "./console-channel";
import { Handlers, createDefaultHandlers } from "./handlers";
import { getGlobalIdentityAllocator, type IdentityAllocator } from "./identity";
import {
  ChildProcessLauncher,
  type LaunchedProcess,
  type ProcessLauncher,
} from "./launcher";

export const LOG_FILE_NAME = "vpcs.log";

export interface VpcsDeviceConfig {
  /** Path to the vpcs executable */
  path: string;
  /** Base directory; the device works in `<workingDir>/vpcs/device-<id>` */
  workingDir: string;
  /** Host of the console channel (default: "127.0.0.1") */
  host?: string;
  /** Display name (default: "vpcs<id>") */
  name?: string;
  console?: number;
  scriptFile?: string;
}

export interface VpcsDeviceOptions {
  allocator: IdentityAllocator;
  logger: Logger;
  channel: ConsoleChannel;
  launcher: ProcessLauncher;
  handlers: Handlers;
}

export type VpcsDeviceOpt = (options: VpcsDeviceOptions) => void;

export function withIdentityAllocator(allocator: IdentityAllocator): VpcsDeviceOpt {
  return (options) => {
    options.allocator = allocator;
  };
}

export function withLogger(logger: Logger): VpcsDeviceOpt {
  return (options) => {
    options.logger = logger;
  };
}

export function withConsoleChannel(channel: ConsoleChannel): VpcsDeviceOpt {
  return (options) => {
    options.channel = channel;
  };
}

export function withLauncher(launcher: ProcessLauncher): VpcsDeviceOpt {
  return (options) => {
    options.launcher = launcher;
  };
}

export function withHandlers(handlers: Handlers): VpcsDeviceOpt {
  return (options) => {
    options.handlers = handlers;
  };
}

export interface VpcsDefaults {
  name: string;
  path: string;
  scriptFile: string;
  console: number | undefined;
}

function deviceDirectory(base: string, identity: number): string {
  return join(base, "vpcs", `device-${identity}`);
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

export class VpcsDevice implements Runtime<VpcsError> {
  readonly type = "vpcs" as const;
  readonly id: number;
  readonly handlers: Handlers;

  private readonly allocator: IdentityAllocator;
  private readonly logger: Logger;
  private readonly channel: ConsoleChannel;
  private readonly launcher: ProcessLauncher;
  private readonly adapters: EthernetAdapter[] = [new EthernetAdapter()];

  private _name: string;
  private _path: string;
  private _host: string;
  private _console: number | undefined;
  private _scriptFile = "";
  private _workingDir = "";
  private _logFile = "";
  private _status: RuntimeStatus = "stopped";
  private _startedAt: string | undefined;
  private _started = false;
  private process: LaunchedProcess | null = null;
  private processExited = false;
  private deleted = false;
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(id: number, config: VpcsDeviceConfig, options: VpcsDeviceOptions) {
    this.id = id;
    this.allocator = options.allocator;
    this.logger = options.logger;
    this.channel = options.channel;
    this.launcher = options.launcher;
    this.handlers = options.handlers;

    this._name = config.name || `vpcs${id}`;
    this._path = config.path;
    this._host = config.host ?? "127.0.0.1";
    this._console = config.console;
    this._scriptFile = config.scriptFile ?? "";
  }

  /**
   * Allocate an identity, create the working directory and return the device.
   * The identity is released again if the console port is invalid or the
   * directory cannot be created.
   */
  static create(
    config: VpcsDeviceConfig,
    ...opts: VpcsDeviceOpt[]
  ): Result<VpcsDevice, ResourceExhaustedError | ValidationError | WorkingDirectoryError> {
    const options: VpcsDeviceOptions = {
      allocator: getGlobalIdentityAllocator(),
      logger: createLogger({ component: "vpcs" }),
      channel: new TcpConsoleChannel(),
      launcher: new ChildProcessLauncher(),
      handlers: createDefaultHandlers(),
    };
    for (const opt of opts) {
      opt(options);
    }

    const allocated = options.allocator.allocate();
    if (allocated.isErr()) {
      options.logger.error("could not allocate a vpcs identity", { limit: allocated.error.limit });
      return Result.err(allocated.error);
    }

    const device = new VpcsDevice(allocated.unwrap(), config, options);

    if (config.console !== undefined && !isValidPort(config.console)) {
      options.allocator.release(device.id);
      return Result.err(device.invalidConsoleError(config.console));
    }

    const dirResult = device.createWorkingDir(config.workingDir);
    if (dirResult.isErr()) {
      options.allocator.release(device.id);
      return Result.err(dirResult.error);
    }

    device.log("info", "vpcs device has been created");
    return Result.ok(device);
  }

  get name(): string {
    return this._name;
  }

  get path(): string {
    return this._path;
  }

  get host(): string {
    return this._host;
  }

  get console(): number | undefined {
    return this._console;
  }

  get scriptFile(): string {
    return this._scriptFile;
  }

  get workingDir(): string {
    return this._workingDir;
  }

  /** Path of the captured stdout/stderr, empty until the first start */
  get logFile(): string {
    return this._logFile;
  }

  get started(): boolean {
    return this._started;
  }

  get status(): RuntimeStatus {
    return this._status;
  }

  get isDeleted(): boolean {
    return this.deleted;
  }

  get slots(): readonly EthernetAdapter[] {
    return this.adapters;
  }

  /** "vpcs <name> [id=<id>]", used as the prefix of error messages */
  get label(): string {
    return `vpcs ${this._name} [id=${this.id}]`;
  }

  defaults(): VpcsDefaults {
    return {
      name: this._name,
      path: this._path,
      scriptFile: this._scriptFile,
      console: this._console,
    };
  }

  setName(name: string): Result<void, ValidationError | DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    if (!name.trim()) {
      return Result.err(new ValidationError({ message: `${this.label}: name must not be empty` }));
    }
    const previous = this._name;
    this._name = name;
    this.log("info", "renamed", { previousName: previous });
    return Result.ok(undefined);
  }

  setPath(path: string): Result<void, ValidationError | DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    if (!path) {
      return Result.err(new ValidationError({ message: `${this.label}: path must not be empty` }));
    }
    this._path = path;
    this.log("info", "path changed", { path });
    return Result.ok(undefined);
  }

  setConsole(port: number): Result<void, ValidationError | DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    if (!isValidPort(port)) {
      return Result.err(this.invalidConsoleError(port));
    }
    this._console = port;
    this.log("info", "console port set", { console: port });
    return Result.ok(undefined);
  }

  /** An empty string clears the script file */
  setScriptFile(scriptFile: string): Result<void, DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    this._scriptFile = scriptFile;
    this.log("info", "script file set", { scriptFile });
    return Result.ok(undefined);
  }

  /**
   * Point the device at `<base>/vpcs/device-<id>`, creating it if needed
   */
  setWorkingDir(base: string): Result<string, WorkingDirectoryError | DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    return this.createWorkingDir(base);
  }

  private createWorkingDir(base: string): Result<string, WorkingDirectoryError> {
    const dir = deviceDirectory(base, this.id);
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      return Result.err(
        new WorkingDirectoryError({
          message: `Could not create working directory ${dir}: ${String(err)}`,
          path: dir,
          cause: err,
        })
      );
    }
    this._workingDir = dir;
    this.log("info", "working directory changed", { workingDir: dir });
    return Result.ok(dir);
  }

  addPortBinding(
    slotId: number,
    portId: number,
    binding: PortBinding
  ): Result<void, InvalidSlotError | InvalidPortError | ValidationError | DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    const adapter = this.adapterAt(slotId);
    if (adapter.isErr()) return Result.err(adapter.error);

    const valid = validateBinding(binding);
    if (valid.isErr()) return Result.err(valid.error);

    const added = adapter.unwrap().addBinding(portId, binding);
    if (added.isErr()) {
      return Result.err(this.portError(added.error));
    }

    this.log("info", "binding added", { binding: describeBinding(binding), slotId, portId });
    return Result.ok(undefined);
  }

  removePortBinding(
    slotId: number,
    portId: number
  ): Result<PortBinding | null, InvalidSlotError | InvalidPortError | DeviceDeletedError> {
    if (this.deleted) return Result.err(this.deletedError());
    const adapter = this.adapterAt(slotId);
    if (adapter.isErr()) return Result.err(adapter.error);

    const removed = adapter.unwrap().removeBinding(portId);
    if (removed.isErr()) {
      return Result.err(this.portError(removed.error));
    }

    const previous = removed.unwrap();
    this.log("info", "binding removed", {
      binding: previous ? describeBinding(previous) : null,
      slotId,
      portId,
    });
    return Result.ok(previous);
  }

  getPortBinding(slotId: number, portId: number): PortBinding | null {
    return this.adapters[slotId]?.getBinding(portId) ?? null;
  }

  buildCommand(): Result<string[], ValidationError> {
    if (this._console === undefined) {
      return Result.err(new ValidationError({ message: `${this.label}: console port is not set` }));
    }
    return Result.ok(
      buildCommand({
        path: this._path,
        console: this._console,
        adapters: this.adapters,
        identity: this.id,
        scriptFile: this._scriptFile || undefined,
      })
    );
  }

  commandLine(): Result<string, ValidationError> {
    const command = this.buildCommand();
    if (command.isErr()) return Result.err(command.error);
    return Result.ok(command.unwrap().join(" "));
  }

  /**
   * Start the vpcs process. Does nothing while it already answers on its console
   */
  async start(): Promise<Result<void, VpcsError>> {
    return this.serialize(() => this.startUnlocked());
  }

  async stop(): Promise<Result<void, VpcsError>> {
    return this.serialize(() => this.stopUnlocked());
  }

  /**
   * Stop the process and release the identity. Later starts and
   * configuration changes fail with DeviceDeletedError
   */
  async delete(): Promise<Result<void, VpcsError>> {
    return this.serialize(async () => {
      if (this.deleted) {
        return Result.ok(undefined);
      }

      const stopped = await this.stopUnlocked();
      if (stopped.isErr()) return stopped;

      this.allocator.release(this.id);
      this.deleted = true;
      this._status = "deleted";
      this.log("info", "vpcs device has been deleted");
      return Result.ok(undefined);
    });
  }

  /**
   * Liveness heuristic: a process handle exists and the console port accepts
   * a connection
   */
  async isRunning(): Promise<boolean> {
    if (!this.process || this._console === undefined) {
      return false;
    }
    const reachable = await this.channel.probe(this._host, this._console);
    if (!reachable) {
      this.log("warn", "console is not reachable", { host: this._host, console: this._console });
    }
    return reachable;
  }

  getPid(): number | null {
    return this.process?.pid ?? null;
  }

  async getInfo(): Promise<RuntimeInfo> {
    return {
      id: this.id,
      name: this._name,
      status: this._status,
      pid: this.getPid(),
      startedAt: this._startedAt,
    };
  }

  /**
   * Everything the process wrote to its log file so far. Meant for a stopped
   * or crashed process
   */
  async readCapturedOutput(): Promise<string> {
    if (!this._logFile) {
      return "";
    }
    try {
      return await readFile(this._logFile, "utf8");
    } catch (err) {
      this.log("warn", "could not read captured output", { logFile: this._logFile, error: err });
      return "";
    }
  }

  private async startUnlocked(): Promise<Result<void, VpcsError>> {
    if (this.deleted) {
      return Result.err(this.deletedError());
    }

    if (await this.isRunning()) {
      this.log("debug", "already running, start ignored");
      return Result.ok(undefined);
    }

    // Never spawn a second vpcs while the previous child is alive
    if (this.process && !this.processExited) {
      const pid = this.process.pid;
      this.log("warn", "previous vpcs process has not exited, start refused", { pid });
      return Result.err(
        new LaunchFailedError({
          message:
            `${this.label}: vpcs process ${pid ?? "?"} is still alive but its console ` +
            "does not answer, stop the device first",
          path: this._path,
          output: "",
        })
      );
    }

    const valid = await this.handlers.validation.run(this);
    if (valid.isErr()) {
      this.log(isConfigurationError(valid.error) ? "warn" : "error", "start refused", {
        error: valid.error,
      });
      return valid;
    }

    const command = this.buildCommand();
    if (command.isErr()) return Result.err(command.error);

    this._status = "starting";
    this._logFile = join(this._workingDir, LOG_FILE_NAME);
    this.log("info", "starting vpcs", { command: command.unwrap(), logFile: this._logFile });

    const launched = await this.launcher.launch({
      command: command.unwrap(),
      cwd: this._workingDir,
      logFile: this._logFile,
    });

    if (launched.isErr()) {
      const output = await this.readCapturedOutput();
      this._status = "failed";
      const message = `could not start vpcs ${this._path}: ${launched.error.message}\n${output}`;
      this.log("error", "start failed", { error: launched.error, output });
      return Result.err(
        new LaunchFailedError({
          message,
          path: this._path,
          output,
          cause: launched.error,
        })
      );
    }

    const proc = launched.unwrap();
    this.process = proc;
    this.processExited = false;
    this._started = true;
    this._status = "running";
    this._startedAt = new Date().toISOString();
    this.log("info", "vpcs started", { pid: proc.pid });

    proc.onExit((code, signal) => {
      if (this.process === proc) {
        this.processExited = true;
      }
      this.log("info", "vpcs process exited", { pid: proc.pid, code, signal });
    });

    return Result.ok(undefined);
  }

  // Does not wait for the process to exit
  private async stopUnlocked(): Promise<Result<void, VpcsError>> {
    if (this._console !== undefined && (await this.isRunning())) {
      this.log("info", "stopping vpcs", { pid: this.getPid() });
      const sent = await this.channel.sendQuit(this._host, this._console);
      if (sent.isErr()) {
        this.log("warn", "could not deliver quit, vpcs may still be running", {
          pid: this.getPid(),
          error: sent.error,
        });
      }
    }

    const stopped = this.process;
    this.process = null;
    this.processExited = false;
    this._started = false;
    if (!this.deleted) {
      this._status = "stopped";
    }
    if (stopped) {
      this.log("info", "vpcs stopped", { pid: stopped.pid });
    }
    return Result.ok(undefined);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // keep the chain alive; the caller still sees the rejection through run
    this.queue = run.catch(() => undefined);
    return run;
  }

  private adapterAt(slotId: number): Result<EthernetAdapter, InvalidSlotError> {
    const adapter = Number.isInteger(slotId) ? this.adapters[slotId] : undefined;
    if (!adapter) {
      return Result.err(
        new InvalidSlotError({
          message: `Slot ${slotId} doesn't exist on vpcs ${this._name}`,
          device: this._name,
          slotId,
        })
      );
    }
    return Result.ok(adapter);
  }

  private deletedError(): DeviceDeletedError {
    return new DeviceDeletedError({
      message: `${this.label}: device has been deleted`,
      device: this._name,
    });
  }

  private invalidConsoleError(port: number): ValidationError {
    return new ValidationError({ message: `${this.label}: invalid console port ${port}` });
  }

  private portError(error: InvalidPortError): InvalidPortError {
    return new InvalidPortError({
      message: `${this.label}: ${error.message}`,
      portId: error.portId,
      device: this._name,
    });
  }

  private log(
    level: "debug" | "info" | "warn" | "error",
    message: string,
    meta: Record<string, unknown> = {}
  ): void {
    this.logger[level](message, { device: this._name, id: this.id, ...meta });
  }
}
