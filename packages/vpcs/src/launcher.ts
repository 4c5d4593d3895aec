/**
 * Spawning the simulator process with its output captured to a file
 */

import { spawn, type ChildProcess } from "node:child_process";
import { open } from "node:fs/promises";
import { Result } from "better-result";

export interface LaunchOptions {
  /** argv, executable first */
  command: readonly string[];
  cwd: string;
  /** Truncated, then receives both stdout and stderr */
  logFile: string;
}

export type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

export interface LaunchedProcess {
  readonly pid: number | null;
  onExit(listener: ExitListener): void;
}

export interface ProcessLauncher {
  launch(options: LaunchOptions): Promise<Result<LaunchedProcess, Error>>;
}

class ChildProcessHandle implements LaunchedProcess {
  constructor(private readonly child: ChildProcess) {}

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  onExit(listener: ExitListener): void {
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      listener(this.child.exitCode, this.child.signalCode);
      return;
    }
    this.child.once("exit", listener);
  }
}

/**
 * Launches through node:child_process. stdin is inherited; stdout and
 * stderr share the log file descriptor.
 */
export class ChildProcessLauncher implements ProcessLauncher {
  async launch(options: LaunchOptions): Promise<Result<LaunchedProcess, Error>> {
    const [executable, ...args] = options.command;
    if (!executable) {
      return Result.err(new Error("empty command"));
    }

    const opened = await Result.tryPromise({
      try: () => open(options.logFile, "w"),
      catch: (err) => (err instanceof Error ? err : new Error(String(err))),
    });
    if (opened.isErr()) {
      return Result.err(opened.error);
    }
    const logHandle = opened.unwrap();

    try {
      const child = spawn(executable, args, {
        cwd: options.cwd,
        stdio: ["inherit", logHandle.fd, logHandle.fd],
      });

      const spawned = await new Promise<Result<LaunchedProcess, Error>>((resolve) => {
        child.once("spawn", () => resolve(Result.ok(new ChildProcessHandle(child))));
        child.once("error", (err) => resolve(Result.err(err)));
      });
      return spawned;
    } catch (err) {
      return Result.err(err instanceof Error ? err : new Error(String(err)));
    } finally {
      // the child holds its own copy of the descriptor
      await logHandle.close();
    }
  }
}
