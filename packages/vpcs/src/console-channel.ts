/**
 * TCP control channel of a running vpcs instance
 *
 * The executable listens on its console port (`-p`). A successful connect
 * is taken as "running", and writing `quit\n` asks it to exit. Any other
 * listener on the same port reports a false positive.
 */

import net, { type Socket } from "node:net";
import { Result } from "better-result";
import { ConsoleChannelError, TimeoutError } from "@vnetlab/errors";
import type { Logger } from "@vnetlab/logger";
import { withTimeout } from "@vnetlab/resilience";

export const QUIT_COMMAND = "quit\n";

export const DEFAULT_CONSOLE_TIMEOUT_MS = 3000;

export interface ConsoleChannel {
  /** Resolves true when something accepts a connection on host:port */
  probe(host: string, port: number): Promise<boolean>;
  /** Deliver the quit command */
  sendQuit(host: string, port: number): Promise<Result<void, ConsoleChannelError | TimeoutError>>;
}

export interface TcpConsoleChannelConfig {
  /** Bound on each connect/write (default: 3000) */
  timeoutMs?: number;
  logger?: Logger;
}

export class TcpConsoleChannel implements ConsoleChannel {
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(config: TcpConsoleChannelConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_CONSOLE_TIMEOUT_MS;
    this.logger = config.logger;
  }

  async probe(host: string, port: number): Promise<boolean> {
    let socket: Socket;
    try {
      socket = net.createConnection({ host, port });
    } catch (err) {
      // invalid host or port is rejected before any connect
      this.logger?.debug("console probe failed", { host, port, error: err });
      return false;
    }

    const attempt = new Promise<boolean>((resolve) => {
      socket.once("connect", () => resolve(true));
      socket.once("error", (err) => {
        this.logger?.debug("console probe failed", { host, port, error: err });
        resolve(false);
      });
    });

    const result = await withTimeout(attempt, this.timeoutMs, {
      message: `console ${host}:${port} did not answer within ${this.timeoutMs}ms`,
      onTimeout: () => socket.destroy(),
    });
    socket.destroy();

    if (result.isErr()) {
      this.logger?.debug("console probe timed out", { host, port });
      return false;
    }
    return result.unwrap();
  }

  async sendQuit(
    host: string,
    port: number
  ): Promise<Result<void, ConsoleChannelError | TimeoutError>> {
    let socket: Socket;
    try {
      socket = net.createConnection({ host, port });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return Result.err(
        new ConsoleChannelError({
          message: `could not send quit to ${host}:${port}: ${reason}`,
          host,
          port,
          cause: err,
        })
      );
    }

    const delivery = new Promise<Result<void, ConsoleChannelError>>((resolve) => {
      socket.once("error", (err) => {
        resolve(
          Result.err(
            new ConsoleChannelError({
              message: `could not send quit to ${host}:${port}: ${err.message}`,
              host,
              port,
              cause: err,
            })
          )
        );
      });
      socket.once("connect", () => {
        socket.end(QUIT_COMMAND, () => resolve(Result.ok(undefined)));
      });
    });

    const result = await withTimeout(delivery, this.timeoutMs, {
      message: `sending quit to ${host}:${port} timed out after ${this.timeoutMs}ms`,
      onTimeout: () => socket.destroy(),
    });
    socket.destroy();

    if (result.isErr()) {
      return Result.err(result.error);
    }
    return result.unwrap();
  }
}
