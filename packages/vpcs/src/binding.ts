/**
 * Transport bindings that attach a simulated port to the host
 */

import { Result } from "better-result";
import { ValidationError } from "@vnetlab/errors";

/** UDP tunnel: the simulator sends from `localPort` to `remoteHost:remotePort` */
export interface UdpTunnelBinding {
  readonly type: "udp";
  readonly localPort: number;
  readonly remoteHost: string;
  readonly remotePort: number;
}

/** Host TAP device. The name is recorded but not passed to the executable */
export interface TapBinding {
  readonly type: "tap";
  readonly tapDevice: string;
}

export type PortBinding = UdpTunnelBinding | TapBinding;

export function udpTunnel(localPort: number, remoteHost: string, remotePort: number): UdpTunnelBinding {
  return { type: "udp", localPort, remoteHost, remotePort };
}

export function tap(tapDevice: string): TapBinding {
  return { type: "tap", tapDevice };
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}

export function validateBinding(binding: PortBinding): Result<PortBinding, ValidationError> {
  switch (binding.type) {
    case "udp":
      if (!isPort(binding.localPort)) {
        return Result.err(new ValidationError({ message: `invalid local UDP port ${binding.localPort}` }));
      }
      if (!isPort(binding.remotePort)) {
        return Result.err(new ValidationError({ message: `invalid remote UDP port ${binding.remotePort}` }));
      }
      if (!binding.remoteHost) {
        return Result.err(new ValidationError({ message: "remote host is required for a UDP tunnel" }));
      }
      return Result.ok(binding);
    case "tap":
      if (!binding.tapDevice) {
        return Result.err(new ValidationError({ message: "TAP device name is required" }));
      }
      return Result.ok(binding);
  }
}

export function describeBinding(binding: PortBinding): string {
  switch (binding.type) {
    case "udp":
      return `UDP tunnel ${binding.localPort}:${binding.remoteHost}:${binding.remotePort}`;
    case "tap":
      return `TAP ${binding.tapDevice}`;
  }
}
