/**
 * Command line for the vpcs executable
 *
 *   vpcs [options] [scriptfile]
 *     -p port    run as a daemon listening on the tcp 'port'
 *     -m num     start byte of ether address
 *     -e         tap mode, using /dev/tapx (linux only)
 *     -s port    local udp base port
 *     -c port    remote udp base port
 *     -t ip      remote host IP
 *     -i num     number of simulated PCs
 *
 * The script file must come last.
 */

import type { EthernetAdapter } from "./adapter";
import type { PortBinding } from "./binding";

export interface CommandOptions {
  path: string;
  console: number;
  adapters: readonly EthernetAdapter[];
  identity: number;
  scriptFile?: string;
}

function bindingArgs(binding: PortBinding): string[] {
  switch (binding.type) {
    case "udp":
      return [
        "-s", String(binding.localPort),
        "-c", String(binding.remotePort),
        "-t", binding.remoteHost,
      ];
    case "tap":
      // vpcs cannot select a specific TAP device
      return ["-e"];
  }
}

export function buildCommand(options: CommandOptions): string[] {
  const args = [options.path, "-p", String(options.console)];

  for (const adapter of options.adapters) {
    for (const portId of adapter.portIds) {
      const binding = adapter.getBinding(portId);
      if (binding) {
        args.push(...bindingArgs(binding));
      }
    }
  }

  args.push("-m", String(options.identity));
  args.push("-i", "1");

  if (options.scriptFile) {
    args.push(options.scriptFile);
  }

  return args;
}
