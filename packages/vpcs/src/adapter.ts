import { Result } from "better-result";
import { InvalidPortError } from "@vnetlab/errors";
import type { PortBinding } from "./binding";

/**
 * A simulated Ethernet adapter: numbered ports, each holding at most one
 * transport binding.
 */
export class EthernetAdapter {
  private readonly ports = new Map<number, PortBinding | null>();

  constructor(readonly interfaces = 1) {
    for (let portId = 0; portId < interfaces; portId++) {
      this.ports.set(portId, null);
    }
  }

  get portIds(): number[] {
    return [...this.ports.keys()];
  }

  portExists(portId: number): boolean {
    return this.ports.has(portId);
  }

  getBinding(portId: number): PortBinding | null {
    return this.ports.get(portId) ?? null;
  }

  addBinding(portId: number, binding: PortBinding): Result<void, InvalidPortError> {
    if (!this.portExists(portId)) {
      return Result.err(this.missingPort(portId));
    }
    this.ports.set(portId, binding);
    return Result.ok(undefined);
  }

  /**
   * Detach the binding from a port, returning what was attached (if anything)
   */
  removeBinding(portId: number): Result<PortBinding | null, InvalidPortError> {
    if (!this.portExists(portId)) {
      return Result.err(this.missingPort(portId));
    }
    const previous = this.getBinding(portId);
    this.ports.set(portId, null);
    return Result.ok(previous);
  }

  toString(): string {
    return `Ethernet adapter (${this.interfaces} port${this.interfaces === 1 ? "" : "s"})`;
  }

  private missingPort(portId: number): InvalidPortError {
    return new InvalidPortError({
      message: `Port ${portId} doesn't exist in ${this.toString()}`,
      portId,
    });
  }
}
