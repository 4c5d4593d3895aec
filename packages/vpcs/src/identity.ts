/**
 * Instance identity allocation
 *
 * Each live device holds a small integer in [1, 255]. The executable uses it
 * as the MAC address offset (`-m`), which is where the upper bound comes from.
 *
 * Allocation is synchronous, so on the Node.js event loop two callers can
 * never observe the same free slot.
 */

import { Result } from "better-result";
import { ResourceExhaustedError } from "@vnetlab/errors";

export const MIN_IDENTITY = 1;
export const MAX_IDENTITY = 255;

export class IdentityAllocator {
  private readonly allocated = new Set<number>();

  constructor(private readonly max: number = MAX_IDENTITY) {}

  /**
   * Take the lowest free identity
   */
  allocate(): Result<number, ResourceExhaustedError> {
    for (let identity = MIN_IDENTITY; identity <= this.max; identity++) {
      if (!this.allocated.has(identity)) {
        this.allocated.add(identity);
        return Result.ok(identity);
      }
    }

    return Result.err(
      new ResourceExhaustedError({
        message: "Maximum number of vpcs instances reached",
        limit: this.max,
      })
    );
  }

  /**
   * Return an identity to the pool. Returns false if it was not allocated
   */
  release(identity: number): boolean {
    return this.allocated.delete(identity);
  }

  isAllocated(identity: number): boolean {
    return this.allocated.has(identity);
  }

  get size(): number {
    return this.allocated.size;
  }

  list(): number[] {
    return [...this.allocated].sort((a, b) => a - b);
  }

  reset(): void {
    this.allocated.clear();
  }
}

// Process-wide allocator shared by every device that does not bring its own
let globalAllocator: IdentityAllocator | null = null;

export function getGlobalIdentityAllocator(): IdentityAllocator {
  if (!globalAllocator) {
    globalAllocator = new IdentityAllocator();
  }
  return globalAllocator;
}

/**
 * Forget every allocated identity. Intended for test isolation
 */
export function resetGlobalIdentityAllocator(): void {
  globalAllocator?.reset();
}
