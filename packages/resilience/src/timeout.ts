import { Result } from "better-result";
import { TimeoutError } from "@vnetlab/errors";

export interface TimeoutOptions {
  /** Custom error message */
  message?: string;
  /** Invoked once when the deadline passes, e.g. to destroy a pending socket */
  onTimeout?: () => void;
}

/**
 * Wraps a promise with a timeout, returning a Result type.
 *
 * A rejection of the wrapped promise is reported as a TimeoutError as well,
 * so callers that need the original failure should resolve to a Result
 * instead of rejecting.
 *
 * @example
 * ```ts
 * const result = await withTimeout(connect(host, port), 3000, {
 *   onTimeout: () => socket.destroy(),
 * });
 * if (result.isErr()) {
 *   logger.warn("connect timed out", { error: result.error });
 * }
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions = {}
): Promise<Result<T, TimeoutError>> {
  const message = options.message ?? `Operation timed out after ${timeoutMs}ms`;

  return Result.tryPromise({
    try: async () => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          options.onTimeout?.();
          reject(new TimeoutError({ message }));
        }, timeoutMs);
      });

      try {
        return await Promise.race([promise, timeoutPromise]);
      } finally {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
      }
    },
    catch: (error) => {
      if (TimeoutError.is(error)) {
        return error;
      }
      return new TimeoutError({ message });
    },
  });
}
