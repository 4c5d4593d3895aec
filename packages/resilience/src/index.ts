// Timeout utilities
export { withTimeout } from "./timeout";
export type { TimeoutOptions } from "./timeout";
