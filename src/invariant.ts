/**
 * rowstack - Invariant Guard
 */

import { LOG_PREFIX } from "./constants";

/**
 * Throw when an internal invariant no longer holds.
 * Only reachable when the stack's DOM was edited behind its back.
 */
export function assertInvariant(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) {
    throw new Error(`${LOG_PREFIX} Invariant violation: ${message}`);
  }
}
