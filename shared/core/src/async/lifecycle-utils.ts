/**
 * Lifecycle Utilities
 *
 * Returns null for direct assignment:
 *
 * ```typescript
 * this.reconcileInterval = clearIntervalSafe(this.reconcileInterval);
 * ```
 */

export function clearIntervalSafe(interval: NodeJS.Timeout | null): null {
  if (interval) {
    clearInterval(interval);
  }
  return null;
}
