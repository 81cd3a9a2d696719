/**
 * Poll a condition with exponential backoff until it holds.
 *
 * @throws Error when the condition still fails after `timeout` ms
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: { timeout?: number; initialInterval?: number; maxInterval?: number } = {}
): Promise<void> {
  const { timeout = 5000, initialInterval = 5, maxInterval = 50 } = options;
  const startTime = Date.now();
  let interval = initialInterval;

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
    interval = Math.min(interval * 2, maxInterval);
  }

  throw new Error(`waitFor timeout after ${timeout}ms`);
}
