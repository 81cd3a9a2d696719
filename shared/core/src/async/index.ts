/**
 * Async primitives: mutex, timeouts, deferreds, lifecycle helpers.
 */

export { AsyncMutex } from './async-mutex';

export { withTimeout, createDeferred, TimeoutError } from './async-utils';
export type { Deferred } from './async-utils';

export { clearIntervalSafe } from './lifecycle-utils';
