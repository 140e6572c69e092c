/**
 * @rigkeeper/observability -- operational log for the keeper.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver } from './console-observer.js';
export type { LogLevel } from './console-observer.js';

export { FileObserver } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver, observerNames } from './registry.js';
export type { ObservabilityConfig } from './registry.js';
