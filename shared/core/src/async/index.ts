export { AsyncMutex, KeyedMutex } from './async-mutex';
export type { MutexStats } from './async-mutex';
export { withTimeout, sleep, createDeferred, gracefulShutdown } from './async-utils';
export type { Deferred } from './async-utils';
export { KeyedTaskPool, TaskPoolStoppedError } from './task-pool';
export type { TaskPoolConfig, TaskPoolStats } from './task-pool';
