export { InMemoryWorkQueue, NO_WORK, VISIBILITY_EXPIRED } from './work-queue';
export type { WorkQueue, WorkQueueOptions, DequeueResult, Lease, Claim } from './work-queue';
export { InMemoryResultChannel } from './result-channel';
export type { ResultChannel } from './result-channel';
export { RedisWorkQueue } from './redis-work-queue';
export { RedisResultChannel } from './redis-result-channel';
export type { QueueRedis, LeaseRedis } from './redis-client';
