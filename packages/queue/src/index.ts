export {
  QUEUE_NAMES,
  SCHEDULED_SYNC_JOB_ID,
  createSyncQueue,
  enqueueSync,
  parseRedisConnection,
  scheduleSync,
} from "./queues.js";
export type { QueueConfig, SyncQueue } from "./queues.js";
