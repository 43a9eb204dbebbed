export { QUEUE_NAMES, RETENTION_SCHEDULER_ID, createQueues, scheduleRetentionCleanup } from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue } from "./dlq.js";
export type { DeadLetterQueue, DeadLetterJobData } from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
