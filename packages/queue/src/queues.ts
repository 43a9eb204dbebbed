import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData, MaintenanceJobData, ModelJobData } from "@groundwrite/types";

export const QUEUE_NAMES = {
  INGEST: "groundwrite:ingest",
  GENERATE: "groundwrite:generate",
  MAINTENANCE: "groundwrite:maintenance",
} as const;

export const RETENTION_SCHEDULER_ID = "passage-retention";
const DAY_MS = 86_400_000;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, defaultOpts);
  const generateQueue = new Queue<ModelJobData>(QUEUE_NAMES.GENERATE, defaultOpts);
  const maintenanceQueue = new Queue<MaintenanceJobData>(QUEUE_NAMES.MAINTENANCE, defaultOpts);

  return { ingestQueue, generateQueue, maintenanceQueue };
}

export type Queues = ReturnType<typeof createQueues>;

/** Registers (or updates) the daily job that expires old passages. */
export async function scheduleRetentionCleanup(
  queue: Queue<MaintenanceJobData>,
  retentionDays: number,
  everyMs: number = DAY_MS,
): Promise<void> {
  await queue.upsertJobScheduler(
    RETENTION_SCHEDULER_ID,
    { every: everyMs },
    {
      name: "expire-passages",
      data: { type: "maintenance", action: "expire-passages", retentionDays },
    },
  );
}
