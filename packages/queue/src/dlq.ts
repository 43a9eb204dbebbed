import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@groundwrite/types";

export const DLQ_NAME = "groundwrite:dead-letter";

export type DeadLetterJobData = AnyJobData & { originalQueue: string; failureReason: string };

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;
