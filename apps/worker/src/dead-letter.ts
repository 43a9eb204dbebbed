import { UnrecoverableError } from "bullmq";
import type { Job } from "bullmq";
import type { DeadLetterQueue } from "@groundwrite/queue";
import type { AnyJobData } from "@groundwrite/types";

/** A job is dead once it is unrecoverable or has used every attempt. */
export function isExhausted(job: Pick<Job, "attemptsMade" | "opts">, err: Error): boolean {
  return err instanceof UnrecoverableError || job.attemptsMade >= (job.opts.attempts ?? 1);
}

export async function forwardToDeadLetter<T extends AnyJobData>(
  job: Pick<Job<T>, "name" | "data" | "queueName" | "attemptsMade" | "opts">,
  err: Error,
  dlq: Pick<DeadLetterQueue, "add">,
): Promise<boolean> {
  if (!isExhausted(job, err)) return false;
  await dlq.add(job.name, { ...job.data, originalQueue: job.queueName, failureReason: err.message });
  return true;
}
