import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import { parseEnv } from "@groundwrite/config";
import { createChildLogger, createLogger, type Logger } from "@groundwrite/logger";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  createQueues,
  parseRedisConnection,
  scheduleRetentionCleanup,
  type DeadLetterQueue,
} from "@groundwrite/queue";
import type { AnyJobData, AppConfig, IngestJobData, MaintenanceJobData, ModelJobData } from "@groundwrite/types";
import { createWorkerDependencies, type WorkerDependencies } from "./container.js";
import { processIngest } from "./processors/ingest.js";
import { processGenerate } from "./processors/generate.js";
import { processMaintenance } from "./processors/maintenance.js";
import { forwardToDeadLetter } from "./dead-letter.js";
import { toJobError } from "./processors/job-errors.js";

async function runJob<T>(job: Job, logger: Logger, fn: (log: Logger) => Promise<T>): Promise<T> {
  const log = createChildLogger(logger, { jobId: job.id, jobName: job.name, attempt: job.attemptsMade + 1 });
  try {
    const result = await fn(log);
    log.info("job completed");
    return result;
  } catch (err: unknown) {
    log.error({ err }, "job failed");
    throw toJobError(err);
  }
}

function createWorkers(
  connection: ConnectionOptions,
  deps: WorkerDependencies,
  config: AppConfig,
  logger: Logger,
): Worker[] {
  const ingestWorker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    (job) =>
      runJob(job, logger, (log) =>
        processIngest(job.data, {
          ...deps.ingest,
          logger: log,
          onChunked: (chunks) => job.updateProgress({ stage: "chunked", chunks: chunks.length }),
          onIndexed: (indexed) => job.updateProgress({ stage: "indexed", indexed }),
        }),
      ),
    { connection, concurrency: 2 },
  );

  const generateWorker = new Worker<ModelJobData>(
    QUEUE_NAMES.GENERATE,
    (job) => runJob(job, logger, (log) => processGenerate(job.data, { ...deps.generate, logger: log })),
    { connection, concurrency: config.generation.concurrency },
  );

  const maintenanceWorker = new Worker<MaintenanceJobData>(
    QUEUE_NAMES.MAINTENANCE,
    (job) => runJob(job, logger, (log) => processMaintenance(job.data, { ...deps.maintenance, logger: log })),
    { connection, concurrency: 1 },
  );

  return [ingestWorker, generateWorker, maintenanceWorker];
}

function watchFailures<T extends AnyJobData>(worker: Worker<T>, dlq: DeadLetterQueue, logger: Logger): void {
  worker.on("failed", (job, err) => {
    if (!job) return;
    forwardToDeadLetter(job, err, dlq).catch((dlqErr: unknown) => {
      logger.error({ err: dlqErr, jobId: job.id }, "failed to forward job to dead-letter queue");
    });
  });
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "groundwrite-worker" });
  const connection = parseRedisConnection(config.redis.url);

  const deps = createWorkerDependencies(config, logger);
  await deps.ensureIndex();

  const queues = createQueues({ connection });
  await scheduleRetentionCleanup(queues.maintenanceQueue, config.pipeline.passageRetentionDays);

  const dlq = createDeadLetterQueue(connection);
  const workers = createWorkers(connection, deps, config, logger);
  for (const worker of workers) watchFailures(worker, dlq, logger);

  logger.info({ queues: Object.values(QUEUE_NAMES) }, `started ${String(workers.length)} workers`);

  const shutdown = async (): Promise<void> => {
    logger.info("shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await Promise.all([
      queues.ingestQueue.close(),
      queues.generateQueue.close(),
      queues.maintenanceQueue.close(),
      dlq.close(),
    ]);
    await deps.close();
    logger.info("all workers closed");
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err: unknown) => {
  createLogger({ service: "groundwrite-worker" }).fatal({ err }, "worker failed to start");
  process.exit(1);
});
