import type { ConnectionOptions } from "bullmq";

const DEFAULT_REDIS_PORT = 6379;

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : undefined;

  return {
    host: parsed.hostname,
    port: Number(parsed.port) || DEFAULT_REDIS_PORT,
    ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(db !== undefined && Number.isInteger(db) ? { db } : {}),
    ...(parsed.protocol === "rediss:" ? { tls: {} } : {}),
    // required by BullMQ workers
    maxRetriesPerRequest: null,
  };
}
