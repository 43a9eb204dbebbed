import { describe, it, expect, vi } from "vitest";
import { UnrecoverableError } from "bullmq";
import type { GenerateJobData } from "@groundwrite/types";
import { forwardToDeadLetter } from "./dead-letter.js";

const data: GenerateJobData = { type: "generate", ownerId: "user-1", topic: "caching" };

function fakeJob(attemptsMade: number) {
  return { name: "generate", data, queueName: "groundwrite:generate", attemptsMade, opts: { attempts: 3 } };
}

describe("forwardToDeadLetter", () => {
  it("keeps a job that still has attempts left", async () => {
    const dlq = { add: vi.fn() };

    await expect(forwardToDeadLetter(fakeJob(1), new Error("timeout"), dlq)).resolves.toBe(false);
    expect(dlq.add).not.toHaveBeenCalled();
  });

  it("forwards a job that used every attempt", async () => {
    const dlq = { add: vi.fn() };

    await expect(forwardToDeadLetter(fakeJob(3), new Error("timeout"), dlq)).resolves.toBe(true);
    expect(dlq.add).toHaveBeenCalledWith("generate", {
      ...data,
      originalQueue: "groundwrite:generate",
      failureReason: "timeout",
    });
  });

  it("forwards an unrecoverable job straight away", async () => {
    const dlq = { add: vi.fn() };

    await forwardToDeadLetter(fakeJob(1), new UnrecoverableError("INSUFFICIENT_CONTEXT: no context"), dlq);

    expect(dlq.add).toHaveBeenCalledOnce();
  });
});
