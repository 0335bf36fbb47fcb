import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";

const captured = vi.hoisted(() => ({
  processor: undefined as ((job: unknown) => Promise<unknown>) | undefined,
  listeners: {} as Record<string, ((...args: unknown[]) => void)[]>,
}));

vi.mock("../../lib/redis.js", () => ({
  getRedisClient: vi.fn().mockReturnValue({ on: vi.fn() }),
}));

vi.mock("bullmq", () => {
  class UnrecoverableError extends Error {
    constructor(message?: string) {
      super(message);
      this.name = "UnrecoverableError";
    }
  }

  const MockWorker = vi
    .fn()
    .mockImplementation(
      (_queueName: string, processor: (job: unknown) => Promise<unknown>) => {
        captured.processor = processor;
        return {
          on: vi.fn((event: string, handler: (...args: unknown[]) => void) => {
            (captured.listeners[event] ??= []).push(handler);
          }),
        };
      },
    );

  return { Worker: MockWorker, UnrecoverableError };
});

import { UnrecoverableError, Worker } from "bullmq";
import { startDispatchWorker } from "./dispatch.worker.js";
import { DISPATCH_QUEUE_NAME, type DispatchJobData } from "./dispatch.types.js";
import { registerProviders } from "../../modules/whatsapp/providers/index.js";
import { GatewaySendFailedError } from "../../modules/whatsapp/whatsapp.interface.js";
import {
  buildExternalRestGateway,
  buildServices,
  type FakeServices,
} from "../../testing/fakes.js";

const DATA: DispatchJobData = {
  gatewayId: "gw-rest",
  message: "Hello",
  phoneNumber: "3331234567",
  sourceModel: null,
  sourceRecordId: null,
  templateId: null,
};

function buildJob(overrides: { name?: string; data?: DispatchJobData } = {}) {
  return {
    id: "job-1",
    name: overrides.name ?? "send-message",
    data: overrides.data ?? DATA,
    attemptsMade: 0,
  };
}

function runProcessor(job: unknown): Promise<unknown> {
  if (!captured.processor) throw new Error("worker was not started");
  return captured.processor(job);
}

function stubFetch(status: number, body: string) {
  vi.stubGlobal(
    "fetch",
    vi.fn().mockResolvedValue({
      ok: status >= 200 && status < 300,
      status,
      text: () => Promise.resolve(body),
    }),
  );
}

describe("startDispatchWorker", () => {
  let services: FakeServices;

  beforeAll(() => {
    registerProviders();
  });

  beforeEach(() => {
    vi.clearAllMocks();
    captured.processor = undefined;
    captured.listeners = {};
    services = buildServices({ gateways: [buildExternalRestGateway()] });
    startDispatchWorker(services);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("consumes the dispatch queue with the configured concurrency", () => {
    expect(Worker).toHaveBeenCalledWith(
      DISPATCH_QUEUE_NAME,
      expect.any(Function),
      expect.objectContaining({ concurrency: 5 }),
    );
    expect(Object.keys(captured.listeners).sort()).toEqual(["completed", "failed"]);
  });

  it("dispatches the job and tags the log entry with its id", async () => {
    stubFetch(200, "queued");

    const result = await runProcessor(buildJob());

    expect(result).toMatchObject({ logId: "log-1", status: "success" });
    expect(services.logs.entries[0]?.jobId).toBe("job-1");
  });

  it("lets provider failures through so the queue can retry", async () => {
    stubFetch(502, "bad gateway");

    await expect(runProcessor(buildJob())).rejects.toThrow(GatewaySendFailedError);
    expect(services.logs.entries).toHaveLength(1);
  });

  it("marks a missing gateway as unrecoverable", async () => {
    const job = buildJob({ data: { ...DATA, gatewayId: "gw-gone" } });

    await expect(runProcessor(job)).rejects.toThrow(UnrecoverableError);
    await expect(runProcessor(job)).rejects.toThrow("Gateway gw-gone not found");
  });

  it("marks an undialable number as unrecoverable", async () => {
    const job = buildJob({ data: { ...DATA, phoneNumber: "none" } });

    await expect(runProcessor(job)).rejects.toThrow(UnrecoverableError);
  });

  it("rejects unknown job names", async () => {
    await expect(runProcessor(buildJob({ name: "send-fax" }))).rejects.toThrow(
      'Unsupported job "send-fax" on whatsapp-dispatch',
    );
  });
});
