import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTestStore, seedOperator, type TestStore } from "../../../test/db";
import {
  createFakeFetch,
  createFakeImageSource,
  createScriptedEngine,
  type EngineScript,
  type FakeFetch,
  type FakeImageSource,
} from "../../../test/fakes";
import { createJobService, type JobService } from "../../jobs/jobs.service";
import { type SheetItem } from "../../jobs/jobs.types";
import { createWebhookService } from "../../webhooks/webhooks.service";
import { type CompletionPayload } from "../../webhooks/webhooks.payload";
import { createBackgroundExecutor, inlineExecutor } from "../processing.executor";
import { createBackgroundProcessor } from "../processing.worker";

const answersA = { answers: { "1": "A", "2": "B" }, ambiguityCount: 0 };
const answersB = { answers: { "1": "C", "2": "" }, ambiguityCount: 1 };

describe("background processor", () => {
  let store: TestStore;
  let jobService: JobService;
  let operatorId: string;
  let images: FakeImageSource;
  let http: FakeFetch;

  function buildProcessor(
    script: Record<string, EngineScript>,
    options: {
      jobService?: JobService;
      engineTimeoutMs?: number;
      imageTimeoutMs?: number;
      statuses?: Array<number | "network">;
    } = {}
  ) {
    http = createFakeFetch(options.statuses ?? [200]);
    const engine = createScriptedEngine(script);
    const processor = createBackgroundProcessor({
      jobService: options.jobService ?? jobService,
      webhookService: createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 }),
      engine,
      imageSource: images,
      executor: inlineExecutor,
      engineTimeoutMs: options.engineTimeoutMs ?? 1000,
      imageTimeoutMs: options.imageTimeoutMs ?? 1000,
    });
    return { processor, engine };
  }

  async function createJob(items: SheetItem[]) {
    return jobService.createJob(operatorId, items, { template: "grid-20" });
  }

  function deliveredPayload(index = 0): CompletionPayload {
    return JSON.parse(http.requests[index].body);
  }

  beforeEach(async () => {
    store = await createTestStore();
    jobService = createJobService({ uow: store.uow });
    operatorId = (await seedOperator(store.uow, "https://grader.test/hook")).id;
    images = createFakeImageSource();
  });

  afterEach(async () => {
    await store.pool.end();
  });

  it("resolves every sheet, completes the job and notifies the operator", async () => {
    const job = await createJob([
      { id: "s1", locator: "/scans/1.png" },
      { id: "s2", locator: "/scans/2.png" },
      { id: "s3", locator: "missing:/scans/3.png" },
    ]);
    const { processor } = buildProcessor({ "/scans/1.png": answersA, "/scans/2.png": answersB });

    const handle = await processor.submit(job.id);
    const summary = await handle.done;

    expect(summary).toMatchObject({
      jobId: job.id,
      attemptedSheets: 3,
      successfulSheets: 2,
      failedSheets: 1,
      finalize: { finalized: true, status: "COMPLETED" },
      delivery: { delivered: true, httpStatus: 200 },
    });

    const stored = await jobService.getJob(job.id);
    expect(stored).toMatchObject({
      status: "COMPLETED",
      processedSheets: 3,
      callbackStatus: "SENT",
      callbackAttempts: 1,
    });

    const sheets = await jobService.getSheets(job.id);
    expect(sheets.map((sheet) => sheet.status)).toEqual(["PARSED", "PARSED", "FAILED"]);
    expect(sheets[0].result).toEqual(answersA);
    expect(sheets[2].errorMessage).toBe("image_acquisition_failed:file_unreadable:ENOENT");
    expect(images.released).toEqual(["/scans/1.png", "/scans/2.png"]);

    expect(http.requests).toHaveLength(1);
    expect(http.requests[0].url).toBe("https://grader.test/hook");
    expect(http.requests[0].method).toBe("POST");
    const payload = deliveredPayload();
    expect(payload).toMatchObject({
      jobId: job.id,
      status: "COMPLETED",
      totalSheets: 3,
      processedSheets: 3,
      successfulSheets: 2,
      failedSheets: 1,
    });
    expect(payload.sheets[1]).toEqual({
      id: sheets[1].id,
      itemId: "s2",
      imageLocator: "/scans/2.png",
      status: "PARSED",
      answers: { "1": "C", "2": "" },
      ambiguityCount: 1,
    });
    expect(payload.sheets[2]).toEqual({
      id: sheets[2].id,
      itemId: "s3",
      imageLocator: "missing:/scans/3.png",
      status: "FAILED",
      error: "image_acquisition_failed:file_unreadable:ENOENT",
    });
  });

  it("fails the job when every sheet fails recognition", async () => {
    const job = await createJob([
      { id: "s1", locator: "/scans/blank-1.png" },
      { id: "s2", locator: "/scans/blank-2.png" },
    ]);
    const { processor } = buildProcessor({});

    const summary = await processor.processJob(job.id);

    expect(summary?.finalize).toEqual({ finalized: true, status: "FAILED" });
    const sheets = await jobService.getSheets(job.id);
    expect(sheets.map((sheet) => sheet.errorMessage)).toEqual([
      "recognition_failed:no_marks_detected",
      "recognition_failed:no_marks_detected",
    ]);
    expect(deliveredPayload()).toMatchObject({ status: "FAILED", successfulSheets: 0, failedSheets: 2 });
  });

  it("records an engine timeout as the sheet's failure and releases the image", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/slow.png" }]);
    const { processor } = buildProcessor({ "/scans/slow.png": "hang" }, { engineTimeoutMs: 20 });

    await processor.processJob(job.id);

    const [sheet] = await jobService.getSheets(job.id);
    expect(sheet.status).toBe("FAILED");
    expect(sheet.errorMessage).toBe("recognition_failed:omr engine timed out after 20ms");
    expect(images.released).toEqual(["/scans/slow.png"]);
  });

  it("fails a sheet whose image never arrives and moves on", async () => {
    const job = await createJob([
      { id: "s1", locator: "hang:/scans/1.png" },
      { id: "s2", locator: "/scans/2.png" },
    ]);
    const { processor, engine } = buildProcessor({ "/scans/2.png": answersB }, { imageTimeoutMs: 20 });

    const summary = await processor.processJob(job.id);

    expect(summary).toMatchObject({ successfulSheets: 1, failedSheets: 1 });
    expect(engine.calls).toEqual(["/scans/2.png"]);
    const sheets = await jobService.getSheets(job.id);
    expect(sheets[0].errorMessage).toBe("image_acquisition_failed:image acquisition timed out after 20ms");
    expect(sheets[1].status).toBe("PARSED");
  });

  it("rejects a malformed engine result", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    const { processor } = buildProcessor({
      "/scans/1.png": { answers: { "1": "A" }, ambiguityCount: -1 },
    });

    await processor.processJob(job.id);

    const [sheet] = await jobService.getSheets(job.id);
    expect(sheet.errorMessage).toBe("recognition_failed:omr_engine_invalid_response:ambiguityCount");
  });

  it("passes the stored scan config to the engine", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    const received: unknown[] = [];
    http = createFakeFetch([200]);
    const processor = createBackgroundProcessor({
      jobService,
      webhookService: createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 }),
      engine: {
        async recognize(_image, scanConfig) {
          received.push(scanConfig);
          return answersA;
        },
      },
      imageSource: images,
      executor: inlineExecutor,
    });

    await processor.processJob(job.id);

    expect(received).toEqual([{ template: "grid-20" }]);
  });

  it("keeps the job status when webhook delivery fails", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    const { processor } = buildProcessor({ "/scans/1.png": answersA }, { statuses: [500] });

    const summary = await processor.processJob(job.id);

    expect(summary?.delivery).toEqual({
      jobId: job.id,
      delivered: false,
      reason: "http_error",
      httpStatus: 500,
    });
    expect(await jobService.getJob(job.id)).toMatchObject({
      status: "COMPLETED",
      callbackStatus: "FAILED",
    });
  });

  it("skips a job that is already terminal", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    const { processor, engine } = buildProcessor({ "/scans/1.png": answersA });
    await processor.processJob(job.id);

    expect(await processor.processJob(job.id)).toBeNull();
    expect(engine.calls).toEqual(["/scans/1.png"]);
    expect(http.requests).toHaveLength(1);
  });

  it("returns null for an unknown job", async () => {
    const { processor } = buildProcessor({});

    const handle = await processor.submit("missing");

    expect(handle.jobId).toBe("missing");
    expect(await handle.done).toBeNull();
    expect(http.requests).toHaveLength(0);
  });

  it("resumes a stuck job from its remaining pending sheets", async () => {
    const job = await createJob([
      { id: "s1", locator: "/scans/1.png" },
      { id: "s2", locator: "/scans/2.png" },
    ]);
    const [first] = await jobService.getSheets(job.id);
    await jobService.startProcessing(job.id);
    await jobService.recordSheetSuccess(first.id, answersA);
    await jobService.incrementProgress(job.id);
    const { processor, engine } = buildProcessor({ "/scans/2.png": answersB });

    const summary = await processor.processJob(job.id);

    expect(engine.calls).toEqual(["/scans/2.png"]);
    expect(summary?.finalize).toEqual({ finalized: true, status: "COMPLETED" });
    expect(await jobService.getJob(job.id)).toMatchObject({ processedSheets: 2, status: "COMPLETED" });
  });

  it("continues past a sheet whose result could not be stored", async () => {
    const job = await createJob([
      { id: "s1", locator: "/scans/1.png" },
      { id: "s2", locator: "/scans/2.png" },
    ]);
    const [first] = await jobService.getSheets(job.id);
    const flaky: JobService = {
      ...jobService,
      async recordSheetOutcome(sheetId, outcome) {
        if (sheetId === first.id) {
          throw new Error("connection terminated unexpectedly");
        }
        return jobService.recordSheetOutcome(sheetId, outcome);
      },
    };
    const { processor, engine } = buildProcessor(
      { "/scans/1.png": answersA, "/scans/2.png": answersB },
      { jobService: flaky }
    );

    const summary = await processor.processJob(job.id);

    expect(engine.calls).toEqual(["/scans/1.png", "/scans/2.png"]);
    expect(summary?.finalize).toEqual({ finalized: false, reason: "sheets_pending", pendingSheets: 1 });
    expect(await jobService.getJob(job.id)).toMatchObject({ status: "PROCESSING", processedSheets: 2 });
    const sheets = await jobService.getSheets(job.id);
    expect(sheets.map((sheet) => sheet.status)).toEqual(["PENDING", "PARSED"]);
  });

  it("hands runs to a background executor without waiting for them", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    http = createFakeFetch([200]);
    const executor = createBackgroundExecutor();
    const processor = createBackgroundProcessor({
      jobService,
      webhookService: createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 }),
      engine: createScriptedEngine({ "/scans/1.png": answersA }),
      imageSource: images,
      executor,
      engineTimeoutMs: 1000,
    });

    const handle = await processor.submit(job.id);

    expect(executor.inFlight()).toBe(1);
    expect((await handle.done)?.finalize).toEqual({ finalized: true, status: "COMPLETED" });
    await executor.drain();
    expect(executor.inFlight()).toBe(0);
  });

  it("runs a job once when it is submitted again while running", async () => {
    const job = await createJob([
      { id: "s1", locator: "/scans/1.png" },
      { id: "s2", locator: "/scans/2.png" },
    ]);
    http = createFakeFetch([200]);
    const engine = createScriptedEngine({ "/scans/1.png": answersA, "/scans/2.png": answersB });
    const executor = createBackgroundExecutor();
    const processor = createBackgroundProcessor({
      jobService,
      webhookService: createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 }),
      engine,
      imageSource: images,
      executor,
      engineTimeoutMs: 1000,
    });

    const first = await processor.submit(job.id);
    const second = await processor.submit(job.id);

    expect(await second.done).toBeNull();
    expect((await first.done)?.attemptedSheets).toBe(2);
    await executor.drain();
    expect(engine.calls).toEqual(["/scans/1.png", "/scans/2.png"]);
    expect(http.requests).toHaveLength(1);
    expect(await jobService.getJob(job.id)).toMatchObject({ processedSheets: 2, callbackAttempts: 1 });
  });

  it("sends one webhook when a pending sweep runs during the completion POST", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    http = createFakeFetch([200], { delayMs: 200 });
    const webhookService = createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 });
    const processor = createBackgroundProcessor({
      jobService,
      webhookService,
      engine: createScriptedEngine({ "/scans/1.png": answersA }),
      imageSource: images,
      executor: createBackgroundExecutor(),
      engineTimeoutMs: 1000,
    });

    const handle = await processor.submit(job.id);
    await vi.waitFor(() => expect(http.requests).toHaveLength(1), { interval: 5 });

    expect(await webhookService.deliverPendingCallbacks()).toBe(0);
    expect((await handle.done)?.delivery).toEqual({ jobId: job.id, delivered: true, httpStatus: 200 });
    expect(http.requests).toHaveLength(1);
    expect(await jobService.getJob(job.id)).toMatchObject({ callbackStatus: "SENT", callbackAttempts: 1 });
  });

  it("leaves the webhook to a sweep that claimed it first", async () => {
    const job = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    http = createFakeFetch([200]);
    const webhookService = createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 });
    const processor = createBackgroundProcessor({
      jobService,
      webhookService: {
        async sendCompletion(jobId, options) {
          await webhookService.deliverPendingCallbacks();
          return webhookService.sendCompletion(jobId, options);
        },
      },
      engine: createScriptedEngine({ "/scans/1.png": answersA }),
      imageSource: images,
      executor: inlineExecutor,
      engineTimeoutMs: 1000,
    });

    const summary = await processor.processJob(job.id);

    expect(summary?.delivery).toEqual({
      jobId: job.id,
      delivered: false,
      reason: "already_claimed",
      httpStatus: null,
    });
    expect(http.requests).toHaveLength(1);
    expect(await jobService.getJob(job.id)).toMatchObject({ callbackStatus: "SENT", callbackAttempts: 1 });
  });

  it("runs several jobs concurrently on the background executor", async () => {
    const first = await createJob([{ id: "s1", locator: "/scans/1.png" }]);
    const second = await createJob([{ id: "s1", locator: "/scans/2.png" }]);
    http = createFakeFetch([200]);
    const executor = createBackgroundExecutor();
    const processor = createBackgroundProcessor({
      jobService,
      webhookService: createWebhookService({ uow: store.uow, fetch: http.fetch, timeoutMs: 1000 }),
      engine: createScriptedEngine({ "/scans/1.png": answersA, "/scans/2.png": answersB }),
      imageSource: images,
      executor,
      engineTimeoutMs: 1000,
    });

    await processor.submit(first.id);
    await processor.submit(second.id);
    await executor.drain();

    expect((await jobService.getJob(first.id))?.status).toBe("COMPLETED");
    expect((await jobService.getJob(second.id))?.status).toBe("COMPLETED");
    expect(http.requests).toHaveLength(2);
  });
});
