import { createDbPool, type DbPool } from "./db";
import { createUnitOfWork, type UnitOfWork } from "./db/unitOfWork";
import { createJobService, type JobService } from "./modules/jobs/jobs.service";
import { type ParsingJob, type ScanConfig, type SheetItem } from "./modules/jobs/jobs.types";
import { createOperatorService, type OperatorService } from "./modules/operators/operators.service";
import { type OmrEngine } from "./modules/processing/processing.engine";
import { type JobExecutor } from "./modules/processing/processing.executor";
import { type ImageSource } from "./modules/processing/processing.images";
import {
  createBackgroundProcessor,
  type BackgroundProcessor,
  type JobHandle,
} from "./modules/processing/processing.worker";
import { createWebhookService, type WebhookService } from "./modules/webhooks/webhooks.service";
import { type FetchLike } from "./utils/http";

export type OrchestratorDeps = {
  /** Defaults to a pg pool built from `DATABASE_URL`. */
  pool?: DbPool;
  engine: OmrEngine;
  imageSource: ImageSource;
  executor?: JobExecutor;
  /** Used for webhook delivery. */
  fetch?: FetchLike;
  engineTimeoutMs?: number;
  imageTimeoutMs?: number;
  webhookTimeoutMs?: number;
};

export type Orchestrator = {
  uow: UnitOfWork;
  jobs: JobService;
  operators: OperatorService;
  webhooks: WebhookService;
  processor: BackgroundProcessor;
  /** Creates the job with its sheets, then hands it to the processor without waiting for the run. */
  submitJob(
    operatorId: string,
    items: SheetItem[],
    scanConfig?: ScanConfig
  ): Promise<{ job: ParsingJob; handle: JobHandle }>;
  close(): Promise<void>;
};

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const pool = deps.pool ?? createDbPool();
  const uow = createUnitOfWork(pool);
  const jobs = createJobService({ uow });
  const operators = createOperatorService({ uow });
  const webhooks = createWebhookService({ uow, fetch: deps.fetch, timeoutMs: deps.webhookTimeoutMs });
  const processor = createBackgroundProcessor({
    jobService: jobs,
    webhookService: webhooks,
    engine: deps.engine,
    imageSource: deps.imageSource,
    executor: deps.executor,
    engineTimeoutMs: deps.engineTimeoutMs,
    imageTimeoutMs: deps.imageTimeoutMs,
  });

  return {
    uow,
    jobs,
    operators,
    webhooks,
    processor,

    async submitJob(operatorId, items, scanConfig) {
      const job = await jobs.createJob(operatorId, items, scanConfig);
      const handle = await processor.submit(job.id);
      return { job, handle };
    },

    async close() {
      await pool.end();
    },
  };
}

export { createDbPool, type DbPool } from "./db";
export { runMigrations, assertNoPendingMigrations, getPendingMigrations } from "./migrations";
export { createUnitOfWork, type UnitOfWork } from "./db/unitOfWork";
export { AppError, RowDecodeError, isAppError } from "./errors/AppError";
export { createJobService, type JobService } from "./modules/jobs/jobs.service";
export * from "./modules/jobs/jobs.types";
export { createOperatorService, type OperatorService } from "./modules/operators/operators.service";
export { type Operator } from "./modules/operators/operators.types";
export { createHttpOmrEngine, EngineError, type OmrEngine } from "./modules/processing/processing.engine";
export {
  createImageSource,
  ImageAcquisitionError,
  type ImageSource,
  type LocalImage,
} from "./modules/processing/processing.images";
export {
  createBackgroundExecutor,
  inlineExecutor,
  type JobExecutor,
} from "./modules/processing/processing.executor";
export {
  createBackgroundProcessor,
  type BackgroundProcessor,
  type JobHandle,
  type JobRunSummary,
} from "./modules/processing/processing.worker";
export {
  createWebhookService,
  type DeliveryResult,
  type WebhookService,
} from "./modules/webhooks/webhooks.service";
export { buildCompletionPayload, type CompletionPayload } from "./modules/webhooks/webhooks.payload";
export { startCallbackSweeper, type CallbackSweeper } from "./modules/webhooks/webhooks.sweeper";
export { TimeoutError } from "./utils/withTimeout";
