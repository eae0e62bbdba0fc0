import { getImageDownloadTimeoutMs, getOmrEngineTimeoutMs } from "../../config";
import { getDbFailureCategory } from "../../dbRuntime";
import { runWithJobContext, getRunDurationMs } from "../../observability/jobContext";
import { describeError, logError, logInfo, logWarn } from "../../observability/logger";
import { TimeoutError, withTimeout } from "../../utils/withTimeout";
import { type JobService } from "../jobs/jobs.service";
import {
  isTerminalJobStatus,
  type FinalizeResult,
  type OmrSheet,
  type ScanConfig,
  type SheetOutcome,
} from "../jobs/jobs.types";
import { type DeliveryResult, type WebhookService } from "../webhooks/webhooks.service";
import { parseRecognitionResult, type OmrEngine } from "./processing.engine";
import { createBackgroundExecutor, type JobExecutor } from "./processing.executor";
import { releaseQuietly, type ImageSource, type LocalImage } from "./processing.images";

export type JobRunSummary = {
  jobId: string;
  attemptedSheets: number;
  successfulSheets: number;
  failedSheets: number;
  finalize: FinalizeResult;
  delivery: DeliveryResult;
};

export type JobHandle = {
  jobId: string;
  /** Settles when the run ends. Never rejects; `null` when the run was skipped or aborted. */
  done: Promise<JobRunSummary | null>;
};

export type BackgroundProcessorDeps = {
  jobService: JobService;
  webhookService: Pick<WebhookService, "sendCompletion">;
  engine: OmrEngine;
  imageSource: ImageSource;
  executor?: JobExecutor;
  engineTimeoutMs?: number;
  imageTimeoutMs?: number;
};

export type BackgroundProcessor = {
  submit(jobId: string): Promise<JobHandle>;
  processJob(jobId: string): Promise<JobRunSummary | null>;
};

export function createBackgroundProcessor(deps: BackgroundProcessorDeps): BackgroundProcessor {
  const { jobService, webhookService, engine, imageSource } = deps;
  const executor = deps.executor ?? createBackgroundExecutor();
  const running = new Set<string>();

  async function resolveSheet(sheet: OmrSheet, scanConfig: ScanConfig): Promise<SheetOutcome> {
    const timeoutMs = deps.engineTimeoutMs ?? getOmrEngineTimeoutMs();
    const imageTimeoutMs = deps.imageTimeoutMs ?? getImageDownloadTimeoutMs();
    const acquisition = imageSource.fetch(sheet.imageLocator);
    let image: LocalImage;
    try {
      image = await withTimeout(acquisition, imageTimeoutMs, "image acquisition");
    } catch (error) {
      if (error instanceof TimeoutError) {
        // A fetch that settles after the deadline still owns a file to remove.
        void acquisition.then(releaseQuietly, (lateError: unknown) => {
          logWarn("omr_image_late_failure", { sheetId: sheet.id, error: describeError(lateError) });
        });
      }
      return { kind: "failure", reason: `image_acquisition_failed:${describeError(error)}` };
    }
    try {
      const raw = await withTimeout(engine.recognize(image, scanConfig), timeoutMs, "omr engine");
      return { kind: "success", ...parseRecognitionResult(raw) };
    } catch (error) {
      return { kind: "failure", reason: `recognition_failed:${describeError(error)}` };
    } finally {
      await releaseQuietly(image);
    }
  }

  async function runJob(jobId: string): Promise<JobRunSummary | null> {
    const job = await jobService.getJob(jobId);
    if (!job) {
      logWarn("omr_job_run_skipped", { jobId, reason: "job_not_found" });
      return null;
    }
    if (isTerminalJobStatus(job.status)) {
      logInfo("omr_job_run_skipped", { jobId, reason: "already_terminal", status: job.status });
      return null;
    }

    const started = await jobService.startProcessing(jobId);
    if (!started) {
      logInfo("omr_job_run_resumed", { jobId, status: job.status });
    }
    const sheets = await jobService.getPendingSheets(jobId);
    logInfo("omr_job_run_started", { jobId, pendingSheets: sheets.length });

    let successfulSheets = 0;
    let failedSheets = 0;
    for (const sheet of sheets) {
      const outcome = await resolveSheet(sheet, job.scanConfig);
      if (outcome.kind === "success") successfulSheets += 1;
      else failedSheets += 1;

      try {
        await jobService.recordSheetOutcome(sheet.id, outcome);
      } catch (error) {
        logError("omr_sheet_record_failed", {
          jobId,
          sheetId: sheet.id,
          outcome: outcome.kind,
          error: describeError(error),
          category: getDbFailureCategory(error),
        });
      }

      try {
        await jobService.incrementProgress(jobId);
      } catch (error) {
        logError("omr_job_progress_failed", {
          jobId,
          sheetId: sheet.id,
          error: describeError(error),
          category: getDbFailureCategory(error),
        });
      }
    }

    const finalize = await jobService.finalize(jobId);
    const delivery = await webhookService.sendCompletion(jobId, {
      expectedAttempts: job.callbackAttempts,
    });

    logInfo("omr_job_run_finished", {
      jobId,
      attemptedSheets: sheets.length,
      successfulSheets,
      failedSheets,
      finalized: finalize.finalized,
      delivered: delivery.delivered,
      durationMs: getRunDurationMs(),
    });

    return {
      jobId,
      attemptedSheets: sheets.length,
      successfulSheets,
      failedSheets,
      finalize,
      delivery,
    };
  }

  async function processJob(jobId: string): Promise<JobRunSummary | null> {
    if (running.has(jobId)) {
      logInfo("omr_job_run_skipped", { jobId, reason: "already_running" });
      return null;
    }
    running.add(jobId);
    try {
      return await runWithJobContext(jobId, async () => {
        try {
          return await runJob(jobId);
        } catch (error) {
          // The job stays PROCESSING; submitting it again resumes the remaining sheets.
          logError("omr_job_run_failed", {
            jobId,
            error: describeError(error),
            category: getDbFailureCategory(error),
          });
          return null;
        }
      });
    } finally {
      running.delete(jobId);
    }
  }

  return {
    async submit(jobId) {
      let settle: (summary: JobRunSummary | null) => void = () => undefined;
      const done = new Promise<JobRunSummary | null>((resolve) => {
        settle = resolve;
      });
      try {
        await executor.execute(async () => {
          settle(await processJob(jobId));
        });
      } catch (error) {
        logError("omr_job_submit_failed", { jobId, error: describeError(error) });
        settle(null);
      }
      return { jobId, done };
    },

    processJob,
  };
}
