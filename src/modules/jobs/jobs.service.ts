import { randomUUID } from "crypto";
import { type UnitOfWork } from "../../db/unitOfWork";
import { getDbFailureCategory } from "../../dbRuntime";
import { isAppError, notFoundError, persistenceError } from "../../errors/AppError";
import { describeError, logError, logInfo, logWarn } from "../../observability/logger";
import { parseCreateJobInput, parseEntityId } from "./jobs.validation";
import {
  isTerminalJobStatus,
  type FinalizeResult,
  type JobStatistics,
  type OmrSheet,
  type ParsingJob,
  type RecognitionResult,
  type ScanConfig,
  type SheetItem,
  type SheetOutcome,
} from "./jobs.types";

export type JobService = {
  createJob(operatorId: string, items: SheetItem[], scanConfig?: ScanConfig): Promise<ParsingJob>;
  getJob(jobId: string): Promise<ParsingJob | null>;
  getSheets(jobId: string): Promise<OmrSheet[]>;
  getPendingSheets(jobId: string): Promise<OmrSheet[]>;
  listJobsForOperator(operatorId: string): Promise<ParsingJob[]>;
  startProcessing(jobId: string): Promise<boolean>;
  recordSheetSuccess(sheetId: string, result: RecognitionResult): Promise<boolean>;
  recordSheetFailure(sheetId: string, errorMessage: string): Promise<boolean>;
  recordSheetOutcome(sheetId: string, outcome: SheetOutcome): Promise<boolean>;
  incrementProgress(jobId: string): Promise<number | null>;
  finalize(jobId: string): Promise<FinalizeResult>;
  statistics(jobId: string): Promise<JobStatistics | null>;
};

export function countSheetStatuses(sheets: OmrSheet[]): {
  successful: number;
  failed: number;
  pending: number;
} {
  let successful = 0;
  let failed = 0;
  let pending = 0;
  for (const sheet of sheets) {
    if (sheet.status === "PARSED") successful += 1;
    else if (sheet.status === "FAILED") failed += 1;
    else pending += 1;
  }
  return { successful, failed, pending };
}

/** Every sheet failed: FAILED. At least one parsed: COMPLETED, partial success included. */
export function resolveTerminalStatus(sheets: OmrSheet[]): "COMPLETED" | "FAILED" {
  return sheets.every((sheet) => sheet.status === "FAILED") ? "FAILED" : "COMPLETED";
}

export function createJobService(deps: { uow: UnitOfWork }): JobService {
  const { uow } = deps;

  async function recordSheetSuccess(sheetId: string, result: RecognitionResult): Promise<boolean> {
    const updated = await uow.sheets.updateParsed(sheetId, result);
    if (updated) {
      logInfo("omr_sheet_parsed", { sheetId, ambiguityCount: result.ambiguityCount });
    } else {
      logWarn("omr_sheet_resolution_skipped", { sheetId, outcome: "success" });
    }
    return updated;
  }

  async function recordSheetFailure(sheetId: string, errorMessage: string): Promise<boolean> {
    const updated = await uow.sheets.updateFailed(sheetId, errorMessage);
    if (updated) {
      logWarn("omr_sheet_failed", { sheetId, error: errorMessage });
    } else {
      logWarn("omr_sheet_resolution_skipped", { sheetId, outcome: "failure" });
    }
    return updated;
  }

  return {
    async createJob(operatorId, items, scanConfig = {}) {
      const input = parseCreateJobInput({ operatorId, items, scanConfig });

      if (!(await uow.operators.exists(input.operatorId))) {
        throw notFoundError("operator", input.operatorId);
      }

      const jobId = randomUUID();
      try {
        const job = await uow.beginTransaction(async (tx) => {
          const created = await tx.jobs.create({
            id: jobId,
            operatorId: input.operatorId,
            totalSheets: input.items.length,
            scanConfig: input.scanConfig,
          });
          for (const [index, item] of input.items.entries()) {
            await tx.sheets.create({
              id: randomUUID(),
              jobId,
              itemId: item.id,
              itemIndex: index,
              imageLocator: item.locator,
            });
          }
          return created;
        });
        logInfo("omr_job_created", {
          jobId: job.id,
          operatorId: job.operatorId,
          totalSheets: job.totalSheets,
        });
        return job;
      } catch (error) {
        if (isAppError(error)) {
          throw error;
        }
        logError("omr_job_create_failed", {
          jobId,
          operatorId: input.operatorId,
          error: describeError(error),
          category: getDbFailureCategory(error),
        });
        throw persistenceError("Job could not be created.", error);
      }
    },

    async getJob(jobId) {
      return uow.jobs.findById(parseEntityId(jobId, "job id"));
    },

    async getSheets(jobId) {
      return uow.sheets.findByJob(parseEntityId(jobId, "job id"));
    },

    async getPendingSheets(jobId) {
      return uow.sheets.findByJobAndStatus(parseEntityId(jobId, "job id"), "PENDING");
    },

    async listJobsForOperator(operatorId) {
      return uow.jobs.findByOperator(parseEntityId(operatorId, "operator id"));
    },

    async startProcessing(jobId) {
      const transitioned = await uow.jobs.markProcessing(jobId);
      if (transitioned) {
        logInfo("omr_job_processing", { jobId });
      }
      return transitioned;
    },

    recordSheetSuccess,

    recordSheetFailure,

    async recordSheetOutcome(sheetId, outcome) {
      if (outcome.kind === "success") {
        return recordSheetSuccess(sheetId, {
          answers: outcome.answers,
          ambiguityCount: outcome.ambiguityCount,
        });
      }
      return recordSheetFailure(sheetId, outcome.reason);
    },

    async incrementProgress(jobId) {
      return uow.jobs.incrementProcessed(jobId);
    },

    async finalize(jobId) {
      const job = await uow.jobs.findById(jobId);
      if (!job) {
        logError("omr_job_finalize_missing", { jobId });
        return { finalized: false, reason: "job_not_found", pendingSheets: 0 };
      }
      if (isTerminalJobStatus(job.status)) {
        return { finalized: false, reason: "already_terminal", pendingSheets: 0 };
      }

      const sheets = await uow.sheets.findByJob(jobId);
      const { pending } = countSheetStatuses(sheets);
      if (pending > 0) {
        logWarn("omr_job_finalize_premature", { jobId, pendingSheets: pending });
        return { finalized: false, reason: "sheets_pending", pendingSheets: pending };
      }

      const status = resolveTerminalStatus(sheets);
      const updated = await uow.jobs.markTerminal(jobId, status);
      if (!updated) {
        return { finalized: false, reason: "already_terminal", pendingSheets: 0 };
      }
      logInfo("omr_job_finalized", { jobId, status, totalSheets: sheets.length });
      return { finalized: true, status };
    },

    async statistics(jobId) {
      const job = await uow.jobs.findById(parseEntityId(jobId, "job id"));
      if (!job) {
        return null;
      }
      const sheets = await uow.sheets.findByJob(job.id);
      const counts = countSheetStatuses(sheets);
      return {
        jobId: job.id,
        status: job.status,
        totalSheets: job.totalSheets,
        processedSheets: job.processedSheets,
        successfulSheets: counts.successful,
        failedSheets: counts.failed,
        pendingSheets: counts.pending,
        callbackStatus: job.callbackStatus,
        createdAt: job.createdAt,
        completedAt: job.completedAt,
      };
    },
  };
}
