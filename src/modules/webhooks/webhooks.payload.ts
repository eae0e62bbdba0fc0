import { countSheetStatuses } from "../jobs/jobs.service";
import { type JobStatus, type OmrSheet, type ParsingJob, type SheetStatus } from "../jobs/jobs.types";

export type CompletionSheetPayload = {
  id: string;
  itemId: string;
  imageLocator: string;
  status: SheetStatus;
  answers?: Record<string, string>;
  ambiguityCount?: number;
  error?: string;
};

export type CompletionPayload = {
  jobId: string;
  status: JobStatus;
  totalSheets: number;
  processedSheets: number;
  successfulSheets: number;
  failedSheets: number;
  createdAt: string;
  completedAt: string | null;
  sheets: CompletionSheetPayload[];
};

function toSheetPayload(sheet: OmrSheet): CompletionSheetPayload {
  const base = {
    id: sheet.id,
    itemId: sheet.itemId,
    imageLocator: sheet.imageLocator,
    status: sheet.status,
  };
  switch (sheet.status) {
    case "PARSED":
      return {
        ...base,
        answers: sheet.result.answers,
        ambiguityCount: sheet.result.ambiguityCount,
      };
    case "FAILED":
      return { ...base, error: sheet.errorMessage };
    case "PENDING":
      return base;
  }
}

export function buildCompletionPayload(job: ParsingJob, sheets: OmrSheet[]): CompletionPayload {
  const counts = countSheetStatuses(sheets);
  return {
    jobId: job.id,
    status: job.status,
    totalSheets: job.totalSheets,
    processedSheets: job.processedSheets,
    successfulSheets: counts.successful,
    failedSheets: counts.failed,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    sheets: sheets.map(toSheetPayload),
  };
}
