import { z } from "zod";
import { RowDecodeError } from "../../errors/AppError";
import {
  CALLBACK_STATUSES,
  JOB_STATUSES,
  SHEET_STATUSES,
  type OmrSheet,
  type OmrSheetRecord,
  type ParsingJob,
  type ParsingJobRecord,
  type RecognitionResult,
  type ScanConfig,
} from "./jobs.types";

export const recognitionResultSchema = z.object({
  answers: z.record(z.string()),
  ambiguityCount: z.number().int().min(0),
});

export const scanConfigSchema = z.record(z.unknown());

const timestampSchema = z.coerce.date();

const parsingJobRowSchema = z.object({
  id: z.string(),
  operator_id: z.string(),
  status: z.enum(JOB_STATUSES),
  total_sheets: z.coerce.number().int().min(0),
  processed_sheets: z.coerce.number().int().min(0),
  callback_status: z.enum(CALLBACK_STATUSES),
  callback_attempts: z.coerce.number().int().min(0),
  scan_config_json: z.string(),
  created_at: timestampSchema,
  completed_at: timestampSchema.nullable(),
});

const omrSheetRowSchema = z.object({
  id: z.string(),
  parsing_job_id: z.string(),
  item_id: z.string(),
  item_index: z.coerce.number().int().min(0),
  image_url: z.string(),
  result_json: z.string().nullable(),
  status: z.enum(SHEET_STATUSES),
  error_message: z.string().nullable(),
  created_at: timestampSchema,
  resolved_at: timestampSchema.nullable(),
});

function parseJsonColumn(table: string, rowId: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new RowDecodeError(table, rowId, "malformed_json");
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "row"}:${issue.message}`).join(";");
}

export function serializeRecognitionResult(result: RecognitionResult): string {
  return JSON.stringify({ answers: result.answers, ambiguityCount: result.ambiguityCount });
}

export function serializeScanConfig(config: ScanConfig): string {
  return JSON.stringify(config);
}

export function decodeParsingJob(record: ParsingJobRecord): ParsingJob {
  const parsed = parsingJobRowSchema.safeParse(record);
  if (!parsed.success) {
    throw new RowDecodeError("parsing_jobs", record.id, describeIssues(parsed.error));
  }
  const row = parsed.data;
  const scanConfig = scanConfigSchema.safeParse(parseJsonColumn("parsing_jobs", row.id, row.scan_config_json));
  if (!scanConfig.success) {
    throw new RowDecodeError("parsing_jobs", row.id, "scan_config_not_object");
  }
  const terminal = row.status === "COMPLETED" || row.status === "FAILED";
  if (terminal !== (row.completed_at !== null)) {
    throw new RowDecodeError("parsing_jobs", row.id, "completed_at_mismatch");
  }
  return {
    id: row.id,
    operatorId: row.operator_id,
    status: row.status,
    totalSheets: row.total_sheets,
    processedSheets: row.processed_sheets,
    callbackStatus: row.callback_status,
    callbackAttempts: row.callback_attempts,
    scanConfig: scanConfig.data,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

export function decodeOmrSheet(record: OmrSheetRecord): OmrSheet {
  const parsed = omrSheetRowSchema.safeParse(record);
  if (!parsed.success) {
    throw new RowDecodeError("omr_sheets", record.id, describeIssues(parsed.error));
  }
  const row = parsed.data;
  const base = {
    id: row.id,
    jobId: row.parsing_job_id,
    itemId: row.item_id,
    itemIndex: row.item_index,
    imageLocator: row.image_url,
    createdAt: row.created_at,
  };

  switch (row.status) {
    case "PENDING":
      if (row.result_json !== null || row.error_message !== null) {
        throw new RowDecodeError("omr_sheets", row.id, "pending_sheet_resolved");
      }
      return { ...base, status: "PENDING", result: null, errorMessage: null, resolvedAt: null };
    case "PARSED": {
      if (row.result_json === null || row.error_message !== null || row.resolved_at === null) {
        throw new RowDecodeError("omr_sheets", row.id, "parsed_sheet_incomplete");
      }
      const result = recognitionResultSchema.safeParse(
        parseJsonColumn("omr_sheets", row.id, row.result_json)
      );
      if (!result.success) {
        throw new RowDecodeError("omr_sheets", row.id, describeIssues(result.error));
      }
      return {
        ...base,
        status: "PARSED",
        result: result.data,
        errorMessage: null,
        resolvedAt: row.resolved_at,
      };
    }
    case "FAILED":
      if (row.error_message === null || row.result_json !== null || row.resolved_at === null) {
        throw new RowDecodeError("omr_sheets", row.id, "failed_sheet_incomplete");
      }
      return {
        ...base,
        status: "FAILED",
        result: null,
        errorMessage: row.error_message,
        resolvedAt: row.resolved_at,
      };
  }
}
