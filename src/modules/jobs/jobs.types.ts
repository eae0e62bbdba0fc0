export const JOB_STATUSES = ["PENDING", "PROCESSING", "COMPLETED", "FAILED"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ["COMPLETED", "FAILED"];

export const CALLBACK_STATUSES = ["NOT_SENT", "SENT", "FAILED"] as const;
export type CallbackStatus = (typeof CALLBACK_STATUSES)[number];

export const SHEET_STATUSES = ["PENDING", "PARSED", "FAILED"] as const;
export type SheetStatus = (typeof SHEET_STATUSES)[number];

/** Opaque template/configuration handed to the OMR engine untouched. */
export type ScanConfig = Record<string, unknown>;

export type SheetItem = {
  id: string;
  locator: string;
};

export type RecognitionResult = {
  answers: Record<string, string>;
  ambiguityCount: number;
};

export type SheetOutcome =
  | ({ kind: "success" } & RecognitionResult)
  | { kind: "failure"; reason: string };

export type ParsingJob = {
  id: string;
  operatorId: string;
  status: JobStatus;
  totalSheets: number;
  processedSheets: number;
  callbackStatus: CallbackStatus;
  callbackAttempts: number;
  scanConfig: ScanConfig;
  createdAt: Date;
  completedAt: Date | null;
};

type OmrSheetBase = {
  id: string;
  jobId: string;
  itemId: string;
  itemIndex: number;
  imageLocator: string;
  createdAt: Date;
};

export type PendingSheet = OmrSheetBase & {
  status: "PENDING";
  result: null;
  errorMessage: null;
  resolvedAt: null;
};

export type ParsedSheet = OmrSheetBase & {
  status: "PARSED";
  result: RecognitionResult;
  errorMessage: null;
  resolvedAt: Date;
};

export type FailedSheet = OmrSheetBase & {
  status: "FAILED";
  result: null;
  errorMessage: string;
  resolvedAt: Date;
};

export type OmrSheet = PendingSheet | ParsedSheet | FailedSheet;

export type NewParsingJob = {
  id: string;
  operatorId: string;
  totalSheets: number;
  scanConfig: ScanConfig;
};

export type NewOmrSheet = {
  id: string;
  jobId: string;
  itemId: string;
  itemIndex: number;
  imageLocator: string;
};

export type JobStatistics = {
  jobId: string;
  status: JobStatus;
  totalSheets: number;
  processedSheets: number;
  successfulSheets: number;
  failedSheets: number;
  pendingSheets: number;
  callbackStatus: CallbackStatus;
  createdAt: Date;
  completedAt: Date | null;
};

export type FinalizeResult =
  | { finalized: true; status: "COMPLETED" | "FAILED" }
  | { finalized: false; reason: "job_not_found" | "sheets_pending" | "already_terminal"; pendingSheets: number };

export type ParsingJobRecord = {
  id: string;
  operator_id: string;
  status: string;
  total_sheets: number;
  processed_sheets: number;
  callback_status: string;
  callback_attempts: number;
  scan_config_json: string;
  created_at: Date;
  completed_at: Date | null;
};

export type OmrSheetRecord = {
  id: string;
  parsing_job_id: string;
  item_id: string;
  item_index: number;
  image_url: string;
  result_json: string | null;
  status: string;
  error_message: string | null;
  created_at: Date;
  resolved_at: Date | null;
};

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}
