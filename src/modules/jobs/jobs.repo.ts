import { type Queryable } from "../../db";
import { decodeParsingJob, serializeScanConfig } from "./jobs.codec";
import {
  type CallbackStatus,
  type JobStatus,
  type NewParsingJob,
  type ParsingJob,
  type ParsingJobRecord,
} from "./jobs.types";

const JOB_COLUMNS = `id, operator_id, status, total_sheets, processed_sheets, callback_status,
  callback_attempts, scan_config_json, created_at, completed_at`;

export type JobRepository = {
  create(job: NewParsingJob): Promise<ParsingJob>;
  findById(jobId: string): Promise<ParsingJob | null>;
  findByOperator(operatorId: string): Promise<ParsingJob[]>;
  findByStatus(status: JobStatus): Promise<ParsingJob[]>;
  findByCallbackStatus(callbackStatus: CallbackStatus): Promise<ParsingJob[]>;
  findPendingCallbacks(): Promise<ParsingJob[]>;
  update(job: ParsingJob): Promise<ParsingJob | null>;
  markProcessing(jobId: string): Promise<boolean>;
  markTerminal(jobId: string, status: "COMPLETED" | "FAILED"): Promise<ParsingJob | null>;
  incrementProcessed(jobId: string): Promise<number | null>;
  updateCallbackStatus(jobId: string, callbackStatus: CallbackStatus): Promise<boolean>;
  incrementCallbackAttempts(jobId: string): Promise<number | null>;
  claimCallbackAttempt(jobId: string, expectedAttempts: number): Promise<ParsingJob | null>;
  claimCallbackDelivery(jobId: string, expectedAttempts: number): Promise<ParsingJob | null>;
  delete(jobId: string): Promise<boolean>;
};

export function createJobRepository(runner: Queryable): JobRepository {
  async function findById(jobId: string): Promise<ParsingJob | null> {
    const res = await runner.query<ParsingJobRecord>(
      `select ${JOB_COLUMNS} from parsing_jobs where id = $1 limit 1`,
      [jobId]
    );
    return res.rows[0] ? decodeParsingJob(res.rows[0]) : null;
  }

  return {
    async create(job) {
      const res = await runner.query<ParsingJobRecord>(
        `insert into parsing_jobs
         (id, operator_id, status, total_sheets, processed_sheets, callback_status,
          callback_attempts, scan_config_json, created_at, completed_at)
         values ($1, $2, 'PENDING', $3, 0, 'NOT_SENT', 0, $4, now(), null)
         returning ${JOB_COLUMNS}`,
        [job.id, job.operatorId, job.totalSheets, serializeScanConfig(job.scanConfig)]
      );
      return decodeParsingJob(res.rows[0]);
    },

    findById,

    async findByOperator(operatorId) {
      const res = await runner.query<ParsingJobRecord>(
        `select ${JOB_COLUMNS}
         from parsing_jobs
         where operator_id = $1
         order by created_at desc, id asc`,
        [operatorId]
      );
      return res.rows.map(decodeParsingJob);
    },

    async findByStatus(status) {
      const res = await runner.query<ParsingJobRecord>(
        `select ${JOB_COLUMNS}
         from parsing_jobs
         where status = $1
         order by created_at desc, id asc`,
        [status]
      );
      return res.rows.map(decodeParsingJob);
    },

    async findByCallbackStatus(callbackStatus) {
      const res = await runner.query<ParsingJobRecord>(
        `select ${JOB_COLUMNS}
         from parsing_jobs
         where callback_status = $1
         order by created_at desc, id asc`,
        [callbackStatus]
      );
      return res.rows.map(decodeParsingJob);
    },

    async findPendingCallbacks() {
      const res = await runner.query<ParsingJobRecord>(
        `select ${JOB_COLUMNS}
         from parsing_jobs
         where status = 'COMPLETED'
           and callback_status = 'NOT_SENT'
           and callback_attempts = 0
         order by completed_at asc, id asc`
      );
      return res.rows.map(decodeParsingJob);
    },

    async update(job) {
      const res = await runner.query<ParsingJobRecord>(
        `update parsing_jobs
         set status = $2,
             total_sheets = $3,
             processed_sheets = $4,
             callback_status = $5,
             callback_attempts = $6,
             scan_config_json = $7,
             completed_at = $8
         where id = $1
         returning ${JOB_COLUMNS}`,
        [
          job.id,
          job.status,
          job.totalSheets,
          job.processedSheets,
          job.callbackStatus,
          job.callbackAttempts,
          serializeScanConfig(job.scanConfig),
          job.completedAt,
        ]
      );
      return res.rows[0] ? decodeParsingJob(res.rows[0]) : null;
    },

    async markProcessing(jobId) {
      const res = await runner.query<{ id: string }>(
        `update parsing_jobs
         set status = 'PROCESSING'
         where id = $1
           and status = 'PENDING'
         returning id`,
        [jobId]
      );
      return res.rows.length > 0;
    },

    // Guarded so a terminal job is never rewritten and a racing second writer updates nothing.
    async markTerminal(jobId, status) {
      const res = await runner.query<ParsingJobRecord>(
        `update parsing_jobs
         set status = $2,
             completed_at = now()
         where id = $1
           and status in ('PENDING', 'PROCESSING')
         returning ${JOB_COLUMNS}`,
        [jobId, status]
      );
      return res.rows[0] ? decodeParsingJob(res.rows[0]) : null;
    },

    async incrementProcessed(jobId) {
      const res = await runner.query<{ processed_sheets: number }>(
        `update parsing_jobs
         set processed_sheets = processed_sheets + 1
         where id = $1
           and processed_sheets < total_sheets
         returning processed_sheets`,
        [jobId]
      );
      if (res.rows[0]) {
        return Number(res.rows[0].processed_sheets);
      }
      const current = await findById(jobId);
      return current ? current.processedSheets : null;
    },

    async updateCallbackStatus(jobId, callbackStatus) {
      const res = await runner.query<{ id: string }>(
        `update parsing_jobs
         set callback_status = $2
         where id = $1
         returning id`,
        [jobId, callbackStatus]
      );
      return res.rows.length > 0;
    },

    async incrementCallbackAttempts(jobId) {
      const res = await runner.query<{ callback_attempts: number }>(
        `update parsing_jobs
         set callback_attempts = callback_attempts + 1
         where id = $1
         returning callback_attempts`,
        [jobId]
      );
      return res.rows[0] ? Number(res.rows[0].callback_attempts) : null;
    },

    async claimCallbackAttempt(jobId, expectedAttempts) {
      const res = await runner.query<ParsingJobRecord>(
        `update parsing_jobs
         set callback_attempts = callback_attempts + 1
         where id = $1
           and callback_status = 'FAILED'
           and callback_attempts = $2
         returning ${JOB_COLUMNS}`,
        [jobId, expectedAttempts]
      );
      return res.rows[0] ? decodeParsingJob(res.rows[0]) : null;
    },

    // Any callback status; the attempt counter alone decides which sender owns the next POST.
    async claimCallbackDelivery(jobId, expectedAttempts) {
      const res = await runner.query<ParsingJobRecord>(
        `update parsing_jobs
         set callback_attempts = callback_attempts + 1
         where id = $1
           and callback_attempts = $2
         returning ${JOB_COLUMNS}`,
        [jobId, expectedAttempts]
      );
      return res.rows[0] ? decodeParsingJob(res.rows[0]) : null;
    },

    async delete(jobId) {
      const res = await runner.query<{ id: string }>(
        "delete from parsing_jobs where id = $1 returning id",
        [jobId]
      );
      return res.rows.length > 0;
    },
  };
}
