import { type Queryable } from "../../db";
import { decodeOmrSheet, serializeRecognitionResult } from "./jobs.codec";
import {
  type NewOmrSheet,
  type OmrSheet,
  type OmrSheetRecord,
  type RecognitionResult,
  type SheetStatus,
} from "./jobs.types";

const SHEET_COLUMNS = `id, parsing_job_id, item_id, item_index, image_url, result_json, status,
  error_message, created_at, resolved_at`;

export type SheetRepository = {
  create(sheet: NewOmrSheet): Promise<OmrSheet>;
  findById(sheetId: string): Promise<OmrSheet | null>;
  findByJob(jobId: string): Promise<OmrSheet[]>;
  findByJobAndStatus(jobId: string, status: SheetStatus): Promise<OmrSheet[]>;
  findPending(limit?: number): Promise<OmrSheet[]>;
  countByJobAndStatus(jobId: string, status: SheetStatus): Promise<number>;
  update(sheet: OmrSheet): Promise<OmrSheet | null>;
  updateParsed(sheetId: string, result: RecognitionResult): Promise<boolean>;
  updateFailed(sheetId: string, errorMessage: string): Promise<boolean>;
  delete(sheetId: string): Promise<boolean>;
  deleteByJob(jobId: string): Promise<number>;
};

export function createSheetRepository(runner: Queryable): SheetRepository {
  return {
    async create(sheet) {
      const res = await runner.query<OmrSheetRecord>(
        `insert into omr_sheets
         (id, parsing_job_id, item_id, item_index, image_url, result_json, status,
          error_message, created_at, resolved_at)
         values ($1, $2, $3, $4, $5, null, 'PENDING', null, now(), null)
         returning ${SHEET_COLUMNS}`,
        [sheet.id, sheet.jobId, sheet.itemId, sheet.itemIndex, sheet.imageLocator]
      );
      return decodeOmrSheet(res.rows[0]);
    },

    async findById(sheetId) {
      const res = await runner.query<OmrSheetRecord>(
        `select ${SHEET_COLUMNS} from omr_sheets where id = $1 limit 1`,
        [sheetId]
      );
      return res.rows[0] ? decodeOmrSheet(res.rows[0]) : null;
    },

    async findByJob(jobId) {
      const res = await runner.query<OmrSheetRecord>(
        `select ${SHEET_COLUMNS}
         from omr_sheets
         where parsing_job_id = $1
         order by created_at asc, item_index asc`,
        [jobId]
      );
      return res.rows.map(decodeOmrSheet);
    },

    async findByJobAndStatus(jobId, status) {
      const res = await runner.query<OmrSheetRecord>(
        `select ${SHEET_COLUMNS}
         from omr_sheets
         where parsing_job_id = $1
           and status = $2
         order by created_at asc, item_index asc`,
        [jobId, status]
      );
      return res.rows.map(decodeOmrSheet);
    },

    async findPending(limit) {
      const params: number[] = [];
      let sql = `select ${SHEET_COLUMNS}
         from omr_sheets
         where status = 'PENDING'
         order by created_at asc, item_index asc`;
      if (limit !== undefined) {
        params.push(limit);
        sql += " limit $1";
      }
      const res = await runner.query<OmrSheetRecord>(sql, params);
      return res.rows.map(decodeOmrSheet);
    },

    async countByJobAndStatus(jobId, status) {
      const res = await runner.query<{ count: string | number }>(
        `select count(*) as count
         from omr_sheets
         where parsing_job_id = $1
           and status = $2`,
        [jobId, status]
      );
      return Number(res.rows[0]?.count ?? 0);
    },

    async update(sheet) {
      const res = await runner.query<OmrSheetRecord>(
        `update omr_sheets
         set item_id = $2,
             item_index = $3,
             image_url = $4,
             result_json = $5,
             status = $6,
             error_message = $7,
             resolved_at = $8
         where id = $1
         returning ${SHEET_COLUMNS}`,
        [
          sheet.id,
          sheet.itemId,
          sheet.itemIndex,
          sheet.imageLocator,
          sheet.result ? serializeRecognitionResult(sheet.result) : null,
          sheet.status,
          sheet.errorMessage,
          sheet.resolvedAt,
        ]
      );
      return res.rows[0] ? decodeOmrSheet(res.rows[0]) : null;
    },

    // Resolution writes only apply to PENDING sheets: a sheet is resolved exactly once.
    async updateParsed(sheetId, result) {
      const res = await runner.query<{ id: string }>(
        `update omr_sheets
         set result_json = $2,
             status = 'PARSED',
             error_message = null,
             resolved_at = now()
         where id = $1
           and status = 'PENDING'
         returning id`,
        [sheetId, serializeRecognitionResult(result)]
      );
      return res.rows.length > 0;
    },

    async updateFailed(sheetId, errorMessage) {
      const res = await runner.query<{ id: string }>(
        `update omr_sheets
         set result_json = null,
             status = 'FAILED',
             error_message = $2,
             resolved_at = now()
         where id = $1
           and status = 'PENDING'
         returning id`,
        [sheetId, errorMessage]
      );
      return res.rows.length > 0;
    },

    async delete(sheetId) {
      const res = await runner.query<{ id: string }>(
        "delete from omr_sheets where id = $1 returning id",
        [sheetId]
      );
      return res.rows.length > 0;
    },

    async deleteByJob(jobId) {
      const res = await runner.query<{ id: string }>(
        "delete from omr_sheets where parsing_job_id = $1 returning id",
        [jobId]
      );
      return res.rows.length;
    },
  };
}
