import { type DbPool, type Queryable } from "../db";
import { createJobRepository, type JobRepository } from "../modules/jobs/jobs.repo";
import { createSheetRepository, type SheetRepository } from "../modules/jobs/sheets.repo";
import {
  createOperatorRepository,
  type OperatorRepository,
} from "../modules/operators/operators.repo";
import { describeError, logError } from "../observability/logger";

export type Repositories = {
  operators: OperatorRepository;
  jobs: JobRepository;
  sheets: SheetRepository;
};

/** Repositories bound to one transaction client. Only valid inside the `beginTransaction` callback. */
export type TransactionScope = Repositories;

export type UnitOfWork = Repositories & {
  /**
   * Runs `work` on one dedicated connection between `begin` and `commit`. Any rejection
   * rolls the transaction back and is rethrown. Scopes are flat: calling
   * `beginTransaction` from inside `work` opens an unrelated transaction.
   */
  beginTransaction<T>(work: (tx: TransactionScope) => Promise<T>): Promise<T>;
};

export function bindRepositories(runner: Queryable): Repositories {
  return {
    operators: createOperatorRepository(runner),
    jobs: createJobRepository(runner),
    sheets: createSheetRepository(runner),
  };
}

export function createUnitOfWork(pool: DbPool): UnitOfWork {
  return {
    ...bindRepositories(pool),

    async beginTransaction<T>(work: (tx: TransactionScope) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("begin");
        const result = await work(bindRepositories(client));
        await client.query("commit");
        return result;
      } catch (error) {
        try {
          await client.query("rollback");
        } catch (rollbackError) {
          logError("db_rollback_failed", {
            error: describeError(rollbackError),
            cause: describeError(error),
          });
        }
        throw error;
      } finally {
        client.release();
      }
    },
  };
}
