import { type Queryable } from "../../db";
import { RowDecodeError } from "../../errors/AppError";
import { type NewOperator, type Operator, type OperatorRecord } from "./operators.types";

const OPERATOR_COLUMNS = "id, token, callback_url, created_at";

function toOperator(row: OperatorRecord): Operator {
  const createdAt = row.created_at instanceof Date ? row.created_at : new Date(row.created_at);
  if (Number.isNaN(createdAt.getTime())) {
    throw new RowDecodeError("operators", row.id, "invalid_created_at");
  }
  return {
    id: row.id,
    token: row.token,
    callbackUrl: row.callback_url,
    createdAt,
  };
}

export type OperatorRepository = {
  create(operator: NewOperator): Promise<Operator>;
  findById(operatorId: string): Promise<Operator | null>;
  findByToken(token: string): Promise<Operator | null>;
  findAll(): Promise<Operator[]>;
  exists(operatorId: string): Promise<boolean>;
  update(operator: Operator): Promise<Operator | null>;
  updateCallbackUrl(operatorId: string, callbackUrl: string): Promise<Operator | null>;
  delete(operatorId: string): Promise<boolean>;
};

export function createOperatorRepository(runner: Queryable): OperatorRepository {
  async function updateCallbackUrl(operatorId: string, callbackUrl: string): Promise<Operator | null> {
    const res = await runner.query<OperatorRecord>(
      `update operators
       set callback_url = $2
       where id = $1
       returning ${OPERATOR_COLUMNS}`,
      [operatorId, callbackUrl]
    );
    return res.rows[0] ? toOperator(res.rows[0]) : null;
  }

  return {
    async create(operator) {
      const res = await runner.query<OperatorRecord>(
        `insert into operators (id, token, callback_url, created_at)
         values ($1, $2, $3, now())
         returning ${OPERATOR_COLUMNS}`,
        [operator.id, operator.token, operator.callbackUrl]
      );
      return toOperator(res.rows[0]);
    },

    async findById(operatorId) {
      const res = await runner.query<OperatorRecord>(
        `select ${OPERATOR_COLUMNS} from operators where id = $1 limit 1`,
        [operatorId]
      );
      return res.rows[0] ? toOperator(res.rows[0]) : null;
    },

    async findByToken(token) {
      const res = await runner.query<OperatorRecord>(
        `select ${OPERATOR_COLUMNS} from operators where token = $1 limit 1`,
        [token]
      );
      return res.rows[0] ? toOperator(res.rows[0]) : null;
    },

    async findAll() {
      const res = await runner.query<OperatorRecord>(
        `select ${OPERATOR_COLUMNS} from operators order by created_at desc, id asc`
      );
      return res.rows.map(toOperator);
    },

    async exists(operatorId) {
      const res = await runner.query<{ id: string }>(
        "select id from operators where id = $1 limit 1",
        [operatorId]
      );
      return res.rows.length > 0;
    },

    // Only the callback URL is mutable; id, token and created_at are fixed at provisioning.
    update: (operator) => updateCallbackUrl(operator.id, operator.callbackUrl),

    updateCallbackUrl,

    async delete(operatorId) {
      const res = await runner.query<{ id: string }>(
        "delete from operators where id = $1 returning id",
        [operatorId]
      );
      return res.rows.length > 0;
    },
  };
}
