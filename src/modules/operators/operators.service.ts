import { randomUUID } from "crypto";
import { z } from "zod";
import { type UnitOfWork } from "../../db/unitOfWork";
import { AppError, notFoundError, validationError } from "../../errors/AppError";
import { logInfo, logWarn } from "../../observability/logger";
import { type Operator } from "./operators.types";

const callbackUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "callback URL must use http or https");

export const ProvisionOperatorSchema = z
  .object({
    callbackUrl: callbackUrlSchema,
    token: z.string().trim().min(8).max(255).optional(),
  })
  .strict();

export type ProvisionOperatorInput = z.infer<typeof ProvisionOperatorSchema>;

export type OperatorService = {
  provisionOperator(input: ProvisionOperatorInput): Promise<Operator>;
  authenticate(token: string): Promise<Operator | null>;
  getOperator(operatorId: string): Promise<Operator | null>;
  listOperators(): Promise<Operator[]>;
  updateCallbackUrl(operatorId: string, callbackUrl: string): Promise<Operator>;
  deleteOperator(operatorId: string): Promise<boolean>;
};

export function createOperatorService(deps: { uow: UnitOfWork }): OperatorService {
  const { uow } = deps;

  return {
    async provisionOperator(input) {
      const parsed = ProvisionOperatorSchema.safeParse(input);
      if (!parsed.success) {
        throw validationError("Invalid operator.", parsed.error.issues);
      }
      const token = parsed.data.token ?? randomUUID();
      if (await uow.operators.findByToken(token)) {
        throw new AppError("operator_token_taken", "Operator token already in use.", 409);
      }
      const operator = await uow.operators.create({
        id: randomUUID(),
        token,
        callbackUrl: parsed.data.callbackUrl,
      });
      logInfo("operator_provisioned", { operatorId: operator.id });
      return operator;
    },

    async authenticate(token) {
      if (!token || token.trim().length === 0) {
        return null;
      }
      const operator = await uow.operators.findByToken(token.trim());
      if (!operator) {
        logWarn("operator_auth_failed", { reason: "unknown_token" });
      }
      return operator;
    },

    async getOperator(operatorId) {
      return uow.operators.findById(operatorId);
    },

    async listOperators() {
      return uow.operators.findAll();
    },

    async updateCallbackUrl(operatorId, callbackUrl) {
      const parsed = callbackUrlSchema.safeParse(callbackUrl);
      if (!parsed.success) {
        throw validationError("Invalid callback URL.", parsed.error.issues);
      }
      const updated = await uow.operators.updateCallbackUrl(operatorId, parsed.data);
      if (!updated) {
        throw notFoundError("operator", operatorId);
      }
      logInfo("operator_callback_url_updated", { operatorId });
      return updated;
    },

    // Cascades through parsing_jobs to omr_sheets.
    async deleteOperator(operatorId) {
      const deleted = await uow.operators.delete(operatorId);
      if (deleted) {
        logInfo("operator_deleted", { operatorId });
      }
      return deleted;
    },
  };
}
