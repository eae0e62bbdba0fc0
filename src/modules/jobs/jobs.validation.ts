import { z } from "zod";
import { validationError } from "../../errors/AppError";
import { scanConfigSchema } from "./jobs.codec";

export const operatorIdSchema = z.string().trim().uuid();

export const sheetItemSchema = z
  .object({
    id: z.string().trim().min(1).max(255),
    locator: z.string().trim().min(1).max(4096),
  })
  .strict();

export const CreateJobSchema = z
  .object({
    operatorId: operatorIdSchema,
    items: z.array(sheetItemSchema).min(1, "items must contain at least one sheet"),
    scanConfig: scanConfigSchema.default({}),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["items", index, "id"],
          message: `duplicate item id ${item.id}`,
        });
      }
      seen.add(item.id);
    });
  });

export type CreateJobInput = z.infer<typeof CreateJobSchema>;

export function parseCreateJobInput(input: unknown): CreateJobInput {
  const parsed = CreateJobSchema.safeParse(input);
  if (!parsed.success) {
    throw validationError("Invalid job submission.", parsed.error.issues);
  }
  return parsed.data;
}

export function parseEntityId(value: unknown, label: string): string {
  const parsed = z.string().trim().min(1).max(255).safeParse(value);
  if (!parsed.success) {
    throw validationError(`Invalid ${label}.`, parsed.error.issues);
  }
  return parsed.data;
}
