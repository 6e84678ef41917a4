import { z } from "zod";
import { ValidationError, type FieldErrors } from "@/lib/errors";
import type { ExpenseInput } from "@/types/expense";

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const requiredText = (label: string) =>
  z
    .string({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a single value`,
    })
    .trim()
    .min(1, `${label} is required`);

export const expenseFormSchema = z.object({
  title: requiredText("Title"),
  amount: requiredText("Amount")
    .refine(
      (val) => val === "" || (DECIMAL_NUMBER.test(val) && Number.isFinite(Number(val))),
      { message: "Amount must be a number" },
    )
    .transform((val) => Number(val)),
  category: requiredText("Category"),
});

export const expenseIdSchema = z
  .string({ required_error: "Expense id is required" })
  .regex(/^-?\d+$/, "Expense id must be an integer")
  .transform((val) => Number(val))
  .refine((val) => Number.isSafeInteger(val), {
    message: "Expense id is out of range",
  });

export type ExpenseFormValues = {
  title: string;
  amount: string;
  category: string;
};

export const toFieldErrors = (error: z.ZodError, rootKey = "form"): FieldErrors => {
  return error.issues.reduce<FieldErrors>((acc, issue) => {
    const key = issue.path.length > 0 ? String(issue.path[0]) : rootKey;
    acc[key] = [...(acc[key] ?? []), issue.message];
    return acc;
  }, {});
};

export function parseExpenseForm(body: unknown): ExpenseInput {
  const result = expenseFormSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError("Invalid expense", toFieldErrors(result.error));
  }
  return result.data;
}

export function parseExpenseId(raw: unknown): number {
  const result = expenseIdSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError("Invalid expense id", toFieldErrors(result.error, "id"));
  }
  return result.data;
}

const pickText = (value: unknown) => (typeof value === "string" ? value : "");

/** Raw submitted values, echoed back into the form after a rejected create. */
export function getSubmittedValues(body: unknown): ExpenseFormValues {
  const source: Record<string, unknown> =
    typeof body === "object" && body !== null ? { ...body } : {};
  return {
    title: pickText(source.title),
    amount: pickText(source.amount),
    category: pickText(source.category),
  };
}
