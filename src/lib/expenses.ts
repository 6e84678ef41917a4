import type { ExpenseRepository } from "@/db/expenseStore";
import { getTodayString } from "@/lib/dates";
import { sumAmounts } from "@/lib/utils";
import { parseExpenseForm, parseExpenseId } from "@/lib/validation";
import type { ExpenseListing } from "@/types/expense";

export type ClockOptions = {
  now?: () => Date;
  timeZone?: string;
};

export function listExpenses(store: ExpenseRepository): ExpenseListing {
  const expenses = store.listAll();
  return { expenses, total: sumAmounts(expenses) };
}

/** Validates the submitted form and stores it dated today. Returns the new id. */
export function createExpense(
  store: ExpenseRepository,
  form: unknown,
  { now = () => new Date(), timeZone }: ClockOptions = {},
): number {
  const input = parseExpenseForm(form);
  const date = getTodayString(now(), timeZone);
  return store.insert(input.title, input.amount, input.category, date);
}

// Unknown ids are a no-op.
export function deleteExpense(store: ExpenseRepository, rawId: unknown): void {
  const id = parseExpenseId(rawId);
  store.deleteById(id);
}
