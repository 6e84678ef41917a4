export const EXPENSE_CATEGORIES = [
  "Food",
  "Transport",
  "Shopping",
  "Entertainment",
  "Other",
] as const;

export interface Expense {
  id: number;
  title: string;
  amount: number;
  // Any string is stored; the suggested set only drives the form select.
  category: string;
  date: string; // YYYY-MM-DD
}

export interface ExpenseInput {
  title: string;
  amount: number;
  category: string;
}

export interface ExpenseListing {
  expenses: Expense[];
  total: number;
}
