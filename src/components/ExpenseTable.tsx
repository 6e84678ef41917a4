import { X } from "lucide-react";
import { cn, formatAmount } from "@/lib/utils";
import type { Expense } from "@/types/expense";

interface ExpenseTableProps {
  expenses: Expense[];
  total: number;
}

export function ExpenseTable({ expenses, total }: ExpenseTableProps) {
  return (
    <div className="card">
      <table>
        <thead>
          <tr>
            <th>Title</th>
            <th>Amount</th>
            <th>Category</th>
            <th>Date</th>
            <th>
              <span className="sr-only">Actions</span>
            </th>
          </tr>
        </thead>
        <tbody>
          {expenses.map((expense) => (
            <tr key={expense.id}>
              <td>{expense.title}</td>
              <td className={cn("amount", expense.amount < 0 && "negative")}>
                {formatAmount(expense.amount)}
              </td>
              <td>{expense.category}</td>
              <td>{expense.date}</td>
              <td>
                <a
                  className="delete"
                  href={`/delete/${expense.id}`}
                  title={`Delete ${expense.title}`}
                >
                  <X className="icon" aria-hidden="true" />
                  <span className="sr-only">Delete</span>
                </a>
              </td>
            </tr>
          ))}
          {expenses.length === 0 && (
            <tr>
              <td className="empty" colSpan={5}>
                No expenses recorded yet.
              </td>
            </tr>
          )}
        </tbody>
      </table>
      <div className="total">{`Total Spent: ${formatAmount(total)}`}</div>
    </div>
  );
}
