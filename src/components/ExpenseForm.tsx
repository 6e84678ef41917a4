import { Plus } from "lucide-react";
import { cn } from "@/lib/utils";
import type { FieldErrors } from "@/lib/errors";
import type { ExpenseFormValues } from "@/lib/validation";
import { EXPENSE_CATEGORIES } from "@/types/expense";

const emptyValues: ExpenseFormValues = { title: "", amount: "", category: "" };

interface ExpenseFormProps {
  values?: ExpenseFormValues;
  errors?: FieldErrors;
}

function FieldError({ messages }: { messages?: string[] }) {
  if (!messages || messages.length === 0) return null;
  return <p className="field-error">{messages.join(" ")}</p>;
}

export function ExpenseForm({ values = emptyValues, errors = {} }: ExpenseFormProps) {
  // Keep a submitted category selectable even when it is not a suggested one.
  const categories: string[] = [...EXPENSE_CATEGORIES];
  if (values.category && !categories.includes(values.category)) {
    categories.push(values.category);
  }

  return (
    <div className="card">
      <form action="/add" method="post" className="expense-form">
        <div className="field">
          <input
            name="title"
            placeholder="Expense name"
            aria-label="Expense name"
            required
            defaultValue={values.title}
            className={cn(errors.title && "invalid")}
          />
          <FieldError messages={errors.title} />
        </div>

        <div className="field">
          <input
            name="amount"
            type="number"
            step="0.01"
            placeholder="Amount"
            aria-label="Amount"
            required
            defaultValue={values.amount}
            className={cn(errors.amount && "invalid")}
          />
          <FieldError messages={errors.amount} />
        </div>

        <div className="field">
          <select
            name="category"
            aria-label="Category"
            defaultValue={values.category || EXPENSE_CATEGORIES[0]}
            className={cn(errors.category && "invalid")}
          >
            {categories.map((category) => (
              <option key={category} value={category}>
                {category}
              </option>
            ))}
          </select>
          <FieldError messages={errors.category} />
        </div>

        <button type="submit">
          <Plus className="icon" aria-hidden="true" />
          Add
        </button>
      </form>
    </div>
  );
}
