import { AppHeader } from "@/components/AppHeader";
import { ExpenseForm } from "@/components/ExpenseForm";
import { ExpenseTable } from "@/components/ExpenseTable";
import type { FieldErrors } from "@/lib/errors";
import type { ExpenseFormValues } from "@/lib/validation";
import type { ExpenseListing } from "@/types/expense";

interface ExpensesPageProps {
  listing: ExpenseListing;
  form?: {
    values: ExpenseFormValues;
    errors: FieldErrors;
  };
}

export default function ExpensesPage({ listing, form }: ExpensesPageProps) {
  return (
    <>
      <AppHeader />
      <ExpenseForm values={form?.values} errors={form?.errors} />
      <ExpenseTable expenses={listing.expenses} total={listing.total} />
    </>
  );
}
