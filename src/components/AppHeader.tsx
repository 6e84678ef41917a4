import { Wallet } from "lucide-react";

export function AppHeader() {
  return (
    <header className="app-header">
      <a href="/" className="brand">
        <Wallet className="icon" aria-hidden="true" />
        <h1>Personal Expense Tracker</h1>
      </a>
    </header>
  );
}
