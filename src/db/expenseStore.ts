import { z } from "zod";
import { StorageError } from "@/lib/errors";
import type { Expense } from "@/types/expense";
import type { SqlValue } from "sql.js";
import { saveDatabase, type DatabaseHandle } from "./database";

const expenseRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  amount: z.number(),
  category: z.string(),
  date: z.string(),
});

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS expenses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  amount REAL NOT NULL,
  category TEXT NOT NULL,
  date TEXT NOT NULL
)`;

export interface ExpenseRepository {
  insert(title: string, amount: number, category: string, date: string): number;
  listAll(): Expense[];
  deleteById(id: number): boolean;
}

const lastIdSchema = z.object({ id: z.number().int() });

/**
 * Owns the one handle on the expenses table. sql.js runs every statement to
 * completion on the calling thread, so writes never interleave, and each
 * write is saved to the database file before the call returns.
 */
export class ExpenseStore implements ExpenseRepository {
  private readonly handle: DatabaseHandle;
  private closed = false;

  constructor(handle: DatabaseHandle) {
    this.handle = handle;
  }

  private get db() {
    if (this.closed) {
      throw new Error("Database is closed");
    }
    return this.handle.db;
  }

  initialize(): void {
    this.run("create expenses table", () => {
      this.db.run(CREATE_TABLE_SQL);
      saveDatabase(this.handle);
    });
  }

  insert(title: string, amount: number, category: string, date: string): number {
    return this.run("insert expense", () => {
      this.db.run(
        "INSERT INTO expenses (title, amount, category, date) VALUES (?, ?, ?, ?)",
        [title, amount, category, date],
      );
      const [row] = this.query("SELECT last_insert_rowid() AS id");
      const { id } = lastIdSchema.parse(row);
      this.save(() => {
        this.db.run("DELETE FROM expenses WHERE id = ?", [id]);
      });
      return id;
    });
  }

  // Same-day rows come back newest insert first.
  listAll(): Expense[] {
    return this.run("list expenses", () =>
      this.query(
        "SELECT id, title, amount, category, date FROM expenses ORDER BY date DESC, id DESC",
      ).map((row) => expenseRowSchema.parse(row)),
    );
  }

  deleteById(id: number): boolean {
    return this.run("delete expense", () => {
      const [existing] = this.query(
        "SELECT id, title, amount, category, date FROM expenses WHERE id = ?",
        [id],
      );
      if (existing === undefined) return false;

      const expense = expenseRowSchema.parse(existing);
      this.db.run("DELETE FROM expenses WHERE id = ?", [id]);
      this.save(() => {
        this.db.run(
          "INSERT INTO expenses (id, title, amount, category, date) VALUES (?, ?, ?, ?, ?)",
          [expense.id, expense.title, expense.amount, expense.category, expense.date],
        );
      });
      return true;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.handle.db.close();
  }

  private query(sql: string, params: SqlValue[] = []): unknown[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: unknown[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  // A write that cannot be saved is undone so memory and file stay in step.
  private save(undo: () => void): void {
    try {
      saveDatabase(this.handle);
    } catch (error) {
      undo();
      throw error;
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to ${operation}`, error);
    }
  }
}
