import express, {
  type ErrorRequestHandler,
  type Express,
  type RequestHandler,
} from "express";
import { ErrorPage } from "@/components/ErrorPage";
import type { ExpenseRepository } from "@/db/expenseStore";
import { getErrorMessage, isAppError, ValidationError } from "@/lib/errors";
import { createExpense, deleteExpense, listExpenses } from "@/lib/expenses";
import { getSubmittedValues } from "@/lib/validation";
import ExpensesPage from "@/pages/Expenses";
import NotFound from "@/pages/NotFound";
import { renderDocument } from "./render";

export interface AppOptions {
  store: ExpenseRepository;
  staticDir?: string;
  timeZone?: string;
  now?: () => Date;
  requestLog?: boolean;
}

const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = Date.now();
  res.on("finish", () => {
    console.info(
      `[http] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`,
    );
  });
  next();
};

const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = isAppError(error) ? error.status : 500;
  if (status >= 500) {
    console.error(`[server] ${req.method} ${req.originalUrl} failed`, error);
  }
  const message = status >= 500 ? "The expense store is unavailable." : getErrorMessage(error);

  res.status(status).type("html").send(renderDocument(<ErrorPage status={status} message={message} />));
};

export function createApp({
  store,
  staticDir,
  timeZone,
  now,
  requestLog = true,
}: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  if (requestLog) {
    app.use(requestLogger);
  }
  if (staticDir) {
    app.use("/static", express.static(staticDir));
  }
  app.use(express.urlencoded({ extended: false }));

  app.get("/", (_req, res) => {
    const listing = listExpenses(store);
    res.status(200).type("html").send(renderDocument(<ExpensesPage listing={listing} />));
  });

  app.post("/add", (req, res, next) => {
    try {
      createExpense(store, req.body, { now, timeZone });
      res.redirect(303, "/");
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        next(error);
        return;
      }
      // Re-show the listing with the rejected values so they can be fixed.
      const listing = listExpenses(store);
      const form = { values: getSubmittedValues(req.body), errors: error.fieldErrors };
      res
        .status(error.status)
        .type("html")
        .send(renderDocument(<ExpensesPage listing={listing} form={form} />));
    }
  });

  app.get("/delete/:id", (req, res) => {
    deleteExpense(store, req.params.id);
    res.redirect(303, "/");
  });

  app.use((req, res) => {
    res.status(404).type("html").send(renderDocument(<NotFound path={req.path} />));
  });

  app.use(errorHandler);

  return app;
}
