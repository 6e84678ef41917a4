import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { Document } from "@/components/Document";

const APP_TITLE = "Expense Tracker";

export function renderDocument(page: ReactElement, title: string = APP_TITLE): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<Document title={title}>{page}</Document>)}`;
}
