import { format } from "date-fns";

export const EXPENSE_DATE_FORMAT = "yyyy-MM-dd";

type DateParts = {
  year: number;
  month: number;
  day: number;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const getZonedDateParts = (date: Date, timeZone: string): DateParts => {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });

  const parts = formatter.formatToParts(date);
  const year = Number(parts.find((part) => part.type === "year")?.value ?? "0");
  const month = Number(parts.find((part) => part.type === "month")?.value ?? "0");
  const day = Number(parts.find((part) => part.type === "day")?.value ?? "0");

  return { year, month, day };
};

const padDatePart = (value: number): string => String(value).padStart(2, "0");

/**
 * Calendar date of `now` as YYYY-MM-DD. With a time zone the date is taken
 * in that zone; without one it is the server's local date.
 */
export const getTodayString = (now: Date = new Date(), timeZone?: string): string => {
  if (!timeZone) {
    return format(now, EXPENSE_DATE_FORMAT);
  }
  const { year, month, day } = getZonedDateParts(now, timeZone);
  return `${year}-${padDatePart(month)}-${padDatePart(day)}`;
};
