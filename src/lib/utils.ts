import { clsx, type ClassValue } from "clsx";

export function cn(...inputs: ClassValue[]) {
  return clsx(inputs);
}

export function formatAmount(value: number) {
  const fixed = Math.abs(value).toFixed(2);
  return value < 0 && fixed !== "0.00" ? `-$${fixed}` : `$${fixed}`;
}

export function sumAmounts(items: ReadonlyArray<{ amount: number }>) {
  return items.reduce((sum, item) => sum + item.amount, 0);
}
