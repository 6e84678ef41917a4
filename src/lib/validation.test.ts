import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors";
import { getSubmittedValues, parseExpenseForm, parseExpenseId } from "./validation";

const captureValidationError = (fn: () => unknown): ValidationError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("expected a ValidationError");
};

describe("parseExpenseForm", () => {
  it("trims text fields and parses the amount", () => {
    expect(
      parseExpenseForm({ title: " Coffee ", amount: "4.50", category: "Food" }),
    ).toEqual({ title: "Coffee", amount: 4.5, category: "Food" });
  });

  it("accepts negative amounts and categories outside the suggested set", () => {
    expect(
      parseExpenseForm({ title: "Refund", amount: "-3", category: "Gifts" }),
    ).toEqual({ title: "Refund", amount: -3, category: "Gifts" });
  });

  it("rejects a non-numeric amount", () => {
    const error = captureValidationError(() =>
      parseExpenseForm({ title: "Coffee", amount: "abc", category: "Food" }),
    );
    expect(error.status).toBe(400);
    expect(error.fieldErrors).toEqual({ amount: ["Amount must be a number"] });
  });

  it("rejects Infinity", () => {
    const error = captureValidationError(() =>
      parseExpenseForm({ title: "Coffee", amount: "Infinity", category: "Food" }),
    );
    expect(error.fieldErrors.amount).toEqual(["Amount must be a number"]);
  });

  it("rejects hex and binary literals", () => {
    for (const amount of ["0x10", "0b11", "0o7"]) {
      const error = captureValidationError(() =>
        parseExpenseForm({ title: "Coffee", amount, category: "Food" }),
      );
      expect(error.fieldErrors).toEqual({ amount: ["Amount must be a number"] });
    }
  });

  it("accepts decimal forms with a sign, a bare point or an exponent", () => {
    const amountOf = (amount: string) =>
      parseExpenseForm({ title: "Coffee", amount, category: "Food" }).amount;
    expect(amountOf("+2")).toBe(2);
    expect(amountOf(".5")).toBe(0.5);
    expect(amountOf("3.")).toBe(3);
    expect(amountOf("1e3")).toBe(1000);
  });

  it("reports a blank amount as missing only", () => {
    const error = captureValidationError(() =>
      parseExpenseForm({ title: "Coffee", amount: " ", category: "Food" }),
    );
    expect(error.fieldErrors).toEqual({ amount: ["Amount is required"] });
  });

  it("reports missing fields", () => {
    const error = captureValidationError(() => parseExpenseForm({ amount: "1" }));
    expect(error.fieldErrors.title).toEqual(["Title is required"]);
    expect(error.fieldErrors.category).toEqual(["Category is required"]);
    expect(error.fieldErrors.amount).toBeUndefined();
  });

  it("treats a blank title as missing", () => {
    const error = captureValidationError(() =>
      parseExpenseForm({ title: "   ", amount: "1", category: "Food" }),
    );
    expect(error.fieldErrors).toEqual({ title: ["Title is required"] });
  });

  it("rejects repeated fields", () => {
    const error = captureValidationError(() =>
      parseExpenseForm({ title: ["a", "b"], amount: "1", category: "Food" }),
    );
    expect(error.fieldErrors).toEqual({ title: ["Title must be a single value"] });
  });

  it("rejects an absent body", () => {
    expect(() => parseExpenseForm(undefined)).toThrow(ValidationError);
  });
});

describe("parseExpenseId", () => {
  it("parses integers", () => {
    expect(parseExpenseId("42")).toBe(42);
    expect(parseExpenseId("-3")).toBe(-3);
  });

  it("rejects anything that is not an integer", () => {
    for (const raw of ["abc", "1.5", "", "12abc"]) {
      const error = captureValidationError(() => parseExpenseId(raw));
      expect(error.fieldErrors).toEqual({ id: ["Expense id must be an integer"] });
    }
  });

  it("rejects integers beyond the safe range", () => {
    const error = captureValidationError(() => parseExpenseId("99999999999999999999"));
    expect(error.fieldErrors).toEqual({ id: ["Expense id is out of range"] });
  });
});

describe("getSubmittedValues", () => {
  it("keeps string values and blanks everything else", () => {
    expect(getSubmittedValues({ title: "Bus", amount: ["1", "2"] })).toEqual({
      title: "Bus",
      amount: "",
      category: "",
    });
    expect(getSubmittedValues(null)).toEqual({ title: "", amount: "", category: "" });
  });
});
