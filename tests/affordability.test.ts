import { describe, expect, it } from "vitest";
import {
  analyzeAffordability,
  getAffordabilityStatus
} from "../src/engine/affordability";
import { defaultMessages } from "../src/engine/messages";
import { FinancialProfile } from "../src/engine/types";

const baseProfile = (overrides: Partial<FinancialProfile> = {}): FinancialProfile => ({
  monthlyIncome: 2000,
  otherIncome: 0,
  monthlyExpenses: 800,
  existingLoanPayments: 0,
  savings: 5000,
  desiredLoanAmount: 10000,
  ...overrides
});

describe("affordability status", () => {
  it("classifies by ratio and disposable income", () => {
    expect(getAffordabilityStatus(25, 500, 400)).toBe("safe");
    expect(getAffordabilityStatus(35, 500, 400)).toBe("warning");
    expect(getAffordabilityStatus(45, 500, 400)).toBe("danger");
    expect(getAffordabilityStatus(10, -50, 400)).toBe("danger");
  });

  it("flags a payment larger than disposable income", () => {
    expect(getAffordabilityStatus(10, 300, 400)).toBe("danger");
  });

  it("treats the thresholds as inclusive upper bounds", () => {
    expect(getAffordabilityStatus(30, 500, 400)).toBe("safe");
    expect(getAffordabilityStatus(40, 500, 400)).toBe("warning");
    expect(getAffordabilityStatus(10, 0, 0)).toBe("danger");
  });
});

describe("affordability analysis", () => {
  it("reports a safe profile end to end", () => {
    const analysis = analyzeAffordability(baseProfile());

    expect(analysis.metrics.estimatedPayment).toBeCloseTo(188.71, 2);
    expect(analysis.metrics.paymentRatio).toBeCloseTo(9.44, 2);
    expect(analysis.status).toBe("safe");
    expect(analysis.recommendations).toEqual([
      "You appear to have room for this loan (9.4% of income). This is an estimate: confirm exact figures with a lender, keep a buffer for emergencies and compare offers."
    ]);
  });

  it("explains a monthly deficit", () => {
    const analysis = analyzeAffordability(
      baseProfile({ monthlyIncome: 1000, monthlyExpenses: 1200 })
    );
    expect(analysis.status).toBe("danger");
    expect(analysis.recommendations[0]).toBe(
      "Your monthly expenses exceed your income by €200.00. Before borrowing, reduce expenses, increase income or pay down existing loans."
    );
  });

  it("explains a payment ratio that is too high", () => {
    const analysis = analyzeAffordability(
      baseProfile({ monthlyIncome: 1000, monthlyExpenses: 0, desiredLoanAmount: 25000, savings: 2500 })
    );
    expect(analysis.status).toBe("danger");
    expect(analysis.recommendations).toEqual([
      "The estimated payment would take 47.2% of your income, 17.2 points above the 30% comfort level. Consider a smaller amount, a longer term, or waiting until your finances improve."
    ]);
  });

  it("explains a payment that exceeds disposable income", () => {
    const analysis = analyzeAffordability(
      baseProfile({ monthlyIncome: 3000, monthlyExpenses: 2900 })
    );
    expect(analysis.status).toBe("danger");
    expect(analysis.recommendations[0]).toBe(
      "The estimated payment of €188.71 is €88.71 more than your disposable income of €100.00. You may struggle to keep up with it."
    );
  });

  it("adds a savings tip below 10% of the loan", () => {
    const analysis = analyzeAffordability(baseProfile({ savings: 500 }));
    expect(analysis.recommendations).toHaveLength(2);
    expect(analysis.recommendations[1]).toBe(
      "Tip: aim for savings of at least €1000.00 (10% of the loan) to cover a down payment and unexpected costs."
    );
  });

  it("renders recommendations from a swapped catalog", () => {
    const messages = {
      ...defaultMessages,
      affordability: { ...defaultMessages.affordability, safe: "OK at {ratio}%" }
    };
    const analysis = analyzeAffordability(baseProfile(), { messages });
    expect(analysis.recommendations).toEqual(["OK at 9.4%"]);
  });
});
