import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/engine/errors";
import { TERM_OPTIONS, parseLoanCategory } from "../src/engine/loanCatalog";
import { classifyPlanName, generateLoanOptions } from "../src/engine/planGenerator";

describe("loan option generation", () => {
  it("crosses mortgage terms with three down payment levels", () => {
    const plans = generateLoanOptions({
      totalAmount: 80000,
      category: "mortgage",
      monthlyIncome: 3000
    });

    expect(plans).toHaveLength(TERM_OPTIONS.mortgage.length * 3);
    expect(plans.map((plan) => [plan.termYears, plan.downPaymentPct]).slice(0, 4)).toEqual([
      [15, 10],
      [15, 15],
      [15, 20],
      [20, 10]
    ]);
  });

  it("derives amounts, totals and ratio for a mortgage plan", () => {
    const [plan] = generateLoanOptions({
      totalAmount: 80000,
      category: "mortgage",
      monthlyIncome: 3000
    });

    expect(plan.downPayment).toBe(8000);
    expect(plan.amount).toBe(72000);
    expect(plan.interestRate).toBe(0.035);
    expect(plan.monthlyPayment).toBeCloseTo(514.72, 2);
    expect(plan.totalInterest).toBeCloseTo(20648.78, 2);
    expect(plan.totalCost).toBeCloseTo(plan.amount + plan.totalInterest + plan.downPayment, 8);
    expect(plan.paymentToIncomeRatio).toBeCloseTo(17.157, 3);
    expect(plan.name).toBe("Balanced (15 years) - Comfortable");
  });

  it("uses no down payment outside mortgages", () => {
    const plans = generateLoanOptions({
      totalAmount: 10000,
      category: "personal",
      monthlyIncome: 2000
    });

    expect(plans).toHaveLength(TERM_OPTIONS.personal.length);
    expect(plans.every((plan) => plan.downPayment === 0 && plan.amount === 10000)).toBe(true);
    expect(plans.map((plan) => plan.name)).toEqual([
      "Fast payoff (3 years) - Comfortable",
      "Fast payoff (5 years) - Comfortable",
      "Fast payoff (7 years) - Comfortable"
    ]);
  });

  it("produces identical output for identical input", () => {
    const request = { totalAmount: 80000, category: "mortgage" as const, monthlyIncome: 3000 };
    expect(JSON.stringify(generateLoanOptions(request))).toBe(
      JSON.stringify(generateLoanOptions(request))
    );
  });

  it("gives each plan in a request a distinct id", () => {
    const plans = generateLoanOptions({
      totalAmount: 80000,
      category: "mortgage",
      monthlyIncome: 3000
    });
    expect(new Set(plans.map((plan) => plan.id)).size).toBe(plans.length);
    expect(plans[0].id).toMatch(/^[0-9a-f]{8}$/);
  });

  it("applies a custom rate", () => {
    const plans = generateLoanOptions({
      totalAmount: 12000,
      category: "auto",
      monthlyIncome: 2000,
      customRate: 0
    });
    expect(plans[0].monthlyPayment).toBe(12000 / 36);
    expect(plans[0].totalInterest).toBeCloseTo(0, 8);
  });

  it("reports a zero ratio without income", () => {
    const plans = generateLoanOptions({ totalAmount: 5000, category: "student", monthlyIncome: 0 });
    expect(plans.every((plan) => plan.paymentToIncomeRatio === 0)).toBe(true);
  });

  it("rejects a non-positive total amount", () => {
    expect(() =>
      generateLoanOptions({ totalAmount: 0, category: "personal", monthlyIncome: 2000 })
    ).toThrow(ValidationError);
  });
});

describe("plan naming", () => {
  it("labels term and affordability bands", () => {
    expect(classifyPlanName(10, 25)).toBe("Fast payoff (10 years) - Comfortable");
    expect(classifyPlanName(20, 30)).toBe("Balanced (20 years) - Moderate");
    expect(classifyPlanName(25, 36)).toBe("Long-term (25 years) - Demanding");
  });
});

describe("loan categories", () => {
  it("falls back to unknown for unrecognized tags", () => {
    expect(parseLoanCategory(" Mortgage ")).toBe("mortgage");
    expect(parseLoanCategory("crypto")).toBe("unknown");
    expect(parseLoanCategory(undefined)).toBe("unknown");
  });

  it("generates from the unknown table", () => {
    const plans = generateLoanOptions({
      totalAmount: 10000,
      category: parseLoanCategory("boat"),
      monthlyIncome: 2000
    });
    expect(plans.map((plan) => plan.termYears)).toEqual([5, 10, 15]);
    expect(plans[0].interestRate).toBe(0.06);
  });
});
