import { describe, expect, it } from "vitest";
import { defaultMessages } from "../src/engine/messages";
import { compareLoanPlans, determineWinner, listAdvantages } from "../src/engine/planComparison";
import { generateLoanOptions } from "../src/engine/planGenerator";

// Personal loan plans at 3, 5 and 7 years for a 10k loan on a 2k income.
const personalPlans = () =>
  generateLoanOptions({ totalAmount: 10000, category: "personal", monthlyIncome: 2000 });

describe("plan comparison", () => {
  it("reports differences as plan B minus plan A", () => {
    const [short, , long] = personalPlans();
    const result = compareLoanPlans(short, long);

    expect(result.monthlyPaymentDiff).toBeCloseTo(-157.84, 2);
    expect(result.totalCostDiff).toBeCloseTo(1562.1, 2);
    expect(result.interestDiff).toBeCloseTo(1562.1, 2);
    expect(result.termDiff).toBe(4);
  });

  it("lists the advantages of each side", () => {
    const [short, , long] = personalPlans();
    const result = compareLoanPlans(short, long);

    expect(result.prosPlanA).toEqual([
      "Lower total cost by €1562.10",
      "Saves €1562.10 in interest",
      "Paid off 4 years sooner"
    ]);
    expect(result.prosPlanB).toEqual([
      "Lower monthly payment by €157.84",
      "Better payment-to-income ratio"
    ]);
  });

  it("favours income headroom over a modest cost gap", () => {
    const [short, , long] = personalPlans();
    const result = compareLoanPlans(short, long);

    expect(result.winner).toBe("b");
    expect(result.recommendation).toBe(
      "Fast payoff (7 years) - Comfortable is the better choice overall."
    );
    expect(determineWinner(long, short)).toBe("a");
  });

  it("calls identical plans a tie", () => {
    const [plan] = personalPlans();
    const result = compareLoanPlans(plan, { ...plan });

    expect(result.winner).toBe("tie");
    expect(result.recommendation).toBe(
      "Both plans are equally good choices. Pick based on your preferences."
    );
    expect(result.prosPlanA).toEqual(["Alternative option"]);
    expect(result.prosPlanB).toEqual(["Alternative option"]);
  });

  it("uses catalog text", () => {
    const [short, , long] = personalPlans();
    const messages = {
      ...defaultMessages,
      comparison: { ...defaultMessages.comparison, fasterPayoff: "{years}y sooner" }
    };
    expect(listAdvantages(short, long, messages)).toContain("4y sooner");
  });
});
