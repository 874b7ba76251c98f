import { formatMoney } from "../utils/money";
import { MessageCatalog, defaultMessages, formatMessage } from "./messages";
import { ComparisonResult, ComparisonWinner, LoanPlan } from "./types";

const TIE_MARGIN = 0.1;

// Headroom under the income plus a bonus that grows as total cost shrinks.
const overallValue = (plan: LoanPlan): number =>
  100 - plan.paymentToIncomeRatio + (plan.totalCost > 0 ? 100000 / plan.totalCost : 0);

export const determineWinner = (planA: LoanPlan, planB: LoanPlan): ComparisonWinner => {
  const valueA = overallValue(planA);
  const valueB = overallValue(planB);
  if (Math.abs(valueA - valueB) < TIE_MARGIN) return "tie";
  return valueA > valueB ? "a" : "b";
};

// Advantages of `plan` over `other`.
export const listAdvantages = (
  plan: LoanPlan,
  other: LoanPlan,
  messages: MessageCatalog = defaultMessages
): string[] => {
  const text = messages.comparison;
  const pros: string[] = [];

  if (plan.monthlyPayment < other.monthlyPayment) {
    pros.push(
      formatMessage(text.lowerPayment, {
        amount: formatMoney(other.monthlyPayment - plan.monthlyPayment)
      })
    );
  }
  if (plan.totalCost < other.totalCost) {
    pros.push(formatMessage(text.lowerCost, { amount: formatMoney(other.totalCost - plan.totalCost) }));
  }
  if (plan.totalInterest < other.totalInterest) {
    pros.push(
      formatMessage(text.interestSavings, {
        amount: formatMoney(other.totalInterest - plan.totalInterest)
      })
    );
  }
  if (plan.termYears < other.termYears) {
    pros.push(formatMessage(text.fasterPayoff, { years: other.termYears - plan.termYears }));
  }
  if (plan.paymentToIncomeRatio < other.paymentToIncomeRatio) {
    pros.push(text.betterRatio);
  }

  return pros.length > 0 ? pros : [text.alternative];
};

export const compareLoanPlans = (
  planA: LoanPlan,
  planB: LoanPlan,
  messages: MessageCatalog = defaultMessages
): ComparisonResult => {
  const winner = determineWinner(planA, planB);
  const text = messages.comparison;
  const recommendation =
    winner === "tie"
      ? text.tie
      : formatMessage(text.winner, { name: winner === "a" ? planA.name : planB.name });

  return {
    planA,
    planB,
    winner,
    monthlyPaymentDiff: planB.monthlyPayment - planA.monthlyPayment,
    totalCostDiff: planB.totalCost - planA.totalCost,
    interestDiff: planB.totalInterest - planA.totalInterest,
    termDiff: planB.termYears - planA.termYears,
    prosPlanA: listAdvantages(planA, planB, messages),
    prosPlanB: listAdvantages(planB, planA, messages),
    recommendation
  };
};
