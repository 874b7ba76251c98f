import crypto from "crypto";
import { ValidationError, assertFiniteNonNegative } from "./errors";
import { DEFAULT_RATES, DOWN_PAYMENT_OPTIONS, TERM_OPTIONS } from "./loanCatalog";
import { MessageCatalog, defaultMessages, formatMessage } from "./messages";
import { calculateMonthlyPayment, calculatePaymentRatio } from "./metrics";
import { LoanCategory, LoanPlan } from "./types";

export type LoanOptionsRequest = {
  totalAmount: number;
  category: LoanCategory;
  monthlyIncome: number;
  // Overrides the category's table rate.
  customRate?: number;
};

type PlanParams = {
  category: LoanCategory;
  totalAmount: number;
  downPaymentPct: number;
  interestRate: number;
  termYears: number;
  monthlyIncome: number;
};

// Stable id derived from the plan parameters so identical requests produce identical output.
export const buildPlanId = (params: Omit<PlanParams, "monthlyIncome">): string =>
  crypto
    .createHash("sha1")
    .update(
      [
        params.category,
        params.totalAmount,
        params.termYears,
        params.downPaymentPct,
        params.interestRate
      ].join(":")
    )
    .digest("hex")
    .slice(0, 8);

// Two-axis label: term length band and payment-to-income band.
export const classifyPlanName = (
  termYears: number,
  paymentRatio: number,
  messages: MessageCatalog = defaultMessages
): string => {
  const text = messages.planNames;
  const term =
    termYears <= 10 ? text.fastPayoff : termYears <= 20 ? text.balanced : text.longTerm;
  const affordability =
    paymentRatio <= 25 ? text.comfortable : paymentRatio <= 35 ? text.moderate : text.demanding;

  return formatMessage(text.format, { term, years: termYears, affordability });
};

export const createLoanPlan = (
  params: PlanParams,
  messages: MessageCatalog = defaultMessages
): LoanPlan => {
  const downPayment = (params.totalAmount * params.downPaymentPct) / 100;
  const amount = params.totalAmount - downPayment;
  const monthlyPayment = calculateMonthlyPayment(amount, params.interestRate, params.termYears);
  const totalInterest = monthlyPayment * params.termYears * 12 - amount;
  const paymentToIncomeRatio = calculatePaymentRatio(monthlyPayment, params.monthlyIncome);

  return {
    id: buildPlanId(params),
    name: classifyPlanName(params.termYears, paymentToIncomeRatio, messages),
    category: params.category,
    amount,
    termYears: params.termYears,
    interestRate: params.interestRate,
    downPayment,
    downPaymentPct: params.downPaymentPct,
    monthlyPayment,
    totalInterest,
    totalCost: amount + totalInterest + downPayment,
    paymentToIncomeRatio
  };
};

// Enumerate every (term, down payment) combination for the category, in table order.
export const generateLoanOptions = (
  request: LoanOptionsRequest,
  messages: MessageCatalog = defaultMessages
): LoanPlan[] => {
  if (!Number.isFinite(request.totalAmount) || request.totalAmount <= 0) {
    throw new ValidationError("totalAmount", "totalAmount must be greater than 0");
  }
  assertFiniteNonNegative("monthlyIncome", request.monthlyIncome);
  if (request.customRate !== undefined) {
    assertFiniteNonNegative("customRate", request.customRate);
  }

  const interestRate = request.customRate ?? DEFAULT_RATES[request.category];
  const plans: LoanPlan[] = [];

  for (const termYears of TERM_OPTIONS[request.category]) {
    for (const downPaymentPct of DOWN_PAYMENT_OPTIONS[request.category]) {
      plans.push(
        createLoanPlan(
          {
            category: request.category,
            totalAmount: request.totalAmount,
            downPaymentPct,
            interestRate,
            termYears,
            monthlyIncome: request.monthlyIncome
          },
          messages
        )
      );
    }
  }

  return plans;
};
