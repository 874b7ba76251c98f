import { assertFiniteNonNegative, assertPositive } from "./errors";
import { BenchmarkLoan, FinancialMetrics, FinancialProfile } from "./types";

// Fixed benchmark behind the first-pass affordability read; independent of the generated plans.
export const BENCHMARK_LOAN: BenchmarkLoan = {
  annualRate: 0.05,
  termYears: 5
};

/**
 * Fixed-rate amortizing payment: P * r(1+r)^n / ((1+r)^n - 1), with r the monthly rate
 * and n the number of monthly payments. A zero rate degenerates to P / n.
 */
export const calculateMonthlyPayment = (
  principal: number,
  annualRate: number,
  years: number
): number => {
  assertFiniteNonNegative("principal", principal);
  assertFiniteNonNegative("annualRate", annualRate);
  assertPositive("years", years);

  const months = years * 12;
  if (annualRate === 0) {
    return principal / months;
  }

  // (1+r)^n - 1 via expm1/log1p; the naive form rounds to 0 for tiny rates.
  const monthlyRate = annualRate / 12;
  const growthLessOne = Math.expm1(months * Math.log1p(monthlyRate));
  if (growthLessOne === 0) {
    return principal / months;
  }
  return (principal * monthlyRate * (growthLessOne + 1)) / growthLessOne;
};

export const calculateTotalIncome = (monthlyIncome: number, otherIncome: number): number =>
  monthlyIncome + otherIncome;

export const calculateTotalExpenses = (
  monthlyExpenses: number,
  existingLoanPayments: number
): number => monthlyExpenses + existingLoanPayments;

// May be negative.
export const calculateDisposableIncome = (totalIncome: number, totalExpenses: number): number =>
  totalIncome - totalExpenses;

// Payment as a percentage of income; zero income is a defined degenerate case, not an error.
export const calculatePaymentRatio = (payment: number, income: number): number => {
  if (income <= 0) return 0;
  return (payment / income) * 100;
};

export const validateFinancialProfile = (profile: FinancialProfile) => {
  assertFiniteNonNegative("monthlyIncome", profile.monthlyIncome);
  assertFiniteNonNegative("otherIncome", profile.otherIncome);
  assertFiniteNonNegative("monthlyExpenses", profile.monthlyExpenses);
  assertFiniteNonNegative("existingLoanPayments", profile.existingLoanPayments);
  assertFiniteNonNegative("savings", profile.savings);
  assertFiniteNonNegative("desiredLoanAmount", profile.desiredLoanAmount);
};

export const calculateFinancialMetrics = (
  profile: FinancialProfile,
  benchmark: BenchmarkLoan = BENCHMARK_LOAN
): FinancialMetrics => {
  validateFinancialProfile(profile);

  const totalIncome = calculateTotalIncome(profile.monthlyIncome, profile.otherIncome);
  const totalExpenses = calculateTotalExpenses(
    profile.monthlyExpenses,
    profile.existingLoanPayments
  );
  const disposableIncome = calculateDisposableIncome(totalIncome, totalExpenses);
  const estimatedPayment = calculateMonthlyPayment(
    profile.desiredLoanAmount,
    benchmark.annualRate,
    benchmark.termYears
  );

  return {
    totalIncome,
    totalExpenses,
    disposableIncome,
    estimatedPayment,
    // Ratio is against primary income only.
    paymentRatio: calculatePaymentRatio(estimatedPayment, profile.monthlyIncome),
    termYears: benchmark.termYears,
    interestRate: benchmark.annualRate
  };
};
