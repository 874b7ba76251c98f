// Shared types for the loan planning engine inputs/outputs.
export type LoanCategory = "mortgage" | "personal" | "auto" | "student" | "business" | "unknown";

// Household figures supplied by the caller, all monthly except savings and the loan amount.
export type FinancialProfile = {
  monthlyIncome: number;
  otherIncome: number;
  monthlyExpenses: number;
  existingLoanPayments: number;
  savings: number;
  desiredLoanAmount: number;
};

// Rate/term assumption behind the quick affordability estimate.
export type BenchmarkLoan = {
  annualRate: number;
  termYears: number;
};

export type FinancialMetrics = {
  totalIncome: number;
  totalExpenses: number;
  disposableIncome: number;
  estimatedPayment: number;
  paymentRatio: number;
  termYears: number;
  interestRate: number;
};

export type AffordabilityStatus = "safe" | "warning" | "danger";

export type AffordabilityAnalysis = {
  status: AffordabilityStatus;
  recommendations: string[];
  metrics: FinancialMetrics;
};

// A single candidate loan structure. `amount` is the financed amount after the down payment.
export type LoanPlan = {
  id: string;
  name: string;
  category: LoanCategory;
  amount: number;
  termYears: number;
  interestRate: number;
  downPayment: number;
  downPaymentPct: number;
  monthlyPayment: number;
  totalInterest: number;
  totalCost: number;
  paymentToIncomeRatio: number;
};

export type PaymentPeriod = {
  period: number;
  dueDate?: string;
  payment: number;
  principal: number;
  interest: number;
  remainingBalance: number;
  cumulativeInterest: number;
};

export type AmortizationSchedule = {
  loanAmount: number;
  interestRate: number;
  termMonths: number;
  monthlyPayment: number;
  periods: PaymentPeriod[];
  totalInterest: number;
  totalPayments: number;
};

export type ScheduleInterval = "monthly" | "quarterly" | "yearly";

// Aggregated bucket of consecutive periods.
export type SchedulePoint = {
  label: string;
  periodEnd: number;
  principalPaid: number;
  interestPaid: number;
  remainingBalance: number;
  cumulativeInterest: number;
};

export type PaymentBreakdown = {
  period: number;
  payment: number;
  principal: number;
  interest: number;
  principalPct: number;
  interestPct: number;
  remainingBalance: number;
};

export type RankingPreferences = {
  preferShortTerm?: boolean;
  preferLongTerm?: boolean;
};

export type RankedPlan = {
  plan: LoanPlan;
  score: number;
  affordabilityScore: number;
  costScore: number;
  paymentScore: number;
  termScore: number;
  flexibilityScore: number;
  recommendationReason: string;
};

export type ComparisonWinner = "a" | "b" | "tie";

// Deltas are expressed as plan B minus plan A.
export type ComparisonResult = {
  planA: LoanPlan;
  planB: LoanPlan;
  winner: ComparisonWinner;
  monthlyPaymentDiff: number;
  totalCostDiff: number;
  interestDiff: number;
  termDiff: number;
  prosPlanA: string[];
  prosPlanB: string[];
  recommendation: string;
};

export type ChartType = "line" | "bar" | "pie" | "area";

export type ChartDataset = {
  label: string;
  data: number[];
  colorHint: string;
};

// Generic labeled series; every dataset's data has one value per label.
export type ChartData = {
  title: string;
  chartType: ChartType;
  xLabel: string;
  yLabel: string;
  labels: string[];
  datasets: ChartDataset[];
};
