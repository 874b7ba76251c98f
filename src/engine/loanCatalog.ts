import { LoanExplanation, MessageCatalog, defaultMessages } from "./messages";
import { LoanCategory } from "./types";

export const LOAN_CATEGORIES: readonly LoanCategory[] = [
  "mortgage",
  "personal",
  "auto",
  "student",
  "business",
  "unknown"
];

// Static annual rates per category, as decimal fractions.
export const DEFAULT_RATES: Record<LoanCategory, number> = {
  mortgage: 0.035,
  personal: 0.07,
  auto: 0.05,
  student: 0.04,
  business: 0.06,
  unknown: 0.06
};

// Ordered term options in years.
export const TERM_OPTIONS: Record<LoanCategory, readonly number[]> = {
  mortgage: [15, 20, 25, 30],
  personal: [3, 5, 7],
  auto: [3, 5, 7],
  student: [10, 15, 20],
  business: [5, 10, 15],
  unknown: [5, 10, 15]
};

// Down payment percentages (whole percent) crossed with every term option.
export const DOWN_PAYMENT_OPTIONS: Record<LoanCategory, readonly number[]> = {
  mortgage: [10, 15, 20],
  personal: [0],
  auto: [0],
  student: [0],
  business: [0],
  unknown: [0]
};

export const DEFAULT_TERMS: Record<LoanCategory, number> = {
  mortgage: 20,
  personal: 5,
  auto: 5,
  student: 10,
  business: 5,
  unknown: 5
};

// Category tags come from a best-effort classifier, so anything unrecognized maps to "unknown".
export const parseLoanCategory = (value: string | null | undefined): LoanCategory => {
  if (!value) return "unknown";
  const normalized = value.trim().toLowerCase();
  return LOAN_CATEGORIES.find((category) => category === normalized) ?? "unknown";
};

export type LoanCategoryInfo = {
  category: LoanCategory;
  name: string;
  interestRate: number;
  termOptions: number[];
  downPaymentOptions: number[];
  defaultTermYears: number;
  explanation: LoanExplanation;
};

// Table values plus the catalog's display name and plain-language explanation.
export const describeLoanCategory = (
  category: LoanCategory,
  messages: MessageCatalog = defaultMessages
): LoanCategoryInfo => ({
  category,
  name: messages.loanTypes[category],
  interestRate: DEFAULT_RATES[category],
  termOptions: [...TERM_OPTIONS[category]],
  downPaymentOptions: [...DOWN_PAYMENT_OPTIONS[category]],
  defaultTermYears: DEFAULT_TERMS[category],
  explanation: messages.loanExplanations[category]
});
