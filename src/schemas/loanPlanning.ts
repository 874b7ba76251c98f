import { z } from "zod";
import { dateString } from "../utils/validation";

export const loanCategorySchema = z.enum([
  "mortgage",
  "personal",
  "auto",
  "student",
  "business",
  "unknown"
]);

export const scheduleIntervalSchema = z.enum(["monthly", "quarterly", "yearly"]);

export const financialProfileSchema = z.object({
  monthlyIncome: z.number().nonnegative(),
  otherIncome: z.number().nonnegative().default(0),
  monthlyExpenses: z.number().nonnegative(),
  existingLoanPayments: z.number().nonnegative().default(0),
  savings: z.number().nonnegative().default(0),
  desiredLoanAmount: z.number().nonnegative()
});

export const affordabilityRequestSchema = z.object({
  profile: financialProfileSchema
});

export const planPreviewRequestSchema = z.object({
  profile: financialProfileSchema,
  // Free-form tag from the upstream classifier; unrecognized values fall back to "unknown".
  category: z.string().max(40).optional(),
  count: z.number().int().min(1).max(6).optional(),
  interval: scheduleIntervalSchema.optional(),
  preferences: z
    .object({
      preferShortTerm: z.boolean().optional(),
      preferLongTerm: z.boolean().optional()
    })
    .optional(),
  customRate: z.number().min(0).max(1).optional(),
  startDate: dateString.optional()
});

export const loanPlanSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: loanCategorySchema,
  amount: z.number().nonnegative(),
  termYears: z.number().int().positive(),
  interestRate: z.number().min(0).max(1),
  downPayment: z.number().nonnegative(),
  downPaymentPct: z.number().min(0).max(100),
  monthlyPayment: z.number().nonnegative(),
  totalInterest: z.number(),
  totalCost: z.number().nonnegative(),
  paymentToIncomeRatio: z.number().nonnegative()
});

export const compareRequestSchema = z.object({
  planA: loanPlanSchema,
  planB: loanPlanSchema
});

export const amortizationRequestSchema = z.object({
  loanAmount: z.number().nonnegative(),
  annualRate: z.number().min(0).max(1),
  termYears: z.number().int().min(1).max(40),
  interval: scheduleIntervalSchema.optional(),
  startDate: dateString.optional(),
  breakdownPeriod: z.number().int().min(1).optional()
});
