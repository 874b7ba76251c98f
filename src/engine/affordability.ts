import { formatMoney, formatPct } from "../utils/money";
import { calculateFinancialMetrics } from "./metrics";
import { MessageCatalog, defaultMessages, formatMessage } from "./messages";
import {
  AffordabilityAnalysis,
  AffordabilityStatus,
  BenchmarkLoan,
  FinancialMetrics,
  FinancialProfile
} from "./types";

export const SAFE_PAYMENT_RATIO = 30;
export const WARNING_PAYMENT_RATIO = 40;
// Above this ratio a danger verdict is explained as "payment too high".
export const HIGH_RATIO_MESSAGE_THRESHOLD = 35;
export const MINIMUM_SAVINGS_RATIO = 0.1;

export const getAffordabilityStatus = (
  paymentRatio: number,
  disposableIncome: number,
  estimatedPayment: number
): AffordabilityStatus => {
  if (disposableIncome <= 0 || paymentRatio > WARNING_PAYMENT_RATIO) return "danger";
  if (disposableIncome < estimatedPayment) return "danger";
  if (paymentRatio > SAFE_PAYMENT_RATIO) return "warning";
  return "safe";
};

export const generateRecommendations = (
  profile: FinancialProfile,
  metrics: FinancialMetrics,
  status: AffordabilityStatus,
  messages: MessageCatalog = defaultMessages
): string[] => {
  const text = messages.affordability;
  const recommendations: string[] = [];
  const ratio = formatPct(metrics.paymentRatio);

  if (status === "danger") {
    if (metrics.disposableIncome <= 0) {
      recommendations.push(
        formatMessage(text.negativeDisposable, {
          deficit: formatMoney(Math.abs(metrics.disposableIncome))
        })
      );
    } else if (metrics.paymentRatio > HIGH_RATIO_MESSAGE_THRESHOLD) {
      recommendations.push(
        formatMessage(text.highRatio, {
          ratio,
          excess: formatPct(metrics.paymentRatio - SAFE_PAYMENT_RATIO)
        })
      );
    } else {
      recommendations.push(
        formatMessage(text.paymentExceedsDisposable, {
          payment: formatMoney(metrics.estimatedPayment),
          disposable: formatMoney(metrics.disposableIncome),
          shortfall: formatMoney(metrics.estimatedPayment - metrics.disposableIncome)
        })
      );
    }
  } else if (status === "warning") {
    recommendations.push(formatMessage(text.borderline, { ratio }));
  } else {
    recommendations.push(formatMessage(text.safe, { ratio }));
  }

  const minimumSavings = profile.desiredLoanAmount * MINIMUM_SAVINGS_RATIO;
  if (profile.savings < minimumSavings) {
    recommendations.push(formatMessage(text.lowSavings, { minimum: formatMoney(minimumSavings) }));
  }

  return recommendations;
};

export type AffordabilityOptions = {
  messages?: MessageCatalog;
  benchmark?: BenchmarkLoan;
};

// Classify the profile and attach recommendation text for the resulting tier.
export const analyzeAffordability = (
  profile: FinancialProfile,
  options: AffordabilityOptions = {}
): AffordabilityAnalysis => {
  const metrics = calculateFinancialMetrics(profile, options.benchmark);
  const status = getAffordabilityStatus(
    metrics.paymentRatio,
    metrics.disposableIncome,
    metrics.estimatedPayment
  );

  return {
    status,
    recommendations: generateRecommendations(profile, metrics, status, options.messages),
    metrics
  };
};
