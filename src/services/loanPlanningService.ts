import { analyzeAffordability } from "../engine/affordability";
import { buildAmortizationSchedule, summarizeSchedule } from "../engine/amortization";
import {
  buildAmortizationChart,
  buildMultiPlanBalanceChart,
  buildPlanComparisonChart
} from "../engine/chartData";
import { ValidationError } from "../engine/errors";
import { MessageCatalog, defaultMessages } from "../engine/messages";
import { generateLoanOptions } from "../engine/planGenerator";
import { rankLoanPlans, selectBestPlans } from "../engine/planRanker";
import {
  AffordabilityAnalysis,
  AmortizationSchedule,
  ChartData,
  FinancialProfile,
  LoanCategory,
  LoanPlan,
  RankedPlan,
  RankingPreferences,
  ScheduleInterval,
  SchedulePoint
} from "../engine/types";

export type LoanPlanningRequest = {
  profile: FinancialProfile;
  category: LoanCategory;
  count?: number;
  interval?: ScheduleInterval;
  preferences?: RankingPreferences;
  customRate?: number;
  startDate?: string;
};

export type RecommendedPlan = RankedPlan & {
  schedule: AmortizationSchedule;
  summary: SchedulePoint[];
};

export type LoanPlanningResult = {
  category: LoanCategory;
  affordability: AffordabilityAnalysis;
  candidates: RankedPlan[];
  recommended: RecommendedPlan[];
  charts: {
    comparison: ChartData;
    balances: ChartData;
    amortization: ChartData[];
  };
};

export const DEFAULT_RECOMMENDATION_COUNT = 2;

// Profile + category -> candidates -> ranking -> diverse pick -> schedules -> charts.
export const planLoan = (
  request: LoanPlanningRequest,
  messages: MessageCatalog = defaultMessages
): LoanPlanningResult => {
  const count = request.count ?? DEFAULT_RECOMMENDATION_COUNT;
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError("count", "count must be a positive whole number");
  }
  const interval = request.interval ?? "yearly";

  const affordability = analyzeAffordability(request.profile, { messages });
  const plans = generateLoanOptions(
    {
      totalAmount: request.profile.desiredLoanAmount,
      category: request.category,
      monthlyIncome: request.profile.monthlyIncome,
      customRate: request.customRate
    },
    messages
  );
  const candidates = rankLoanPlans(plans, request.preferences, messages);

  const recommended = selectBestPlans(candidates, count).map((ranked): RecommendedPlan => {
    const schedule = buildAmortizationSchedule(
      ranked.plan.amount,
      ranked.plan.interestRate,
      ranked.plan.termYears,
      { startDate: request.startDate }
    );
    return { ...ranked, schedule, summary: summarizeSchedule(schedule, interval, messages) };
  });

  const recommendedPlans: LoanPlan[] = recommended.map((entry) => entry.plan);

  return {
    category: request.category,
    affordability,
    candidates,
    recommended,
    charts: {
      comparison: buildPlanComparisonChart(recommendedPlans, messages),
      balances: buildMultiPlanBalanceChart(recommended, interval, messages),
      amortization: recommended.map((entry) =>
        buildAmortizationChart(entry.schedule, interval, messages)
      )
    }
  };
};
