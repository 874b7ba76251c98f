import { SAFE_PAYMENT_RATIO, WARNING_PAYMENT_RATIO } from "./affordability";
import { MessageCatalog, defaultMessages } from "./messages";
import { LoanPlan, RankedPlan, RankingPreferences } from "./types";

export const SCORE_WEIGHTS = {
  affordability: 0.3,
  cost: 0.25,
  payment: 0.2,
  term: 0.15,
  flexibility: 0.1
};

// Minimum spread between recommended plans.
export const MIN_TERM_GAP_YEARS = 5;
export const MIN_PAYMENT_GAP_RATIO = 0.15;

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export const scoreAffordability = (paymentRatio: number): number => {
  if (paymentRatio <= SAFE_PAYMENT_RATIO) return 100;
  if (paymentRatio <= WARNING_PAYMENT_RATIO) {
    return (
      100 -
      ((paymentRatio - SAFE_PAYMENT_RATIO) / (WARNING_PAYMENT_RATIO - SAFE_PAYMENT_RATIO)) * 50
    );
  }
  return Math.max(0, 50 - (paymentRatio - WARNING_PAYMENT_RATIO) * 2);
};

// Min-max normalization where the lowest value in the set scores 100.
export const scoreRelative = (value: number, all: number[]): number => {
  const min = Math.min(...all);
  const max = Math.max(...all);
  if (max === min) return 100;
  return clamp(100 - ((value - min) / (max - min)) * 100, 0, 100);
};

export const scoreTerm = (termYears: number, preferences: RankingPreferences = {}): number => {
  if (preferences.preferShortTerm) {
    return clamp(100 - (termYears - 10) * 5, 0, 100);
  }
  if (preferences.preferLongTerm) {
    return clamp((termYears - 10) * 5, 0, 100);
  }
  if (termYears >= 15 && termYears <= 20) return 100;
  if (termYears < 15) return clamp(70 + (termYears - 10) * 6, 0, 100);
  return clamp(100 - (termYears - 20) * 3, 0, 100);
};

// Shorter terms and lower ratios leave more room in the monthly budget.
export const scoreFlexibility = (termYears: number, paymentRatio: number): number => {
  const termFactor = clamp(100 - (termYears - 5) * 3, 0, 100);
  const ratioFactor = clamp(100 - paymentRatio * 2, 0, 100);
  return (termFactor + ratioFactor) / 2;
};

export const buildRecommendationReason = (
  plan: LoanPlan,
  scores: { affordability: number; cost: number; payment: number },
  messages: MessageCatalog = defaultMessages
): string => {
  const text = messages.ranking;
  const reasons: string[] = [];

  if (scores.affordability >= 80) {
    reasons.push(text.veryAffordable);
  } else if (scores.affordability >= 60) {
    reasons.push(text.reliable);
  }
  if (scores.cost >= 80) reasons.push(text.lowTotalCost);
  if (scores.payment >= 80) reasons.push(text.lowMonthlyPayment);
  if (plan.termYears <= 15) {
    reasons.push(text.fastPayoff);
  } else if (plan.termYears >= 25) {
    reasons.push(text.lightMonthlyBurden);
  }

  return reasons.length > 0 ? reasons.join(text.separator) : text.balancedChoice;
};

// Highest score first; ties go to the cheaper plan, then the shorter term.
export const compareRankedPlans = (a: RankedPlan, b: RankedPlan): number => {
  if (b.score !== a.score) return b.score - a.score;
  if (a.plan.totalCost !== b.plan.totalCost) return a.plan.totalCost - b.plan.totalCost;
  return a.plan.termYears - b.plan.termYears;
};

// Score each plan against the full candidate set and sort.
export const rankLoanPlans = (
  plans: LoanPlan[],
  preferences: RankingPreferences = {},
  messages: MessageCatalog = defaultMessages
): RankedPlan[] => {
  if (plans.length === 0) return [];

  const costs = plans.map((plan) => plan.totalCost);
  const payments = plans.map((plan) => plan.monthlyPayment);

  const ranked = plans.map((plan): RankedPlan => {
    const affordabilityScore = scoreAffordability(plan.paymentToIncomeRatio);
    const costScore = scoreRelative(plan.totalCost, costs);
    const paymentScore = scoreRelative(plan.monthlyPayment, payments);
    const termScore = scoreTerm(plan.termYears, preferences);
    const flexibilityScore = scoreFlexibility(plan.termYears, plan.paymentToIncomeRatio);

    const score =
      affordabilityScore * SCORE_WEIGHTS.affordability +
      costScore * SCORE_WEIGHTS.cost +
      paymentScore * SCORE_WEIGHTS.payment +
      termScore * SCORE_WEIGHTS.term +
      flexibilityScore * SCORE_WEIGHTS.flexibility;

    return {
      plan,
      score,
      affordabilityScore,
      costScore,
      paymentScore,
      termScore,
      flexibilityScore,
      recommendationReason: buildRecommendationReason(
        plan,
        { affordability: affordabilityScore, cost: costScore, payment: paymentScore },
        messages
      )
    };
  });

  return ranked.sort(compareRankedPlans);
};

export const isDiverseFrom = (plan: LoanPlan, selected: LoanPlan[]): boolean =>
  selected.every((other) => {
    if (Math.abs(plan.termYears - other.termYears) < MIN_TERM_GAP_YEARS) return false;
    const gap = Math.abs(plan.monthlyPayment - other.monthlyPayment);
    if (other.monthlyPayment === 0) return gap > 0;
    return gap / other.monthlyPayment >= MIN_PAYMENT_GAP_RATIO;
  });

/**
 * Greedy first-fit pick of `count` plans from a ranked list. The top plan is always taken;
 * later plans are taken only when far enough from every plan already chosen. If that leaves
 * the pick short, the best remaining plans fill it regardless of spread. Not globally optimal.
 * Results come back in rank order.
 */
export const selectBestPlans = (ranked: RankedPlan[], count: number): RankedPlan[] => {
  if (count <= 0 || ranked.length === 0) return [];
  if (ranked.length <= count) return [...ranked];

  const chosen = new Set<number>([0]);
  for (let index = 1; index < ranked.length && chosen.size < count; index += 1) {
    const selectedPlans = Array.from(chosen, (position) => ranked[position].plan);
    if (isDiverseFrom(ranked[index].plan, selectedPlans)) {
      chosen.add(index);
    }
  }

  for (let index = 1; index < ranked.length && chosen.size < count; index += 1) {
    chosen.add(index);
  }

  return ranked.filter((_, index) => chosen.has(index));
};
