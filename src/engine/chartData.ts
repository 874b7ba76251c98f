import { roundMoney } from "../utils/money";
import { getPaymentBreakdown, summarizeSchedule } from "./amortization";
import { MessageCatalog, defaultMessages, formatMessage } from "./messages";
import {
  AmortizationSchedule,
  ChartData,
  ChartDataset,
  ChartType,
  LoanPlan,
  ScheduleInterval
} from "./types";

export const CHART_COLORS = {
  principal: "#2E86AB",
  interest: "#A23B72",
  balance: "#F18F01",
  planA: "#06A77D",
  planB: "#D4AF37",
  totalCost: "#C73E1D",
  monthly: "#6C757D"
};

const MAX_PLANS_PER_CHART = 3;

const dataset = (label: string, values: number[], colorHint: string): ChartDataset => ({
  label,
  data: values.map(roundMoney),
  colorHint
});

const emptyChart = (title: string): ChartData => ({
  title,
  chartType: "line",
  xLabel: "",
  yLabel: "",
  labels: [],
  datasets: []
});

const chart = (
  title: string,
  chartType: ChartType,
  axes: { x: string; y: string },
  labels: string[],
  datasets: ChartDataset[]
): ChartData => ({ title, chartType, xLabel: axes.x, yLabel: axes.y, labels, datasets });

// Principal vs interest paid per bucket.
export const buildAmortizationChart = (
  schedule: AmortizationSchedule,
  interval: ScheduleInterval = "yearly",
  messages: MessageCatalog = defaultMessages
): ChartData => {
  const text = messages.charts;
  const points = summarizeSchedule(schedule, interval, messages);
  if (points.length === 0) return emptyChart(text.amortizationTitle);

  return chart(
    text.amortizationTitle,
    "area",
    { x: text.periodAxis, y: text.amountAxis },
    points.map((point) => point.label),
    [
      dataset(
        text.principal,
        points.map((point) => point.principalPaid),
        CHART_COLORS.principal
      ),
      dataset(
        text.interest,
        points.map((point) => point.interestPaid),
        CHART_COLORS.interest
      )
    ]
  );
};

export const buildBalanceChart = (
  schedule: AmortizationSchedule,
  interval: ScheduleInterval = "yearly",
  messages: MessageCatalog = defaultMessages
): ChartData => {
  const text = messages.charts;
  const points = summarizeSchedule(schedule, interval, messages);
  if (points.length === 0) return emptyChart(text.balanceTitle);

  return chart(
    text.balanceTitle,
    "line",
    { x: text.periodAxis, y: text.balanceAxis },
    points.map((point) => point.label),
    [
      dataset(
        text.balance,
        points.map((point) => point.remainingBalance),
        CHART_COLORS.balance
      )
    ]
  );
};

export const buildCumulativeInterestChart = (
  schedule: AmortizationSchedule,
  interval: ScheduleInterval = "yearly",
  messages: MessageCatalog = defaultMessages
): ChartData => {
  const text = messages.charts;
  const points = summarizeSchedule(schedule, interval, messages);
  if (points.length === 0) return emptyChart(text.cumulativeInterestTitle);

  return chart(
    text.cumulativeInterestTitle,
    "area",
    { x: text.periodAxis, y: text.totalInterestAxis },
    points.map((point) => point.label),
    [
      dataset(
        text.cumulativeInterest,
        points.map((point) => point.cumulativeInterest),
        CHART_COLORS.interest
      )
    ]
  );
};

// Side-by-side monthly payment, total interest and total cost per plan.
export const buildPlanComparisonChart = (
  plans: LoanPlan[],
  messages: MessageCatalog = defaultMessages
): ChartData => {
  const text = messages.charts;
  if (plans.length === 0) return emptyChart(text.comparisonTitle);

  return chart(
    text.comparisonTitle,
    "bar",
    { x: text.planAxis, y: text.amountAxis },
    plans.map((plan) => plan.name),
    [
      dataset(
        text.monthlyPayment,
        plans.map((plan) => plan.monthlyPayment),
        CHART_COLORS.monthly
      ),
      dataset(
        text.totalInterest,
        plans.map((plan) => plan.totalInterest),
        CHART_COLORS.interest
      ),
      dataset(
        text.totalCost,
        plans.map((plan) => plan.totalCost),
        CHART_COLORS.totalCost
      )
    ]
  );
};

// Pie of one payment's principal/interest split; the renderer picks slice colors.
export const buildPaymentBreakdownChart = (
  schedule: AmortizationSchedule,
  period = 1,
  messages: MessageCatalog = defaultMessages
): ChartData => {
  const text = messages.charts;
  if (schedule.periods.length === 0) return emptyChart(text.paymentBreakdown);

  const breakdown = getPaymentBreakdown(schedule, period);
  if (breakdown.payment === 0) return emptyChart(text.paymentBreakdown);

  return chart(
    formatMessage(text.breakdownTitle, { period: breakdown.period }),
    "pie",
    { x: "", y: "" },
    [text.principal, text.interest],
    [dataset(text.paymentBreakdown, [breakdown.principal, breakdown.interest], "")]
  );
};

export type PlanSchedule = {
  plan: LoanPlan;
  schedule: AmortizationSchedule;
};

/**
 * Remaining balance per plan on a shared axis taken from the longest schedule.
 * Plans that finish earlier stay at a zero balance for the remaining buckets.
 */
export const buildMultiPlanBalanceChart = (
  entries: PlanSchedule[],
  interval: ScheduleInterval = "yearly",
  messages: MessageCatalog = defaultMessages
): ChartData => {
  const text = messages.charts;
  const visible = entries.slice(0, MAX_PLANS_PER_CHART);
  if (visible.length === 0) return emptyChart(text.multiPlanTitle);

  const summaries = visible.map((entry) =>
    summarizeSchedule(entry.schedule, interval, messages)
  );
  const longest = summaries.reduce(
    (best, points) => (points.length > best.length ? points : best),
    summaries[0]
  );
  const labels = longest.map((point) => point.label);
  const colors = [CHART_COLORS.planA, CHART_COLORS.planB, CHART_COLORS.balance];

  const datasets = visible.map((entry, index) =>
    dataset(
      entry.plan.name,
      labels.map((_, position) => summaries[index][position]?.remainingBalance ?? 0),
      colors[index % colors.length]
    )
  );

  return chart(
    text.multiPlanTitle,
    "line",
    { x: text.periodAxis, y: text.balanceAxis },
    labels,
    datasets
  );
};
