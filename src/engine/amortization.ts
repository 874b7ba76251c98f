import { addMonthsSafe, isDateKey, parseDate, toDateKey } from "../utils/dates";
import { ValidationError, assertFiniteNonNegative } from "./errors";
import { MessageCatalog, defaultMessages, formatMessage } from "./messages";
import { calculateMonthlyPayment } from "./metrics";
import {
  AmortizationSchedule,
  PaymentBreakdown,
  PaymentPeriod,
  ScheduleInterval,
  SchedulePoint
} from "./types";

export type ScheduleOptions = {
  // YYYY-MM-DD; the first payment falls due one month later.
  startDate?: string;
};

const INTERVAL_MONTHS: Record<ScheduleInterval, number> = {
  monthly: 1,
  quarterly: 3,
  yearly: 12
};

const bucketLabel = (
  interval: ScheduleInterval,
  index: number,
  text: MessageCatalog["charts"]
): string => {
  const template =
    interval === "monthly"
      ? text.monthLabel
      : interval === "quarterly"
        ? text.quarterLabel
        : text.yearLabel;
  return formatMessage(template, { index });
};

// Month-by-month schedule for a fixed-rate loan; the last period absorbs floating-point drift.
export const buildAmortizationSchedule = (
  loanAmount: number,
  annualRate: number,
  termYears: number,
  options: ScheduleOptions = {}
): AmortizationSchedule => {
  assertFiniteNonNegative("loanAmount", loanAmount);
  if (!Number.isInteger(termYears) || termYears <= 0) {
    throw new ValidationError("termYears", "termYears must be a positive whole number");
  }
  if (options.startDate !== undefined && !isDateKey(options.startDate)) {
    throw new ValidationError("startDate", "startDate must be a YYYY-MM-DD date");
  }

  const monthlyRate = annualRate / 12;
  const termMonths = termYears * 12;
  const payment = calculateMonthlyPayment(loanAmount, annualRate, termYears);
  const start = options.startDate ? parseDate(options.startDate) : null;

  const periods: PaymentPeriod[] = [];
  let balance = loanAmount;
  let cumulativeInterest = 0;

  for (let month = 1; month <= termMonths; month += 1) {
    const interest = balance * monthlyRate;
    let principal = payment - interest;
    balance -= principal;
    cumulativeInterest += interest;

    if (month === termMonths) {
      principal += balance;
      balance = 0;
    }

    const period: PaymentPeriod = {
      period: month,
      payment,
      principal,
      interest,
      remainingBalance: balance,
      cumulativeInterest
    };
    if (start) {
      period.dueDate = toDateKey(addMonthsSafe(start, month));
    }
    periods.push(period);
  }

  const totalPayments = payment * termMonths;

  return {
    loanAmount,
    interestRate: annualRate,
    termMonths,
    monthlyPayment: payment,
    periods,
    totalInterest: totalPayments - loanAmount,
    totalPayments
  };
};

// Group periods into fixed-size buckets; a trailing partial bucket is kept.
export const summarizeSchedule = (
  schedule: AmortizationSchedule,
  interval: ScheduleInterval = "yearly",
  messages: MessageCatalog = defaultMessages
): SchedulePoint[] => {
  const size = INTERVAL_MONTHS[interval];
  const points: SchedulePoint[] = [];

  for (let start = 0; start < schedule.periods.length; start += size) {
    const group = schedule.periods.slice(start, start + size);
    const last = group[group.length - 1];
    points.push({
      label: bucketLabel(interval, points.length + 1, messages.charts),
      periodEnd: last.period,
      principalPaid: group.reduce((sum, period) => sum + period.principal, 0),
      interestPaid: group.reduce((sum, period) => sum + period.interest, 0),
      remainingBalance: last.remainingBalance,
      cumulativeInterest: last.cumulativeInterest
    });
  }

  return points;
};

export const getPaymentBreakdown = (
  schedule: AmortizationSchedule,
  period = 1
): PaymentBreakdown => {
  const entry = schedule.periods[period - 1];
  if (!Number.isInteger(period) || !entry) {
    throw new ValidationError(
      "period",
      `period must be between 1 and ${schedule.periods.length}`
    );
  }

  const share = (part: number) => (entry.payment > 0 ? (part / entry.payment) * 100 : 0);

  return {
    period: entry.period,
    payment: entry.payment,
    principal: entry.principal,
    interest: entry.interest,
    principalPct: share(entry.principal),
    interestPct: share(entry.interest),
    remainingBalance: entry.remainingBalance
  };
};
