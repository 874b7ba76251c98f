import { addMonths, format, isValid, parseISO, startOfDay } from "date-fns";

export const DATE_FORMAT = "yyyy-MM-dd";
const dateOnlyPattern = /^\d{4}-\d{2}-\d{2}$/;

// Format a date as YYYY-MM-DD.
export const toDateKey = (date: Date): string => format(date, DATE_FORMAT);

// Parse YYYY-MM-DD into a local date at start of day.
export const parseDate = (value: string): Date => startOfDay(parseISO(value));

// Strict YYYY-MM-DD check that also rejects impossible dates.
export const isDateKey = (value: string): boolean =>
  dateOnlyPattern.test(value) && isValid(parseDate(value));

// Date math helpers with explicit naming.
export const addMonthsSafe = (date: Date, months: number): Date => addMonths(date, months);
