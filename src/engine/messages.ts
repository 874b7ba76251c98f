import fs from "fs";
import path from "path";
import { z } from "zod";

const loanTypesSchema = z.object({
  mortgage: z.string(),
  personal: z.string(),
  auto: z.string(),
  student: z.string(),
  business: z.string(),
  unknown: z.string()
});

const loanExplanationSchema = z.object({
  title: z.string(),
  description: z.string(),
  keyPoints: z.array(z.string()),
  tip: z.string().optional(),
  // Worked figures, one line each.
  example: z.array(z.string()).optional()
});

const glossaryEntrySchema = z.object({
  name: z.string(),
  definition: z.string()
});

export const messageCatalogSchema = z.object({
  loanTypes: loanTypesSchema,
  loanExplanations: z.object({
    mortgage: loanExplanationSchema,
    personal: loanExplanationSchema,
    auto: loanExplanationSchema,
    student: loanExplanationSchema,
    business: loanExplanationSchema,
    unknown: loanExplanationSchema
  }),
  glossary: z.object({
    interestRate: glossaryEntrySchema,
    installment: glossaryEntrySchema,
    term: glossaryEntrySchema,
    apr: glossaryEntrySchema
  }),
  affordability: z.object({
    negativeDisposable: z.string(),
    highRatio: z.string(),
    paymentExceedsDisposable: z.string(),
    borderline: z.string(),
    safe: z.string(),
    lowSavings: z.string()
  }),
  planNames: z.object({
    format: z.string(),
    fastPayoff: z.string(),
    balanced: z.string(),
    longTerm: z.string(),
    comfortable: z.string(),
    moderate: z.string(),
    demanding: z.string()
  }),
  ranking: z.object({
    separator: z.string(),
    veryAffordable: z.string(),
    reliable: z.string(),
    lowTotalCost: z.string(),
    lowMonthlyPayment: z.string(),
    fastPayoff: z.string(),
    lightMonthlyBurden: z.string(),
    balancedChoice: z.string()
  }),
  comparison: z.object({
    lowerPayment: z.string(),
    lowerCost: z.string(),
    interestSavings: z.string(),
    fasterPayoff: z.string(),
    betterRatio: z.string(),
    alternative: z.string(),
    winner: z.string(),
    tie: z.string()
  }),
  charts: z.object({
    amortizationTitle: z.string(),
    balanceTitle: z.string(),
    cumulativeInterestTitle: z.string(),
    comparisonTitle: z.string(),
    breakdownTitle: z.string(),
    multiPlanTitle: z.string(),
    monthLabel: z.string(),
    quarterLabel: z.string(),
    yearLabel: z.string(),
    periodAxis: z.string(),
    planAxis: z.string(),
    amountAxis: z.string(),
    balanceAxis: z.string(),
    totalInterestAxis: z.string(),
    principal: z.string(),
    interest: z.string(),
    balance: z.string(),
    cumulativeInterest: z.string(),
    monthlyPayment: z.string(),
    totalInterest: z.string(),
    totalCost: z.string(),
    paymentBreakdown: z.string()
  })
});

// Text is content, not control flow: every user-facing string is looked up here by key.
export type MessageCatalog = z.infer<typeof messageCatalogSchema>;

export type LoanExplanation = z.infer<typeof loanExplanationSchema>;

const catalogOverrideSchema = messageCatalogSchema.deepPartial();

export type MessageCatalogOverride = z.infer<typeof catalogOverrideSchema>;

// Display order of the glossary.
export const GLOSSARY_TERMS = ["interestRate", "installment", "term", "apr"] as const;

const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "../../locales/en.json");

const readCatalog = <S extends z.ZodTypeAny>(schema: S, filePath: string): z.infer<S> => {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid message catalog ${filePath}: ${issues}`);
  }
  return parsed.data;
};

// English text shipped in locales/en.json; every other catalog is an override on top of it.
export const defaultMessages: MessageCatalog = readCatalog(messageCatalogSchema, DEFAULT_CATALOG_PATH);

// Fill {placeholders}; unknown placeholders are left as written.
export const formatMessage = (
  template: string,
  values: Record<string, string | number> = {}
): string =>
  template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });

type ExplanationOverrides = MessageCatalogOverride["loanExplanations"];
type GlossaryOverrides = MessageCatalogOverride["glossary"];

const mergeExplanations = (
  base: MessageCatalog["loanExplanations"],
  override: ExplanationOverrides = {}
): MessageCatalog["loanExplanations"] => ({
  mortgage: { ...base.mortgage, ...override.mortgage },
  personal: { ...base.personal, ...override.personal },
  auto: { ...base.auto, ...override.auto },
  student: { ...base.student, ...override.student },
  business: { ...base.business, ...override.business },
  unknown: { ...base.unknown, ...override.unknown }
});

const mergeGlossary = (
  base: MessageCatalog["glossary"],
  override: GlossaryOverrides = {}
): MessageCatalog["glossary"] => ({
  interestRate: { ...base.interestRate, ...override.interestRate },
  installment: { ...base.installment, ...override.installment },
  term: { ...base.term, ...override.term },
  apr: { ...base.apr, ...override.apr }
});

export const mergeMessageCatalog = (
  base: MessageCatalog,
  override: MessageCatalogOverride
): MessageCatalog => ({
  loanTypes: { ...base.loanTypes, ...override.loanTypes },
  loanExplanations: mergeExplanations(base.loanExplanations, override.loanExplanations),
  glossary: mergeGlossary(base.glossary, override.glossary),
  affordability: { ...base.affordability, ...override.affordability },
  planNames: { ...base.planNames, ...override.planNames },
  ranking: { ...base.ranking, ...override.ranking },
  comparison: { ...base.comparison, ...override.comparison },
  charts: { ...base.charts, ...override.charts }
});

// Load a JSON catalog and lay it over the defaults; missing keys keep the default text.
export const loadMessageCatalog = (filePath: string, base: MessageCatalog = defaultMessages) =>
  mergeMessageCatalog(base, readCatalog(catalogOverrideSchema, filePath));

export const listGlossary = (messages: MessageCatalog = defaultMessages) =>
  GLOSSARY_TERMS.map((key) => ({ key, ...messages.glossary[key] }));
