import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { buildApp } from "../src/app";
import { generateLoanOptions } from "../src/engine/planGenerator";

const app = buildApp({ jwtSecret: "test-secret", logger: false });
let authHeader: Record<string, string> = {};

const profile = {
  monthlyIncome: 2000,
  monthlyExpenses: 800,
  savings: 5000,
  desiredLoanAmount: 10000
};

beforeAll(async () => {
  await app.ready();
  authHeader = { authorization: `Bearer ${app.jwt.sign({ sub: "user-1" })}` };
});

afterAll(async () => {
  await app.close();
});

describe("public routes", () => {
  it("answers the health check", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true });
  });

  it("serves the OpenAPI document", async () => {
    const response = await app.inject({ method: "GET", url: "/docs/json" });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.info.title).toBe("Loan Planner API");
    expect(Object.keys(body.paths)).toContain("/loan-plans/preview");
  });
});

describe("authenticated routes", () => {
  it("rejects requests without a token", async () => {
    const response = await app.inject({ method: "GET", url: "/loan-types" });
    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: "Unauthorized" });
  });

  it("lists loan types", async () => {
    const response = await app.inject({ method: "GET", url: "/loan-types", headers: authHeader });
    const body = response.json();

    expect(body).toHaveLength(6);
    expect(body[0]).toMatchObject({
      category: "mortgage",
      name: "Mortgage",
      interestRate: 0.035,
      termOptions: [15, 20, 25, 30],
      downPaymentOptions: [10, 15, 20],
      defaultTermYears: 20
    });
    expect(body[0].explanation.tip).toBe(
      "Keep the monthly installment under 30-35% of your monthly income."
    );
  });

  it("describes a single category", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/loan-types/Student",
      headers: authHeader
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.category).toBe("student");
    expect(body.explanation.keyPoints[0]).toBe("Repayment: starts after your studies");
  });

  it("serves the glossary", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/loan-types/glossary",
      headers: authHeader
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().map((entry: { key: string }) => entry.key)).toEqual([
      "interestRate",
      "installment",
      "term",
      "apr"
    ]);
  });

  it("analyzes affordability with defaulted fields", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/affordability",
      headers: authHeader,
      payload: { profile }
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe("safe");
    expect(body.metrics.totalIncome).toBe(2000);
  });

  it("previews mortgage plans from a loose category tag", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/loan-plans/preview",
      headers: authHeader,
      payload: {
        profile: { ...profile, monthlyIncome: 3000, monthlyExpenses: 1000, desiredLoanAmount: 80000 },
        category: "Mortgage "
      }
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.disclaimer).toBe("NOT FINANCIAL ADVICE");
    expect(body.category).toBe("mortgage");
    expect(body.candidates).toHaveLength(12);
    expect(body.recommended).toHaveLength(2);
  });

  it("falls back to the unknown category", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/loan-plans/preview",
      headers: authHeader,
      payload: { profile, category: "crypto" }
    });
    const body = response.json();

    expect(body.category).toBe("unknown");
    expect(body.candidates).toHaveLength(3);
  });

  it("rejects an incomplete profile", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/loan-plans/preview",
      headers: authHeader,
      payload: { profile: { monthlyExpenses: 800, desiredLoanAmount: 10000 } }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("Invalid body");
  });

  it("maps engine validation failures to 400", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/loan-plans/preview",
      headers: authHeader,
      payload: { profile: { ...profile, desiredLoanAmount: 0 }, category: "personal" }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: "Validation failed",
      field: "totalAmount",
      details: "totalAmount must be greater than 0"
    });
  });

  it("compares two plans", async () => {
    const [short, , long] = generateLoanOptions({
      totalAmount: 10000,
      category: "personal",
      monthlyIncome: 2000
    });
    const response = await app.inject({
      method: "POST",
      url: "/loan-plans/compare",
      headers: authHeader,
      payload: { planA: short, planB: long }
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.winner).toBe("b");
    expect(body.termDiff).toBe(4);
  });

  it("builds an amortization schedule", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/amortization",
      headers: authHeader,
      payload: { loanAmount: 12000, annualRate: 0, termYears: 1 }
    });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.schedule.periods).toHaveLength(12);
    expect(body.summary).toHaveLength(1);
    expect(body.breakdown.principal).toBe(1000);
    expect(body.charts.breakdown.title).toBe("Payment breakdown - payment 1");
  });

  it("rejects a breakdown period past the schedule", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/amortization",
      headers: authHeader,
      payload: { loanAmount: 12000, annualRate: 0, termYears: 1, breakdownPeriod: 13 }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: "Validation failed",
      field: "period",
      details: "period must be between 1 and 12"
    });
  });
});
