import { FastifyInstance } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import {
  buildAmortizationSchedule,
  getPaymentBreakdown,
  summarizeSchedule
} from "../engine/amortization";
import {
  buildAmortizationChart,
  buildBalanceChart,
  buildCumulativeInterestChart,
  buildPaymentBreakdownChart
} from "../engine/chartData";
import { amortizationRequestSchema } from "../schemas/loanPlanning";
import { parseWithSchema } from "../utils/validation";
import { EngineRouteOptions } from "./types";

export default async function amortizationRoutes(
  fastify: FastifyInstance,
  opts: EngineRouteOptions
) {
  fastify.addHook("preHandler", fastify.authenticate);

  // Full schedule for an arbitrary principal/rate/term, with summaries and charts.
  fastify.post(
    "/",
    { schema: { body: zodToJsonSchema(amortizationRequestSchema) } },
    async (request, reply) => {
      const parsed = parseWithSchema(amortizationRequestSchema, request.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error });
      }

      const interval = parsed.data.interval ?? "yearly";
      const period = parsed.data.breakdownPeriod ?? 1;
      const schedule = buildAmortizationSchedule(
        parsed.data.loanAmount,
        parsed.data.annualRate,
        parsed.data.termYears,
        { startDate: parsed.data.startDate }
      );

      return {
        schedule,
        summary: summarizeSchedule(schedule, interval, opts.messages),
        breakdown: getPaymentBreakdown(schedule, period),
        charts: {
          amortization: buildAmortizationChart(schedule, interval, opts.messages),
          balance: buildBalanceChart(schedule, interval, opts.messages),
          cumulativeInterest: buildCumulativeInterestChart(schedule, interval, opts.messages),
          breakdown: buildPaymentBreakdownChart(schedule, period, opts.messages)
        }
      };
    }
  );
}
