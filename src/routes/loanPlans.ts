import { FastifyInstance } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { parseLoanCategory } from "../engine/loanCatalog";
import { compareLoanPlans } from "../engine/planComparison";
import { compareRequestSchema, planPreviewRequestSchema } from "../schemas/loanPlanning";
import { planLoan } from "../services/loanPlanningService";
import { parseWithSchema } from "../utils/validation";
import { EngineRouteOptions } from "./types";

export default async function loanPlansRoutes(
  fastify: FastifyInstance,
  opts: EngineRouteOptions
) {
  fastify.addHook("preHandler", fastify.authenticate);

  // Generate, rank and select loan plans for a profile.
  fastify.post(
    "/preview",
    { schema: { body: zodToJsonSchema(planPreviewRequestSchema) } },
    async (request, reply) => {
      const parsed = parseWithSchema(planPreviewRequestSchema, request.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error });
      }

      const category = parseLoanCategory(parsed.data.category);
      const result = planLoan(
        {
          profile: parsed.data.profile,
          category,
          count: parsed.data.count ?? opts.recommendationCount,
          interval: parsed.data.interval,
          preferences: parsed.data.preferences,
          customRate: parsed.data.customRate,
          startDate: parsed.data.startDate
        },
        opts.messages
      );

      request.log.info(
        {
          userId: request.user.sub,
          category,
          candidates: result.candidates.length,
          recommended: result.recommended.map((entry) => entry.plan.id)
        },
        "loan plans generated"
      );
      return { disclaimer: "NOT FINANCIAL ADVICE", ...result };
    }
  );

  // Side-by-side comparison of two plans.
  fastify.post(
    "/compare",
    // Both sides share one schema; inline it rather than emitting a $ref between them.
    { schema: { body: zodToJsonSchema(compareRequestSchema, { $refStrategy: "none" }) } },
    async (request, reply) => {
      const parsed = parseWithSchema(compareRequestSchema, request.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error });
      }

      return compareLoanPlans(parsed.data.planA, parsed.data.planB, opts.messages);
    }
  );
}
