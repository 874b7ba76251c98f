import { FastifyInstance } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { analyzeAffordability } from "../engine/affordability";
import { affordabilityRequestSchema } from "../schemas/loanPlanning";
import { parseWithSchema } from "../utils/validation";
import { EngineRouteOptions } from "./types";

export default async function affordabilityRoutes(
  fastify: FastifyInstance,
  opts: EngineRouteOptions
) {
  fastify.addHook("preHandler", fastify.authenticate);

  // Classify the profile into safe/warning/danger with recommendations.
  fastify.post(
    "/",
    { schema: { body: zodToJsonSchema(affordabilityRequestSchema) } },
    async (request, reply) => {
      const parsed = parseWithSchema(affordabilityRequestSchema, request.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error });
      }

      const analysis = analyzeAffordability(parsed.data.profile, { messages: opts.messages });
      request.log.info(
        { userId: request.user.sub, status: analysis.status },
        "affordability analyzed"
      );
      return analysis;
    }
  );
}
