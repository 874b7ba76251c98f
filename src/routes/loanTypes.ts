import { FastifyInstance } from "fastify";
import { LOAN_CATEGORIES, describeLoanCategory, parseLoanCategory } from "../engine/loanCatalog";
import { listGlossary } from "../engine/messages";
import { EngineRouteOptions } from "./types";

export default async function loanTypesRoutes(
  fastify: FastifyInstance,
  opts: EngineRouteOptions
) {
  fastify.addHook("preHandler", fastify.authenticate);

  // Static rate/term tables per loan category, with explanations.
  fastify.get("/", async () =>
    LOAN_CATEGORIES.map((category) => describeLoanCategory(category, opts.messages))
  );

  // Common loan terms in display order.
  fastify.get("/glossary", async () => listGlossary(opts.messages));

  // One category; unrecognized tags describe the generic loan.
  fastify.get<{ Params: { category: string } }>("/:category", async (request) =>
    describeLoanCategory(parseLoanCategory(request.params.category), opts.messages)
  );
}
