import Fastify, { FastifyBaseLogger, FastifyServerOptions } from "fastify";
import swagger from "@fastify/swagger";
import { MessageCatalog, defaultMessages } from "./engine/messages";
import { DEFAULT_RECOMMENDATION_COUNT } from "./services/loanPlanningService";
import authPlugin from "./plugins/auth";
import errorHandlerPlugin from "./plugins/errorHandler";
import affordabilityRoutes from "./routes/affordability";
import amortizationRoutes from "./routes/amortization";
import loanPlansRoutes from "./routes/loanPlans";
import loanTypesRoutes from "./routes/loanTypes";

export type AppOptions = {
  jwtSecret: string;
  logger?: FastifyServerOptions["logger"];
  messages?: MessageCatalog;
  recommendationCount?: number;
};

export const buildApp = (options: AppOptions) => {
  const app = Fastify({ logger: options.logger ?? true });
  const routeOptions = {
    messages: options.messages ?? defaultMessages,
    recommendationCount: options.recommendationCount ?? DEFAULT_RECOMMENDATION_COUNT
  };

  app.register(swagger, {
    openapi: {
      info: {
        title: "Loan Planner API",
        version: "0.1.0"
      }
    }
  });

  app.register(errorHandlerPlugin);

  // Health check endpoint.
  app.get("/health", async () => ({ ok: true }));

  // OpenAPI document built from the route schemas.
  app.get("/docs/json", async () => app.swagger());

  app.register(authPlugin, { secret: options.jwtSecret });

  app.register(affordabilityRoutes, { prefix: "/affordability", ...routeOptions });
  app.register(loanPlansRoutes, { prefix: "/loan-plans", ...routeOptions });
  app.register(amortizationRoutes, { prefix: "/amortization", ...routeOptions });
  app.register(loanTypesRoutes, { prefix: "/loan-types", ...routeOptions });

  return app;
};

type ClosableApp = {
  log: FastifyBaseLogger;
  close: () => PromiseLike<unknown>;
};

// Close on a signal and resolve to the process exit code.
export const shutdownApp = async (app: ClosableApp, signal: string): Promise<number> => {
  app.log.info(`received ${signal}, shutting down`);
  try {
    await app.close();
    return 0;
  } catch (err) {
    app.log.error({ err }, "shutdown failed");
    return 1;
  }
};
