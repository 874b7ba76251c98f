import "dotenv/config";
import { buildApp, shutdownApp } from "./app";
import { loadEnv } from "./config/env";
import { defaultMessages, loadMessageCatalog } from "./engine/messages";

const env = loadEnv();
if (!env.jwtSecret) {
  throw new Error("JWT_SECRET is required");
}

const app = buildApp({
  jwtSecret: env.jwtSecret,
  logger: { level: env.logLevel },
  messages: env.messageCatalogPath ? loadMessageCatalog(env.messageCatalogPath) : defaultMessages,
  recommendationCount: env.recommendationCount
});

const onSignal = (signal: string) => {
  shutdownApp(app, signal)
    .then((code) => process.exit(code))
    .catch((err) => {
      app.log.error(err);
      process.exit(1);
    });
};

process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGTERM", () => onSignal("SIGTERM"));

const start = async () => {
  await app.listen({ port: env.port, host: env.host });
};

start().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
