import fp from "fastify-plugin";
import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import fastifyJwt from "@fastify/jwt";

declare module "fastify" {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;
  }
}

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: { sub: string };
    user: { sub: string };
  }
}

export type AuthPluginOptions = {
  secret: string;
};

export default fp<AuthPluginOptions>(async (fastify: FastifyInstance, opts) => {
  if (!opts.secret) {
    throw new Error("JWT_SECRET is required");
  }

  fastify.register(fastifyJwt, { secret: opts.secret });

  // Add a preHandler hook to enforce JWT auth.
  fastify.decorate(
    "authenticate",
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        await request.jwtVerify();
      } catch (err) {
        request.log.debug({ err }, "rejected bearer token");
        return reply.code(401).send({ error: "Unauthorized" });
      }
    }
  );
});
