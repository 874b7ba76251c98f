import fp from "fastify-plugin";
import { FastifyError, FastifyInstance } from "fastify";
import { ValidationError } from "../engine/errors";

// Map engine validation failures to 400 and keep unexpected failures out of responses.
export default fp(async (fastify: FastifyInstance) => {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ValidationError) {
      return reply
        .code(400)
        .send({ error: "Validation failed", field: error.field, details: error.message });
    }

    if (error.validation) {
      return reply.code(400).send({ error: "Invalid body", details: error.message });
    }

    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }

    request.log.error({ err: error }, "request failed");
    return reply.code(500).send({ error: "Internal Server Error" });
  });
});
