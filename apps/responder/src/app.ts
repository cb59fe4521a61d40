import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import sensible from "@fastify/sensible";
import Fastify, { type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import type { ResponderEnv } from "./config/env";
import { orchestratorPlugin } from "./plugins/orchestrator";
import { v1Routes } from "./routes/v1";

export async function buildApp(env: ResponderEnv): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: env.NODE_ENV === "development" ? "info" : "warn"
    },
    trustProxy: true
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: env.RESPONDER_CORS_ORIGIN === "*" ? true : env.RESPONDER_CORS_ORIGIN.split(",")
  });
  await app.register(rateLimit, {
    max: 100,
    timeWindow: "1 minute"
  });

  // Set before the routes register so their encapsulated context inherits it.
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: "validation failed",
        issues: error.issues,
        route: request.routeOptions.url
      });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }

    request.log.error({ err: error }, "unhandled error");
    return reply.internalServerError("internal error");
  });

  await app.register(orchestratorPlugin, { env });
  await app.register(v1Routes);

  return app;
}
