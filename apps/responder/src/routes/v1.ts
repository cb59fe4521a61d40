import { Readable } from "node:stream";
import {
  type AiErrorKind,
  apiRoutes,
  type ProcessFailure,
  processRequestSchema,
  STREAM_DONE_MARKER,
  type StreamFrame
} from "@llm-relay/contracts";
import type { FastifyPluginAsync } from "fastify";
import type { CompletionFailure } from "../services/completion-orchestrator";

export const FAILURE_STATUS: Record<AiErrorKind, number> = {
  configuration: 500,
  auth: 401,
  rate_limit: 429,
  timeout: 504,
  connectivity: 502,
  server: 502,
  bad_response: 502
};

function failureBody(result: CompletionFailure): ProcessFailure {
  return { status: "error", error: result.error, message: result.message, retryable: result.retryable };
}

export function sseFrame(frame: StreamFrame | typeof STREAM_DONE_MARKER): string {
  const data = frame === STREAM_DONE_MARKER ? frame : JSON.stringify(frame);
  return `data: ${data}\n\n`;
}

export const v1Routes: FastifyPluginAsync = async (app) => {
  const orchestrator = app.orchestrator;

  app.post(apiRoutes.process, async (request, reply) => {
    const payload = processRequestSchema.parse(request.body);
    const result = await orchestrator.handle(payload);
    if (!result.ok) {
      return reply.code(FAILURE_STATUS[result.error]).send(failureBody(result));
    }
    return result.response;
  });

  app.post(apiRoutes.stream, async (request, reply) => {
    const payload = processRequestSchema.parse(request.body);

    async function* frames() {
      for await (const frame of orchestrator.stream(payload)) {
        yield sseFrame(frame);
      }
    }

    return reply
      .header("cache-control", "no-cache")
      .type("text/event-stream")
      .send(Readable.from(frames()));
  });

  app.get(apiRoutes.models, async (_request, reply) => {
    const result = await orchestrator.listModels();
    if (!result.ok) {
      return reply.code(FAILURE_STATUS[result.error]).send(failureBody(result));
    }
    return result.listing;
  });

  app.get(apiRoutes.health, async () => orchestrator.health());

  app.get(apiRoutes.config, async () => orchestrator.config());

  app.get(apiRoutes.stats, async () => orchestrator.stats());
};
