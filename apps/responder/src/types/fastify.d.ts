import type { CompletionOrchestrator } from "../services/completion-orchestrator";

declare module "fastify" {
  interface FastifyInstance {
    orchestrator: CompletionOrchestrator;
  }
}
