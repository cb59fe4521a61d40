import { createAiRegistry } from "@llm-relay/contracts";
import fp from "fastify-plugin";
import { type ResponderEnv, registryConfigFromEnv } from "../config/env";
import { createCompletionOrchestrator } from "../services/completion-orchestrator";

export const orchestratorPlugin = fp(async (app, opts: { env: ResponderEnv }) => {
  const registry = createAiRegistry(registryConfigFromEnv(opts.env));

  app.decorate(
    "orchestrator",
    createCompletionOrchestrator({
      registry,
      defaults: { temperature: opts.env.AI_TEMPERATURE, maxTokens: opts.env.AI_MAX_TOKENS },
      log: app.log
    })
  );

  app.log.info({ provider: registry.name, configured: registry.isConfigured() }, "AI provider selected");
});
