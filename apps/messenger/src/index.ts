import pino from "pino";
import { loadEnv } from "./config/env";
import { createRequestDispatcher } from "./services/request-dispatcher";

async function main() {
  const env = loadEnv();
  const log = pino({ name: "messenger", level: env.LOG_LEVEL });
  const dispatcher = createRequestDispatcher({
    responderUrl: env.RESPONDER_URL,
    timeoutMs: env.TIMEOUT_SECONDS * 1000,
    retryAttempts: env.RETRY_ATTEMPTS,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
    log
  });

  const health = await dispatcher.checkHealth();
  if (!health.ok) {
    log.error({ kind: health.error }, `responder unreachable at ${env.RESPONDER_URL}: ${health.message}`);
    process.exitCode = 1;
    return;
  }
  log.info({ provider: health.data.provider, status: health.data.status }, "responder is up");

  const [, , ...words] = process.argv;
  const message = words.join(" ") || "Hello from the messenger";
  const result = await dispatcher.send({ message });
  if (!result.ok) {
    process.exitCode = 1;
    return;
  }

  log.info(
    { model: result.response.model, usage: result.response.usage, attempts: result.attempts },
    result.response.aiResponse
  );
  log.info({ usage: dispatcher.usage() }, "session usage");
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
