import { buildApp } from "./app";
import { loadEnv } from "./config/env";

async function start() {
  const env = loadEnv();
  const app = await buildApp(env);

  await app.listen({
    port: env.RESPONDER_PORT,
    host: env.RESPONDER_HOST
  });
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
