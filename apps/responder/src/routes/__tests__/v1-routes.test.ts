import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import { buildApp } from "../../app";
import { loadEnv } from "../../config/env";
import { FAILURE_STATUS, sseFrame } from "../v1";

let app: FastifyInstance | undefined;

async function appWith(vars: NodeJS.ProcessEnv): Promise<FastifyInstance> {
  app = await buildApp(loadEnv({ NODE_ENV: "test", ...vars }));
  return app;
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("v1 routes with the mock provider", () => {
  it("POST /process answers with a success payload", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });

    const res = await server.inject({
      method: "POST",
      url: "/process",
      payload: { message: "What is 2+2?", model: "mock-model", temperature: 0.7, maxTokens: 50 }
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("success");
    expect(body.aiResponse).toBe(
      "[MOCK RESPONSE #1] You said: 'What is 2+2?'. This is a test response without calling any external API."
    );
    expect(body.usage).toEqual({ promptTokens: 6, completionTokens: 36, totalTokens: 42, estimatedCost: 0 });
    expect(body.provider).toBe("mock");
  });

  it("POST /process rejects an invalid body with 400", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });

    const res = await server.inject({ method: "POST", url: "/process", payload: { message: "", maxTokens: 9000 } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("validation failed");
    expect(body.issues.map((issue: { path: string[] }) => issue.path[0]).sort()).toEqual(["maxTokens", "message"]);
  });

  it("POST /stream rejects an invalid body with the validation payload", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });

    const res = await server.inject({ method: "POST", url: "/stream", payload: { temperature: 3 } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("validation failed");
    expect(body.route).toBe("/stream");
    expect(body.issues.map((issue: { path: string[] }) => issue.path[0]).sort()).toEqual(["message", "temperature"]);
  });

  it("POST /stream sends content frames and the done marker", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });

    const res = await server.inject({ method: "POST", url: "/stream", payload: { message: "hi there" } });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/event-stream");
    const frames = res.body.split("\n\n").filter((frame) => frame.length > 0);
    expect(frames[0]).toBe('data: {"content":"[MOCK "}');
    expect(frames.at(-1)).toBe("data: [DONE]");
    expect(frames).toHaveLength(14);
  });

  it("GET /models lists the mock model", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });
    const res = await server.inject({ method: "GET", url: "/models" });
    expect(res.json()).toEqual({ provider: "mock", models: ["mock-model"], default: "mock-model" });
  });

  it("GET /health counts processed messages", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });
    await server.inject({ method: "POST", url: "/process", payload: { message: "one" } });

    const res = await server.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("healthy");
    expect(body.messagesProcessed).toBe(1);
    expect(body.ai.configured).toBe(true);
  });

  it("GET /stats returns the usage snapshot", async () => {
    const server = await appWith({ AI_PROVIDER: "mock" });
    await server.inject({ method: "POST", url: "/process", payload: { message: "hi there" } });

    const res = await server.inject({ method: "GET", url: "/stats" });
    const body = res.json();

    expect(body.totalRequests).toBe(1);
    expect(body.totalTokens).toBe(38);
    expect(body.perModel).toEqual({ "mock-model": { requests: 1, tokens: 38, cost: 0 } });
  });
});

describe("v1 routes without OpenAI credentials", () => {
  it("POST /process maps the configuration error to 500", async () => {
    const server = await appWith({ AI_PROVIDER: "openai" });

    const res = await server.inject({ method: "POST", url: "/process", payload: { message: "hi" } });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      status: "error",
      error: "configuration",
      message: "OPENAI_API_KEY environment variable is not set",
      retryable: false
    });
  });

  it("GET /config still answers", async () => {
    const server = await appWith({ AI_PROVIDER: "openai", AI_TEMPERATURE: "0.2", AI_MAX_TOKENS: "300" });
    const res = await server.inject({ method: "GET", url: "/config" });
    expect(res.json()).toEqual({ provider: "openai", defaultModel: "gpt-4", temperature: 0.2, maxTokens: 300 });
  });

  it("GET /health reports degraded", async () => {
    const server = await appWith({});
    const res = await server.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("degraded");
    expect(body.provider).toBe("openai");
    expect(body.ai).toEqual({
      configured: false,
      status: "unhealthy",
      error: "OPENAI_API_KEY environment variable is not set"
    });
  });

  it("POST /stream emits a single error frame", async () => {
    const server = await appWith({});
    const res = await server.inject({ method: "POST", url: "/stream", payload: { message: "hi" } });
    expect(res.body).toBe('data: {"error":"OPENAI_API_KEY environment variable is not set"}\n\n');
  });
});

describe("FAILURE_STATUS", () => {
  it.each([
    ["configuration", 500],
    ["auth", 401],
    ["rate_limit", 429],
    ["timeout", 504],
    ["connectivity", 502],
    ["server", 502],
    ["bad_response", 502]
  ] as const)("maps %s to %i", (kind, status) => {
    expect(FAILURE_STATUS[kind]).toBe(status);
  });
});

describe("sseFrame", () => {
  it("serializes frames and passes the done marker through", () => {
    expect(sseFrame({ content: 'say "hi"' })).toBe('data: {"content":"say \\"hi\\""}\n\n');
    expect(sseFrame("[DONE]")).toBe("data: [DONE]\n\n");
  });
});
