import { ListFoundationModelsCommand } from "@aws-sdk/client-bedrock";
import { InvokeModelCommand, InvokeModelWithResponseStreamCommand } from "@aws-sdk/client-bedrock-runtime";
import { describe, expect, it, vi } from "vitest";
import { AiProviderError } from "../ai-errors.js";
import type { AiCompletionRequest, AiStreamEvent } from "../ai-provider.js";
import { BEDROCK_ANTHROPIC_VERSION, buildBedrockBody, createBedrockProvider } from "../ai-providers/bedrock.js";

const HAIKU = "anthropic.claude-3-haiku-20240307-v1:0";
const encoder = new TextEncoder();

function invokeOutput(payload: unknown) {
  return { body: encoder.encode(JSON.stringify(payload)) };
}

function streamOutput(payloads: unknown[]) {
  async function* events() {
    for (const payload of payloads) {
      yield { chunk: { bytes: encoder.encode(JSON.stringify(payload)) } };
    }
  }
  return { body: events() };
}

function textDelta(text: string) {
  return { type: "content_block_delta", index: 0, delta: { type: "text_delta", text } };
}

function request(overrides: Partial<AiCompletionRequest> = {}): AiCompletionRequest {
  return {
    messages: [
      { role: "system", content: "Be brief." },
      { role: "user", content: "Say hello" },
    ],
    model: HAIKU,
    temperature: 0.5,
    maxTokens: 100,
    ...overrides,
  };
}

async function collect(stream: AsyncIterable<AiStreamEvent>): Promise<AiStreamEvent[]> {
  const events: AiStreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe("buildBedrockBody", () => {
  it("hoists the system message out of the message list", () => {
    expect(buildBedrockBody(request())).toEqual({
      anthropic_version: BEDROCK_ANTHROPIC_VERSION,
      max_tokens: 100,
      temperature: 0.5,
      system: "Be brief.",
      messages: [{ role: "user", content: "Say hello" }],
    });
  });

  it("keeps the last system message when there are several", () => {
    const body = buildBedrockBody(
      request({
        messages: [
          { role: "system", content: "first" },
          { role: "user", content: "hi" },
          { role: "system", content: "second" },
          { role: "assistant", content: "hello" },
        ],
      }),
    );
    expect(body.system).toBe("second");
    expect(body.messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ]);
  });

  it("omits the system field when there is no system text", () => {
    const body = buildBedrockBody(request({ messages: [{ role: "user", content: "hi" }] }));
    expect("system" in body).toBe(false);

    const empty = buildBedrockBody(
      request({
        messages: [
          { role: "system", content: "" },
          { role: "user", content: "hi" },
        ],
      }),
    );
    expect("system" in empty).toBe(false);
  });
});

describe("Bedrock provider complete", () => {
  it("invokes the model with a JSON envelope and parses usage", async () => {
    const send = vi.fn().mockResolvedValueOnce(
      invokeOutput({
        content: [{ type: "text", text: "Hello!" }],
        usage: { input_tokens: 9, output_tokens: 3 },
      }),
    );
    const provider = createBedrockProvider({ runtimeClient: { send } });

    const result = await provider.complete(request());

    expect(result).toEqual({
      content: "Hello!",
      promptTokens: 9,
      completionTokens: 3,
      totalTokens: 12,
      resolvedModel: HAIKU,
    });

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(InvokeModelCommand);
    expect(command.input.modelId).toBe(HAIKU);
    expect(command.input.contentType).toBe("application/json");
    expect(JSON.parse(command.input.body)).toEqual(buildBedrockBody(request()));
  });

  it("resolves configured aliases to model ids", async () => {
    const send = vi.fn().mockResolvedValueOnce(invokeOutput({ content: [{ type: "text", text: "ok" }] }));
    const provider = createBedrockProvider({
      runtimeClient: { send },
      modelAliases: { "claude-3-haiku": HAIKU },
    });

    const result = await provider.complete(request({ model: "claude-3-haiku" }));

    expect(send.mock.calls[0]?.[0].input.modelId).toBe(HAIKU);
    expect(result.resolvedModel).toBe(HAIKU);
    expect(result.totalTokens).toBe(0);
  });

  it("passes unknown model names through unchanged", async () => {
    const send = vi.fn().mockResolvedValueOnce(invokeOutput({ content: [] }));
    const provider = createBedrockProvider({ runtimeClient: { send }, modelAliases: { "claude-3-haiku": HAIKU } });

    const result = await provider.complete(request({ model: "anthropic.custom-model" }));

    expect(result.resolvedModel).toBe("anthropic.custom-model");
    expect(result.content).toBe("");
  });

  it("maps throttling to a retryable rate_limit error", async () => {
    const throttled = Object.assign(new Error("Too many requests"), {
      name: "ThrottlingException",
      $metadata: { httpStatusCode: 429 },
    });
    const provider = createBedrockProvider({ runtimeClient: { send: vi.fn().mockRejectedValueOnce(throttled) } });

    const failure = await provider.complete(request()).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(AiProviderError);
    if (failure instanceof AiProviderError) {
      expect(failure.kind).toBe("rate_limit");
      expect(failure.retryable).toBe(true);
    }
  });

  it("rejects a body that is not JSON as bad_response", async () => {
    const send = vi.fn().mockResolvedValueOnce({ body: encoder.encode("<html>") });
    const provider = createBedrockProvider({ runtimeClient: { send } });

    const failure = await provider.complete(request()).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(AiProviderError);
    if (failure instanceof AiProviderError) {
      expect(failure.kind).toBe("bad_response");
    }
  });
});

describe("Bedrock provider completeStreaming", () => {
  it("yields only text deltas from content_block_delta events", async () => {
    const send = vi.fn().mockResolvedValueOnce(
      streamOutput([
        { type: "message_start", message: { id: "msg_1" } },
        { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
        textDelta("Hello"),
        { type: "content_block_delta", index: 0, delta: { type: "input_json_delta", partial_json: "{}" } },
        textDelta(" there"),
        { type: "message_stop" },
      ]),
    );
    const provider = createBedrockProvider({ runtimeClient: { send } });

    const events = await collect(provider.completeStreaming(request()));

    expect(events).toEqual([
      { type: "chunk", content: "Hello" },
      { type: "chunk", content: " there" },
      { type: "done" },
    ]);
    expect(send.mock.calls[0]?.[0]).toBeInstanceOf(InvokeModelWithResponseStreamCommand);
  });

  it("streams the same text a non-streaming call returns", async () => {
    const send = vi
      .fn()
      .mockResolvedValueOnce(invokeOutput({ content: [{ type: "text", text: "Hello there" }] }))
      .mockResolvedValueOnce(streamOutput([textDelta("Hel"), textDelta("lo "), textDelta("there")]));
    const provider = createBedrockProvider({ runtimeClient: { send } });

    const complete = await provider.complete(request());
    const events = await collect(provider.completeStreaming(request()));
    const streamed = events.map((e) => (e.type === "chunk" ? e.content : "")).join("");

    expect(streamed).toBe(complete.content);
  });

  it("ends with an error event when the call fails", async () => {
    const denied = Object.assign(new Error("not authorized"), {
      name: "AccessDeniedException",
      $metadata: { httpStatusCode: 403 },
    });
    const provider = createBedrockProvider({ runtimeClient: { send: vi.fn().mockRejectedValueOnce(denied) } });

    const events = await collect(provider.completeStreaming(request()));

    expect(events).toHaveLength(1);
    const [event] = events;
    if (event?.type !== "error") {
      throw new Error(`expected an error event, got ${event?.type}`);
    }
    expect(event.error.kind).toBe("auth");
    expect(event.error.message).toBe("not authorized");
  });
});

describe("Bedrock provider metadata", () => {
  it("lists configured alias names as models", async () => {
    const provider = createBedrockProvider({
      runtimeClient: { send: vi.fn() },
      modelAliases: { "claude-3-haiku": HAIKU, "claude-3-opus": "anthropic.claude-3-opus-20240229-v1:0" },
      defaultModel: "claude-3-haiku",
    });

    expect(await provider.listModels()).toEqual(["claude-3-haiku", "claude-3-opus"]);
    expect(provider.defaultModel()).toBe("claude-3-haiku");
  });

  it("reports configured only when credentials were found", () => {
    expect(createBedrockProvider({ runtimeClient: { send: vi.fn() } }).isConfigured()).toBe(false);
    expect(
      createBedrockProvider({ runtimeClient: { send: vi.fn() }, credentialsConfigured: true }).isConfigured(),
    ).toBe(true);
  });

  it("checks health by listing foundation models", async () => {
    const controlSend = vi.fn().mockResolvedValueOnce({ modelSummaries: [] });
    const provider = createBedrockProvider({ runtimeClient: { send: vi.fn() }, controlClient: { send: controlSend } });

    expect(await provider.healthCheck()).toEqual({ status: "healthy" });
    expect(controlSend.mock.calls[0]?.[0]).toBeInstanceOf(ListFoundationModelsCommand);
  });

  it("reports unhealthy with the failure message", async () => {
    const controlSend = vi.fn().mockRejectedValueOnce(new Error("Could not load credentials from any providers"));
    const provider = createBedrockProvider({ runtimeClient: { send: vi.fn() }, controlClient: { send: controlSend } });

    expect(await provider.healthCheck()).toEqual({
      status: "unhealthy",
      error: "Could not load credentials from any providers",
    });
  });
});
