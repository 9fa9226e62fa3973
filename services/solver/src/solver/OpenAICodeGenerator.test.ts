import { describe, expect, it, vi } from "vitest";

import { LlmConfigSchema } from "../config/schema.js";
import { silentLogger } from "../test/utils.js";
import { GenerationError } from "./errors.js";
import { type OpenAIClient, OpenAICodeGenerator } from "./OpenAICodeGenerator.js";

type CreateFn = OpenAIClient["chat"]["completions"]["create"];

function createGenerator(create: CreateFn, retryAttempts = 2) {
  const clientFactory = vi.fn(() => ({ chat: { completions: { create } } }));
  const config = LlmConfigSchema.parse({
    baseUrl: "http://llm.test/v1",
    apiKey: "test-key",
    model: "test-model",
    retryAttempts,
  });
  const generator = new OpenAICodeGenerator({ config, logger: silentLogger(), clientFactory });
  return { generator, clientFactory };
}

function reply(content: string | null) {
  return { model: "test-model", choices: [{ message: { content } }] };
}

describe("OpenAICodeGenerator", () => {
  it("asks the model for a program and extracts the fenced block", async () => {
    const create = vi.fn<Parameters<CreateFn>, ReturnType<CreateFn>>().mockResolvedValue(
      reply("Here you go:\n```python\nprint(6 * 7)\n```"),
    );
    const { generator, clientFactory } = createGenerator(create);

    const generated = await generator.generate("What is six times seven?");

    expect(generated).toEqual({ code: "print(6 * 7)", explanation: "Here you go:", model: "test-model" });
    expect(clientFactory).toHaveBeenCalledWith({ apiKey: "test-key", baseURL: "http://llm.test/v1" });
    const [payload, options] = create.mock.calls[0] ?? [];
    expect(payload?.model).toBe("test-model");
    expect(payload?.temperature).toBe(0);
    expect(payload?.messages[1]).toEqual({ role: "user", content: "What is six times seven?" });
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it("reuses the client across calls", async () => {
    const create = vi.fn<Parameters<CreateFn>, ReturnType<CreateFn>>().mockResolvedValue(reply("print(1)"));
    const { generator, clientFactory } = createGenerator(create);

    await generator.generate("one");
    await generator.generate("two");

    expect(clientFactory).toHaveBeenCalledTimes(1);
  });

  it("retries a rate-limited request", async () => {
    const create = vi
      .fn<Parameters<CreateFn>, ReturnType<CreateFn>>()
      .mockRejectedValueOnce({ status: 429, message: "rate limited" })
      .mockResolvedValueOnce(reply("print(2)"));
    const { generator } = createGenerator(create);

    await expect(generator.generate("two")).resolves.toMatchObject({ code: "print(2)" });
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("fails on an empty reply", async () => {
    const create = vi.fn<Parameters<CreateFn>, ReturnType<CreateFn>>().mockResolvedValue(reply("   "));
    const { generator } = createGenerator(create);

    const failure = generator.generate("nothing");
    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toMatchObject({ code: "empty_response" });
  });

  it("fails when the fenced block is empty", async () => {
    const create = vi.fn<Parameters<CreateFn>, ReturnType<CreateFn>>().mockResolvedValue(reply("```python\n```"));
    const { generator } = createGenerator(create);

    await expect(generator.generate("nothing")).rejects.toMatchObject({ code: "empty_program" });
  });

  it("surfaces authentication failures without retrying", async () => {
    const create = vi
      .fn<Parameters<CreateFn>, ReturnType<CreateFn>>()
      .mockRejectedValue({ status: 401, code: "invalid_api_key", message: "bad key" });
    const { generator } = createGenerator(create, 3);

    await expect(generator.generate("x")).rejects.toMatchObject({ status: 401, message: "bad key" });
    expect(create).toHaveBeenCalledTimes(1);
  });
});
