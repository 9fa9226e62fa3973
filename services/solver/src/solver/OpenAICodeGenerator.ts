import type { LlmConfig } from "../config/schema.js";
import type { AppLogger } from "../observability/logger.js";
import type { CodeGenerator, GeneratedCode } from "./CodeGenerator.js";
import { extractProgram } from "./CodeGenerator.js";
import { GenerationError } from "./errors.js";
import { callWithRetry, toGenerationError, withGenerationTimeout } from "./resilience.js";

type ChatMessage = { role: "system" | "user"; content: string };

interface OpenAIChatResponse {
  model?: string;
  choices: Array<{ message?: { content?: string | null } | null } | null>;
}

export interface OpenAIClient {
  chat: {
    completions: {
      create(
        payload: { model: string; messages: ChatMessage[]; temperature?: number },
        options?: { signal?: AbortSignal },
      ): Promise<OpenAIChatResponse>;
    };
  };
}

type OpenAIConnection = { apiKey: string; baseURL: string };

export type OpenAICodeGeneratorOptions = {
  config: LlmConfig;
  logger: AppLogger;
  clientFactory?: (connection: OpenAIConnection) => Promise<OpenAIClient> | OpenAIClient;
};

const SYSTEM_PROMPT = [
  "You translate math problems into Python 3 programs.",
  "Reply with one complete program in a single ```python fenced block.",
  "The program must print the final answer on its last line of output.",
  "Only use the standard library and sympy.",
].join(" ");

async function defaultClientFactory({ apiKey, baseURL }: OpenAIConnection): Promise<OpenAIClient> {
  const { default: OpenAI } = await import("openai");
  return new OpenAI({ apiKey, baseURL });
}

/** Code generation against any OpenAI-compatible chat completions endpoint. */
export class OpenAICodeGenerator implements CodeGenerator {
  private readonly logger: AppLogger;
  private clientPromise?: Promise<OpenAIClient>;

  constructor(private readonly options: OpenAICodeGeneratorOptions) {
    this.logger = options.logger.child({ component: "OpenAICodeGenerator" });
  }

  async generate(problem: string): Promise<GeneratedCode> {
    const client = await this.getClient();
    const { model, temperature, timeoutMs, retryAttempts } = this.options.config;
    const payload = {
      model,
      temperature,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: problem },
      ] satisfies ChatMessage[],
    };

    const response = await callWithRetry(
      async (attempt) => {
        if (attempt > 0) {
          this.logger.info({ attempt, model }, "retrying code generation");
        }
        try {
          return await withGenerationTimeout(({ signal }) => client.chat.completions.create(payload, { signal }), {
            timeoutMs,
            action: "chat.completions.create",
          });
        } catch (error) {
          throw toGenerationError(error, "code generation request failed");
        }
      },
      { attempts: retryAttempts },
    );

    const reply = response.choices[0]?.message?.content?.trim();
    if (!reply) {
      throw new GenerationError("model returned an empty response", { code: "empty_response" });
    }
    const { code, explanation } = extractProgram(reply);
    if (code.length === 0) {
      throw new GenerationError("model reply contained no program", { code: "empty_program" });
    }
    return { code, explanation, model: response.model ?? model };
  }

  private getClient(): Promise<OpenAIClient> {
    if (!this.clientPromise) {
      const factory = this.options.clientFactory ?? defaultClientFactory;
      const { apiKey, baseUrl } = this.options.config;
      this.clientPromise = Promise.resolve()
        .then(() => factory({ apiKey, baseURL: baseUrl }))
        .catch((error: unknown) => {
          this.clientPromise = undefined;
          throw toGenerationError(error, "failed to create the model client");
        });
    }
    return this.clientPromise;
  }
}
