import OpenAI from "openai";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { LLMError, MissingCredentialsError } from "../core/errors";
import { retryWithBackoff } from "../core/retry";
import type {
  LLMCallOptions,
  LLMClient,
  LLMCompletion,
  MessageContentPart,
  ModelCatalog,
  ModelInfo,
} from "./contracts";

const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.2;

export interface OpenAIClientOptions {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  timeoutMs?: number;
  maxAttempts?: number;
}

export class OpenAIClient implements LLMClient, ModelCatalog {
  private client: OpenAI;
  private defaultModel: string;
  private timeoutMs: number;
  private maxAttempts: number;

  constructor(options: OpenAIClientOptions = {}) {
    const apiKey = options.apiKey ?? env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new MissingCredentialsError("OPENAI_API_KEY");
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseURL ?? env.OPENAI_BASE_URL,
      maxRetries: 0,
    });
    this.defaultModel = options.defaultModel ?? env.VISION_MODEL;
    this.timeoutMs = options.timeoutMs ?? env.LLM_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? env.LLM_MAX_ATTEMPTS;
  }

  async complete(content: MessageContentPart[], options?: LLMCallOptions): Promise<LLMCompletion> {
    const model = options?.model ?? this.defaultModel;
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options?.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: content.map(toContentPart) });

    return retryWithBackoff(
      () =>
        this.makeRequest(
          model,
          messages,
          options?.temperature ?? DEFAULT_TEMPERATURE,
          options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          timeoutMs
        ),
      { attempts: this.maxAttempts, baseDelayMs: 1000, maxDelayMs: 10000 },
      "llm_complete"
    );
  }

  async listModels(): Promise<ModelInfo[]> {
    return this.guard(async () => {
      const models: ModelInfo[] = [];
      for await (const model of this.client.models.list()) {
        models.push(toModelInfo(model));
      }
      return models;
    });
  }

  async retrieveModel(id: string): Promise<ModelInfo> {
    return this.guard(async () => toModelInfo(await this.client.models.retrieve(id)));
  }

  private async makeRequest(
    model: string,
    messages: OpenAI.Chat.ChatCompletionMessageParam[],
    temperature: number,
    maxTokens: number,
    timeoutMs: number
  ): Promise<LLMCompletion> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.client.chat.completions.create(
        { model, messages, temperature, max_tokens: maxTokens },
        { signal: controller.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LLMError("No content in response", "empty_response");
      }

      return {
        content,
        model: response.model,
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      throw mapError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw mapError(error);
    }
  }
}

function toContentPart(part: MessageContentPart): OpenAI.Chat.ChatCompletionContentPart {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  return { type: "image_url", image_url: { url: part.dataUrl } };
}

function toModelInfo(model: OpenAI.Models.Model): ModelInfo {
  return { id: model.id, ownedBy: model.owned_by, created: model.created };
}

function mapError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError || (error instanceof Error && error.name === "AbortError")) {
    return new LLMError("Request timed out", "timeout");
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    logger.error({ status, message: error.message }, "OpenAI API error");
    if (status === 401 || status === 403) {
      return new LLMError(`Authentication failed (${status})`, "auth_failed");
    }
    const retryable = status === 429 || (status !== undefined && status >= 500);
    return new LLMError(`OpenAI API error: ${status ?? "unknown"}`, `api_error_${status ?? "unknown"}`, retryable);
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return new LLMError(`Request failed: ${message}`, "request_failed");
}

export function createOpenAIClient(options?: OpenAIClientOptions): OpenAIClient {
  return new OpenAIClient(options);
}
