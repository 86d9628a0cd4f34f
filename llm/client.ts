import { logger } from "../config/logger.js";
import type { GenerationRequest, TextGenerator } from "./types.js";

type LLMProvider = "claude" | "openai";

export interface LLMRequest {
  readonly system: string;
  readonly userMessage: string;
  readonly maxOutputTokens?: number;
  readonly model?: string;
  readonly signal?: AbortSignal;
}

export interface LLMUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
}

export interface LLMResponse {
  readonly text: string;
  readonly usage: LLMUsage;
}

export interface LLMClientConfig {
  readonly provider: LLMProvider;
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

const DEFAULT_SYSTEM_PROMPT = "You are an expert educational content assistant.";
const DEFAULT_MAX_OUTPUT_TOKENS = 2048;

export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const provider = env.LLM_PROVIDER ?? "openai";
  const providerKey = provider === "claude" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  return env.LLM_API_KEY || providerKey || undefined;
}

export function createLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMClientConfig {
  const provider = env.LLM_PROVIDER ?? "openai";
  if (provider !== "claude" && provider !== "openai") {
    throw new Error(`LLM_PROVIDER must be "claude" or "openai", got: "${provider}"`);
  }

  const apiKey = resolveApiKey(env);
  if (!apiKey) {
    throw new Error("LLM_API_KEY (or OPENAI_API_KEY / ANTHROPIC_API_KEY) is required");
  }

  const timeoutMs = Number(env.LLM_TIMEOUT_MS ?? "60000");

  return {
    provider,
    apiKey,
    model: env.LLM_MODEL ?? (provider === "claude" ? "claude-sonnet-4-20250514" : "gpt-4o-mini"),
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : 60_000,
    // Judges and the improver retry on their own; raise this only for direct callLLM use.
    maxRetries: 1,
  };
}

export async function callLLM(config: LLMClientConfig, request: LLMRequest): Promise<LLMResponse> {
  let lastError: Error | undefined;
  const model = request.model ?? config.model;

  for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
    try {
      logger.debug({ attempt, provider: config.provider, model }, "Calling LLM");

      const result =
        config.provider === "claude"
          ? await callClaude(config, model, request)
          : await callOpenAI(config, model, request);

      logger.debug(
        {
          chars: result.text.length,
          inputTokens: result.usage.inputTokens,
          outputTokens: result.usage.outputTokens,
        },
        "LLM response received",
      );
      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn({ attempt, model, error: lastError.message }, "LLM call failed");
      if (request.signal?.aborted) break;
    }
  }

  throw new Error(`LLM failed after ${config.maxRetries} attempts: ${lastError?.message}`);
}

/**
 * Adapts the HTTP client to {@link TextGenerator}. One attempt per call:
 * judges and the improver own their retry policy.
 */
export function createLLMGenerator(config: LLMClientConfig): TextGenerator {
  const singleAttempt: LLMClientConfig = { ...config, maxRetries: 1 };

  return {
    async generate(request: GenerationRequest): Promise<string> {
      const response = await callLLM(singleAttempt, {
        system: request.system ?? DEFAULT_SYSTEM_PROMPT,
        userMessage: request.prompt,
        model: request.model,
        signal: request.signal,
      });
      return response.text;
    },
  };
}

function resolveSignal(config: LLMClientConfig, request: LLMRequest): AbortSignal {
  return request.signal ?? AbortSignal.timeout(config.timeoutMs);
}

interface ClaudeResponse {
  readonly content: ReadonlyArray<{ readonly text: string }>;
  readonly usage: {
    readonly input_tokens: number;
    readonly output_tokens: number;
  };
}

async function callClaude(
  config: LLMClientConfig,
  model: string,
  request: LLMRequest,
): Promise<LLMResponse> {
  const maxTokens = request.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;

  const response = await fetch("https://api.anthropic.com/v1/messages", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-api-key": config.apiKey,
      "anthropic-version": "2023-06-01",
    },
    body: JSON.stringify({
      model,
      max_tokens: maxTokens,
      system: request.system,
      messages: [{ role: "user", content: request.userMessage }],
    }),
    signal: resolveSignal(config, request),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`Claude API ${response.status}: ${body}`);
  }

  const data = (await response.json()) as ClaudeResponse;
  const text = data.content[0]?.text;
  if (!text) {
    throw new Error("Claude returned empty content");
  }

  return {
    text,
    usage: {
      inputTokens: data.usage.input_tokens,
      outputTokens: data.usage.output_tokens,
      totalTokens: data.usage.input_tokens + data.usage.output_tokens,
    },
  };
}

interface OpenAIMessage {
  readonly role: string;
  readonly content: string | null;
  readonly refusal?: string | null;
}

interface OpenAIResponse {
  readonly choices: ReadonlyArray<{
    readonly message: OpenAIMessage;
    readonly finish_reason: string;
  }>;
  readonly usage: {
    readonly prompt_tokens: number;
    readonly completion_tokens: number;
    readonly total_tokens: number;
  };
}

function usesReasoningParameters(model: string): boolean {
  return model.startsWith("o1") || model.startsWith("o3") || model.startsWith("o4") || model.startsWith("gpt-5");
}

function buildTokenLimit(model: string, maxTokens: number): Record<string, number> {
  if (usesReasoningParameters(model)) {
    return { max_completion_tokens: maxTokens };
  }
  return { max_tokens: maxTokens };
}

async function callOpenAI(
  config: LLMClientConfig,
  model: string,
  request: LLMRequest,
): Promise<LLMResponse> {
  const maxTokens = request.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  const systemRole = usesReasoningParameters(model) ? "developer" : "system";

  const response = await fetch("https://api.openai.com/v1/chat/completions", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${config.apiKey}`,
    },
    body: JSON.stringify({
      model,
      ...buildTokenLimit(model, maxTokens),
      messages: [
        { role: systemRole, content: request.system },
        { role: "user", content: request.userMessage },
      ],
    }),
    signal: resolveSignal(config, request),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`OpenAI API ${response.status}: ${body}`);
  }

  const data = (await response.json()) as OpenAIResponse;
  const choice = data.choices[0];

  if (!choice) {
    throw new Error("OpenAI returned no choices");
  }

  if (choice.message.refusal) {
    throw new Error(`OpenAI refused: ${choice.message.refusal}`);
  }

  const text = choice.message.content;
  if (!text) {
    logger.warn({ finishReason: choice.finish_reason, model }, "OpenAI returned null content");
    throw new Error(`OpenAI returned empty content (finish_reason: ${choice.finish_reason})`);
  }

  return {
    text,
    usage: {
      inputTokens: data.usage.prompt_tokens,
      outputTokens: data.usage.completion_tokens,
      totalTokens: data.usage.total_tokens,
    },
  };
}
