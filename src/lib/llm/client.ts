/**
 * OpenAI Client
 *
 * Wrapper for the OpenAI chat-completions API used by every judgment step.
 */

import OpenAI from "openai";

/**
 * Default model configuration
 */
export const DEFAULT_MODEL = "gpt-4o-mini";
export const MAX_TOKENS = 1024;

export type ClientOptions = {
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
};

/**
 * Create OpenAI client instance
 */
export function createClient(options: ClientOptions = {}): OpenAI {
  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;

  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is not set");
  }

  return new OpenAI({
    apiKey,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries,
  });
}

/**
 * Singleton client instance
 */
let clientInstance: OpenAI | null = null;

export function getClient(): OpenAI {
  if (!clientInstance) {
    clientInstance = createClient();
  }
  return clientInstance;
}

/**
 * Check if LLM is configured
 */
export function isLLMConfigured(): boolean {
  return !!process.env.OPENAI_API_KEY;
}

/**
 * Generation options
 */
export type GenerateOptions = {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  /** Ask the model for a single JSON object */
  json?: boolean;
  /** Client to use instead of the env-configured singleton */
  client?: OpenAI;
};

/**
 * Generation result
 */
export type GenerateResult = {
  content: string;
  /** "length" when the reply was cut off at maxTokens */
  stopReason: string;
};

/**
 * Generate a completion with OpenAI
 */
export async function generate(
  prompt: string,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const {
    model = DEFAULT_MODEL,
    maxTokens = MAX_TOKENS,
    temperature = 0.7,
    systemPrompt,
    json = false,
    client = getClient(),
  } = options;

  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

  if (systemPrompt) {
    messages.push({ role: "system", content: systemPrompt });
  }
  messages.push({ role: "user", content: prompt });

  const response = await client.chat.completions.create({
    model,
    max_tokens: maxTokens,
    temperature,
    messages,
    response_format: json ? { type: "json_object" } : undefined,
  });

  const content = response.choices[0]?.message?.content ?? "";

  return {
    content,
    stopReason: response.choices[0]?.finish_reason ?? "unknown",
  };
}
