// LLM client using Vercel AI SDK with multi-provider support
import { anthropic } from '@ai-sdk/anthropic';
import { openai } from '@ai-sdk/openai';
import { google } from '@ai-sdk/google';
import { generateText, type LanguageModel } from 'ai';

// Provider registry
const PROVIDERS = {
  anthropic,
  openai,
  google,
} as const;

type ProviderName = keyof typeof PROVIDERS;

function isProviderName(value: string): value is ProviderName {
  return value in PROVIDERS;
}

/**
 * Parse model string into provider and model name
 * Format: "provider/model-name" (e.g., "google/gemini-1.5-flash")
 */
export function parseModelString(modelStr: string): {
  provider: ProviderName;
  model: string;
} {
  const parts = modelStr.split('/');
  if (parts.length !== 2 || !parts[1]) {
    throw new Error(
      `Invalid model format: ${modelStr}. Expected "provider/model-name"`
    );
  }

  const [providerStr, modelName] = parts;

  if (!isProviderName(providerStr)) {
    throw new Error(
      `Unknown provider: ${providerStr}. Supported: ${Object.keys(PROVIDERS).join(', ')}`
    );
  }

  return { provider: providerStr, model: modelName };
}

/**
 * Get language model instance from model string
 */
export function getModel(modelStr: string): LanguageModel {
  const { provider, model } = parseModelString(modelStr);
  const providerInstance = PROVIDERS[provider];
  return providerInstance(model);
}

export interface TextCompletionParams {
  model: string;
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  abortSignal?: AbortSignal;
}

export interface TextCompletion {
  text: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Generate text completion
 */
export async function generateTextCompletion(params: TextCompletionParams): Promise<TextCompletion> {
  const modelInstance = getModel(params.model);

  const result = await generateText({
    model: modelInstance,
    system: params.system,
    prompt: params.prompt,
    temperature: params.temperature ?? 0.3,
    maxTokens: params.maxTokens,
    // The caller owns retries; the summarizer falls back locally instead
    maxRetries: 0,
    abortSignal: params.abortSignal,
  });

  return {
    text: result.text,
    usage: {
      promptTokens: result.usage.promptTokens,
      completionTokens: result.usage.completionTokens,
      totalTokens: result.usage.totalTokens,
    },
  };
}
