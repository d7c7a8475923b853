/**
 * Unified LLM client — dispatches to Azure OpenAI (primary) or Ollama (fallback).
 *
 * Priority:
 *   1. Azure OpenAI  (cloud, fast, GPT-4o-mini)
 *   2. Ollama        (local, qwen2.5:3b)
 *   3. Error         (no provider available)
 *
 * Callers never see these errors directly: every strategy that uses a
 * TextGenerator keeps a rule-based fallback.
 */
import { isAzureOpenAIConfigured, chatWithAzureOpenAI } from './azureOpenaiClient.js';
import { isOllamaAvailable, chatWithOllama } from './ollamaClient.js';
import type { ChatMessage, ChatOptions } from './ollamaClient.js';
import { loadEnv } from '../config/env.js';

export type LlmProvider = 'azure-openai' | 'ollama' | 'none';

/** Best-effort text generation collaborator. */
export interface TextGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export async function getAvailableLlmProvider(): Promise<LlmProvider> {
  if (isAzureOpenAIConfigured()) return 'azure-openai';
  if (await isOllamaAvailable()) return 'ollama';
  return 'none';
}

/**
 * Chat with the best available LLM provider.
 * Azure OpenAI is tried first; if not configured or it fails, Ollama is tried.
 */
export async function chatWithLlm(
  messages: ChatMessage[],
  options: ChatOptions,
): Promise<{ content: string; provider: LlmProvider }> {
  if (isAzureOpenAIConfigured()) {
    try {
      const content = await chatWithAzureOpenAI(messages, options);
      return { content, provider: 'azure-openai' };
    } catch (err) {
      if (options.signal?.aborted) throw err;
      console.warn('[LLM] Azure OpenAI failed, trying Ollama fallback:', err instanceof Error ? err.message : err);
    }
  }

  if (loadEnv().ollamaUrl) {
    const content = await chatWithOllama(messages, options);
    return { content, provider: 'ollama' };
  }

  throw new Error('No LLM provider available. Configure AZURE_OPENAI_* or OLLAMA_URL.');
}

export class LlmTextGenerator implements TextGenerator {
  constructor(private readonly timeoutMs: number) {}

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const { content } = await chatWithLlm(
      [{ role: 'user', content: prompt }],
      { timeoutMs: this.timeoutMs, signal },
    );
    return content;
  }
}

/** Returns null when no provider is configured, so callers pick rule-only strategies. */
export function createTextGenerator(): TextGenerator | null {
  const env = loadEnv();
  const configured = isAzureOpenAIConfigured() || Boolean(env.ollamaUrl);
  return configured ? new LlmTextGenerator(env.llmTimeoutMs) : null;
}
