/**
 * Azure OpenAI client — primary text generator.
 * Uses the OpenAI-compatible REST API exposed by Azure OpenAI Service.
 *
 * Required env vars:
 *   AZURE_OPENAI_ENDPOINT   – e.g. https://my-resource.openai.azure.com
 *   AZURE_OPENAI_API_KEY    – the key from Azure portal
 *   AZURE_OPENAI_DEPLOYMENT – deployment name (e.g. "gpt-4o-mini")
 *   AZURE_OPENAI_API_VERSION – optional, defaults to 2024-10-21
 */
import axios from 'axios';
import { loadEnv } from '../config/env.js';
import type { ChatMessage, ChatOptions } from './ollamaClient.js';

export function isAzureOpenAIConfigured(): boolean {
  const env = loadEnv();
  return Boolean(env.azureOpenaiEndpoint && env.azureOpenaiApiKey && env.azureOpenaiDeployment);
}

interface AzureOpenAIChatResponse {
  choices: Array<{
    message: {
      role: 'assistant';
      content: string | null;
    };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export async function chatWithAzureOpenAI(
  messages: ChatMessage[],
  options: ChatOptions,
): Promise<string> {
  const env = loadEnv();
  const endpoint = env.azureOpenaiEndpoint;
  const apiKey = env.azureOpenaiApiKey;
  const deployment = env.azureOpenaiDeployment;
  const apiVersion = env.azureOpenaiApiVersion || '2024-10-21';

  if (!endpoint || !apiKey || !deployment) {
    throw new Error('Azure OpenAI not configured (AZURE_OPENAI_ENDPOINT/API_KEY/DEPLOYMENT)');
  }

  const url = `${endpoint.replace(/\/$/, '')}/openai/deployments/${deployment}/chat/completions?api-version=${apiVersion}`;

  const body = {
    messages,
    max_tokens: 150, // replies are one or two spoken sentences
    temperature: 0.3,
  };

  const response = await axios.post<AzureOpenAIChatResponse>(url, body, {
    headers: {
      'api-key': apiKey,
      'Content-Type': 'application/json',
    },
    timeout: options.timeoutMs,
    signal: options.signal,
  });

  const choice = response.data.choices?.[0];
  if (!choice) {
    throw new Error('Azure OpenAI returned no choices');
  }

  const usage = response.data.usage;
  if (usage) {
    console.log(
      `[Azure OpenAI] tokens: ${usage.prompt_tokens} prompt + ${usage.completion_tokens} completion = ${usage.total_tokens} total`,
    );
  }

  return choice.message.content || '';
}
