import axios from 'axios';
import { loadEnv } from '../config/env.js';

// ─── Types ───

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  /** Upper bound for one completion; a timeout counts as a failed call */
  timeoutMs: number;
  signal?: AbortSignal;
}

interface OllamaChatResponse {
  message: {
    role: 'assistant';
    content: string;
  };
  done: boolean;
}

// ─── Client ───

export async function isOllamaAvailable(): Promise<boolean> {
  const env = loadEnv();
  if (!env.ollamaUrl) return false;
  try {
    const res = await axios.get(`${env.ollamaUrl}/api/tags`, { timeout: 3_000 });
    return res.status === 200;
  } catch {
    return false;
  }
}

export async function chatWithOllama(
  messages: ChatMessage[],
  options: ChatOptions,
): Promise<string> {
  const env = loadEnv();
  if (!env.ollamaUrl) {
    throw new Error('OLLAMA_URL not configured');
  }

  const body = {
    model: env.ollamaModel,
    messages,
    stream: false,
    options: {
      num_predict: 200, // short answers, they are spoken
      temperature: 0.3,
    },
  };

  const response = await axios.post<OllamaChatResponse>(
    `${env.ollamaUrl.replace(/\/$/, '')}/api/chat`,
    body,
    { timeout: options.timeoutMs, signal: options.signal },
  );

  return response.data.message?.content || '';
}
