import OpenAI from 'openai';
import type { CompletionPort } from '../../domain/ports/CompletionPort.js';
import { ExternalServiceError } from '../../domain/errors/DomainErrors.js';
import { toServiceError } from '../embedding/OpenAIEmbeddingAdapter.js';

/**
 * 透過 OpenAI-compatible chat completions 產生回答
 * 支援任何相容 endpoint（OpenAI、Ollama、vLLM、LiteLLM 等）
 */
export interface OpenAICompletionConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
}

export class OpenAICompletionAdapter implements CompletionPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: OpenAICompletionConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 1,
      timeout: config.timeoutMs ?? 120000,
    });
  }

  async generate(prompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw toServiceError('completion', err);
    }

    if (!content) {
      throw new ExternalServiceError('completion', 'Completion service returned an empty answer', 502);
    }
    return content.trim();
  }
}
