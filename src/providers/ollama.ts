// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BaseProvider, type SendOptions } from './base.js';
import { errorFromStatus, mapProviderError } from './error-mapping.js';
import { InvalidResponseError } from '../errors.js';
import { DEFAULT_OLLAMA_URL } from '../constants.js';
import { renderUserMessage } from '../prompt/assembler.js';
import type { NeutralPrompt, ProviderResponse } from '../types.js';

interface OllamaChatResponse {
  model?: string;
  message?: { role?: string; content?: string };
  prompt_eval_count?: number;
  eval_count?: number;
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseChatResponse(value: unknown): OllamaChatResponse | null {
  if (!isRecord(value)) return null;
  const message = value.message;
  return {
    model: typeof value.model === 'string' ? value.model : undefined,
    message: isRecord(message)
      ? { content: typeof message.content === 'string' ? message.content : undefined }
      : undefined,
    prompt_eval_count: typeof value.prompt_eval_count === 'number' ? value.prompt_eval_count : undefined,
    eval_count: typeof value.eval_count === 'number' ? value.eval_count : undefined,
    error: typeof value.error === 'string' ? value.error : undefined,
  };
}

/**
 * Local Ollama adapter using the native /api/chat endpoint (non-streaming).
 */
export class OllamaProvider extends BaseProvider {
  getName(): string {
    return 'ollama';
  }

  getDisplayName(): string {
    return 'Ollama';
  }

  isConfigured(): boolean {
    return true;
  }

  private getBaseUrl(): string {
    return (this.settings.baseUrl || DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
  }

  async send(prompt: NeutralPrompt, model: string, options: SendOptions = {}): Promise<ProviderResponse> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (prompt.system) {
      messages.push({ role: 'system', content: prompt.system });
    }
    messages.push({ role: 'user', content: renderUserMessage(prompt) });

    let response: Response;
    try {
      response = await fetch(`${this.getBaseUrl()}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          messages,
          stream: false,
          options: {
            temperature: this.settings.temperature,
            num_predict: this.settings.maxOutputTokens,
          },
        }),
        signal: options.signal,
      });
    } catch (error) {
      throw mapProviderError(this.getName(), error, options.signal);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw errorFromStatus(this.getName(), response.status, detail || response.statusText);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new InvalidResponseError(this.getName(), 'Ollama returned invalid JSON', { cause: error });
      }
      throw mapProviderError(this.getName(), error, options.signal);
    }

    const data = parseChatResponse(body);
    if (!data) {
      throw new InvalidResponseError(this.getName(), 'Ollama returned a malformed response');
    }
    if (data.error) {
      throw new InvalidResponseError(this.getName(), `Ollama error: ${data.error}`);
    }
    const text = data.message?.content?.trim();
    if (!text) {
      throw new InvalidResponseError(this.getName(), 'Ollama returned an empty message');
    }

    return {
      text,
      provider: this.getName(),
      model: data.model || model,
      usage: data.prompt_eval_count !== undefined && data.eval_count !== undefined
        ? { inputTokens: data.prompt_eval_count, outputTokens: data.eval_count }
        : undefined,
    };
  }
}
