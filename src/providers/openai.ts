// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import OpenAI from 'openai';
import { BaseProvider, type SendOptions } from './base.js';
import { mapProviderError } from './error-mapping.js';
import { AuthError, InvalidResponseError } from '../errors.js';
import { renderUserMessage } from '../prompt/assembler.js';
import type { NeutralPrompt, ProviderResponse } from '../types.js';

/**
 * OpenAI chat completions adapter.
 */
export class OpenAIProvider extends BaseProvider {
  private client: OpenAI | null = null;

  getName(): string {
    return 'openai';
  }

  getDisplayName(): string {
    return 'OpenAI';
  }

  private getClient(): OpenAI {
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      throw new AuthError(this.getName(), 'OPENAI_API_KEY is not set');
    }
    if (!this.client) {
      // Retries belong to the dispatcher
      this.client = new OpenAI({ apiKey, baseURL: this.settings.baseUrl, maxRetries: 0 });
    }
    return this.client;
  }

  async send(prompt: NeutralPrompt, model: string, options: SendOptions = {}): Promise<ProviderResponse> {
    const client = this.getClient();
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (prompt.system) {
      messages.push({ role: 'system', content: prompt.system });
    }
    messages.push({ role: 'user', content: renderUserMessage(prompt) });

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await client.chat.completions.create(
        {
          model,
          messages,
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxOutputTokens,
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw mapProviderError(this.getName(), error, options.signal);
    }

    const text = completion.choices?.[0]?.message?.content?.trim();
    if (!text) {
      throw new InvalidResponseError(this.getName(), 'OpenAI returned an empty completion');
    }

    return {
      text,
      provider: this.getName(),
      model: completion.model || model,
      usage: completion.usage
        ? { inputTokens: completion.usage.prompt_tokens, outputTokens: completion.usage.completion_tokens }
        : undefined,
    };
  }
}
