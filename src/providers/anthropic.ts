// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider, type SendOptions } from './base.js';
import { mapProviderError } from './error-mapping.js';
import { AuthError, InvalidResponseError } from '../errors.js';
import { renderUserMessage } from '../prompt/assembler.js';
import type { NeutralPrompt, ProviderResponse } from '../types.js';

/**
 * Anthropic messages API adapter. The system prompt goes in the top-level
 * `system` field rather than as a message.
 */
export class AnthropicProvider extends BaseProvider {
  private client: Anthropic | null = null;

  getName(): string {
    return 'anthropic';
  }

  getDisplayName(): string {
    return 'Anthropic';
  }

  private getClient(): Anthropic {
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      throw new AuthError(this.getName(), 'ANTHROPIC_API_KEY is not set');
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey, baseURL: this.settings.baseUrl, maxRetries: 0 });
    }
    return this.client;
  }

  async send(prompt: NeutralPrompt, model: string, options: SendOptions = {}): Promise<ProviderResponse> {
    const client = this.getClient();

    let response: Anthropic.Message;
    try {
      response = await client.messages.create(
        {
          model,
          max_tokens: this.settings.maxOutputTokens,
          temperature: this.settings.temperature,
          ...(prompt.system && { system: prompt.system }),
          messages: [{ role: 'user', content: renderUserMessage(prompt) }],
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw mapProviderError(this.getName(), error, options.signal);
    }

    const text = (response.content ?? [])
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new InvalidResponseError(this.getName(), 'Anthropic returned no text content');
    }

    return {
      text,
      provider: this.getName(),
      model: response.model || model,
      usage: response.usage
        ? { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens }
        : undefined,
    };
  }
}
