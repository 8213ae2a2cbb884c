// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { GoogleGenerativeAI, type GenerateContentResult } from '@google/generative-ai';
import { BaseProvider, type SendOptions } from './base.js';
import { mapProviderError } from './error-mapping.js';
import { AuthError, InvalidResponseError } from '../errors.js';
import { renderUserMessage } from '../prompt/assembler.js';
import type { NeutralPrompt, ProviderResponse } from '../types.js';

/**
 * Google Gemini adapter.
 */
export class GoogleProvider extends BaseProvider {
  private client: GoogleGenerativeAI | null = null;

  getName(): string {
    return 'google';
  }

  getDisplayName(): string {
    return 'Google';
  }

  private getClient(): GoogleGenerativeAI {
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      throw new AuthError(this.getName(), 'GOOGLE_API_KEY is not set');
    }
    if (!this.client) {
      this.client = new GoogleGenerativeAI(apiKey);
    }
    return this.client;
  }

  async send(prompt: NeutralPrompt, model: string, options: SendOptions = {}): Promise<ProviderResponse> {
    const generativeModel = this.getClient().getGenerativeModel(
      {
        model,
        ...(prompt.system && { systemInstruction: prompt.system }),
        generationConfig: {
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxOutputTokens,
        },
      },
      this.settings.baseUrl ? { baseUrl: this.settings.baseUrl } : undefined
    );

    let result: GenerateContentResult;
    try {
      result = await generativeModel.generateContent(
        { contents: [{ role: 'user', parts: [{ text: renderUserMessage(prompt) }] }] },
        { signal: options.signal }
      );
    } catch (error) {
      throw mapProviderError(this.getName(), error, options.signal);
    }

    let text: string;
    try {
      // text() throws when the candidate was blocked
      text = result.response.text().trim();
    } catch (error) {
      throw new InvalidResponseError(
        this.getName(),
        `Gemini returned no usable text: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (!text) {
      throw new InvalidResponseError(this.getName(), 'Gemini returned an empty response');
    }

    const usage = result.response.usageMetadata;
    return {
      text,
      provider: this.getName(),
      model,
      usage: usage
        ? { inputTokens: usage.promptTokenCount, outputTokens: usage.candidatesTokenCount }
        : undefined,
    };
  }
}
