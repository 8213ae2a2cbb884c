// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { ProviderSettings } from '../config/types.js';
import type { NeutralPrompt, PromptBudget, ProviderResponse } from '../types.js';

/**
 * Per-call options passed down by the dispatcher.
 */
export interface SendOptions {
  /** Aborted on timeout or cancellation; adapters forward it to their client */
  signal?: AbortSignal;
}

/**
 * Abstract base class for model provider adapters.
 * Implement this to add support for a new backend, then register it with
 * a ProviderRegistry.
 *
 * Adapters never retry. They translate one NeutralPrompt into one request
 * and map every failure into the shared error kinds.
 */
export abstract class BaseProvider {
  protected settings: ProviderSettings;

  constructor(settings: ProviderSettings) {
    this.settings = settings;
  }

  /**
   * Send a prompt to the model.
   * @param model - Model identifier understood by this provider
   */
  abstract send(prompt: NeutralPrompt, model: string, options?: SendOptions): Promise<ProviderResponse>;

  /**
   * Registry identifier of this provider (e.g. "openai").
   */
  abstract getName(): string;

  /**
   * Human-readable name for display purposes.
   */
  abstract getDisplayName(): string;

  /**
   * Model used when a request does not name one.
   */
  getDefaultModel(): string {
    return this.settings.defaultModel;
  }

  /**
   * Character budgets for prompts sent to this provider.
   */
  getBudget(): PromptBudget {
    return {
      contextBudget: this.settings.contextBudget,
      maxPromptChars: this.settings.maxPromptChars,
    };
  }

  /**
   * Whether credentials are present. Local providers are always configured.
   */
  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }
}
