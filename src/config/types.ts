// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for file, environment and resolved configuration.
 */

import type { ProviderId } from '../constants.js';

/**
 * Per-provider overrides accepted in a config file.
 * API keys are deliberately absent: they only come from the environment.
 */
export interface ProviderOverrides {
  /** Default model for this provider */
  model?: string;
  /** Custom base URL for the API (e.g. a proxy or a remote Ollama) */
  baseUrl?: string;
  /** Characters of document context to include */
  contextBudget?: number;
  /** Hard limit for the whole prompt in characters */
  maxPromptChars?: number;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Workspace configuration for Deskmate.
 * Can be defined in .deskmate.json or deskmate.config.json in the working directory,
 * or globally in ~/.deskmate/config.json.
 */
export interface WorkspaceConfig {
  /** Provider to use when none is given on the command line */
  provider?: string;

  /** Per-provider settings */
  providers?: Partial<Record<ProviderId, ProviderOverrides>>;

  /** Chunking options for uploaded documents */
  chunking?: {
    maxChunkSize?: number;
    overlap?: number;
  };

  /** Retry and timeout policy for provider calls */
  dispatch?: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    jitter?: boolean;
    timeoutMs?: number;
  };

  /** Uploads larger than this many bytes are rejected */
  maxDocumentBytes?: number;
}

/**
 * Values read once from the process environment at startup.
 */
export interface EnvironmentConfig {
  openaiApiKey?: string;
  anthropicApiKey?: string;
  googleApiKey?: string;
  ollamaHost?: string;
  provider?: string;
}

/**
 * Fully resolved settings for one provider adapter.
 */
export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
  defaultModel: string;
  contextBudget: number;
  maxPromptChars: number;
  temperature: number;
  maxOutputTokens: number;
}

export interface ChunkingSettings {
  maxChunkSize: number;
  overlap: number;
}

export interface DispatchSettings {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
  timeoutMs: number;
}

/**
 * Resolved configuration after merging defaults, files, environment and CLI options.
 * Built once at process start and passed by reference to the components that need it.
 */
export interface ResolvedConfig {
  provider: string;
  providers: Record<ProviderId, ProviderSettings>;
  chunking: ChunkingSettings;
  dispatch: DispatchSettings;
  maxDocumentBytes: number;
}
