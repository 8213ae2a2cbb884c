// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for Deskmate.
 */

/**
 * Built-in provider identifiers.
 */
export const PROVIDER_IDS = ['openai', 'anthropic', 'google', 'ollama'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

/**
 * Per-provider defaults. Budgets are in characters (roughly 4 per token).
 */
export const PROVIDER_DEFAULTS: Record<ProviderId, {
  defaultModel: string;
  contextBudget: number;
  maxPromptChars: number;
}> = {
  openai: {
    defaultModel: 'gpt-4o-mini',
    contextBudget: 48_000,
    maxPromptChars: 100_000,
  },
  anthropic: {
    defaultModel: 'claude-opus-4-1-20250805',
    contextBudget: 64_000,
    maxPromptChars: 150_000,
  },
  google: {
    defaultModel: 'gemini-1.5-pro',
    contextBudget: 120_000,
    maxPromptChars: 300_000,
  },
  ollama: {
    defaultModel: 'llama3.2',
    contextBudget: 8_000,
    maxPromptChars: 16_000,
  },
};

/** Default Ollama server */
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

/**
 * Generation defaults shared by all adapters.
 */
export const GENERATION_CONFIG = {
  TEMPERATURE: 0.7,
  MAX_OUTPUT_TOKENS: 1024,
} as const;

/**
 * Chunking defaults.
 */
export const CHUNKING_CONFIG = {
  /** Maximum chunk size in characters */
  MAX_CHUNK_SIZE: 2000,
  /** Overlap between consecutive chunks in characters */
  OVERLAP: 0,
} as const;

/**
 * Dispatch defaults.
 */
export const DISPATCH_CONFIG = {
  MAX_RETRIES: 3,
  INITIAL_DELAY_MS: 1000,
  MAX_DELAY_MS: 30000,
  BACKOFF_MULTIPLIER: 2,
  JITTER: true,
  /** Per-attempt timeout */
  TIMEOUT_MS: 60000,
} as const;

/** Uploads larger than this are rejected before being read */
export const MAX_DOCUMENT_BYTES = 10 * 1024 * 1024;
