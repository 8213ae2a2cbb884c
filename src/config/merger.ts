// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > environment > workspace config > global config > defaults
 */

import {
  CHUNKING_CONFIG,
  DEFAULT_OLLAMA_URL,
  DISPATCH_CONFIG,
  GENERATION_CONFIG,
  MAX_DOCUMENT_BYTES,
  PROVIDER_DEFAULTS,
  PROVIDER_IDS,
  type ProviderId,
} from '../constants.js';
import type {
  EnvironmentConfig,
  ProviderOverrides,
  ProviderSettings,
  ResolvedConfig,
  WorkspaceConfig,
} from './types.js';

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  provider?: string;
  chunkSize?: number;
  overlap?: number;
  timeoutMs?: number;
  maxRetries?: number;
}

function defaultProviderSettings(id: ProviderId): ProviderSettings {
  const defaults = PROVIDER_DEFAULTS[id];
  return {
    baseUrl: id === 'ollama' ? DEFAULT_OLLAMA_URL : undefined,
    defaultModel: defaults.defaultModel,
    contextBudget: defaults.contextBudget,
    maxPromptChars: defaults.maxPromptChars,
    temperature: GENERATION_CONFIG.TEMPERATURE,
    maxOutputTokens: GENERATION_CONFIG.MAX_OUTPUT_TOKENS,
  };
}

/**
 * Build a fresh copy of the default configuration.
 */
export function createDefaultConfig(): ResolvedConfig {
  return {
    provider: 'openai',
    providers: {
      openai: defaultProviderSettings('openai'),
      anthropic: defaultProviderSettings('anthropic'),
      google: defaultProviderSettings('google'),
      ollama: defaultProviderSettings('ollama'),
    },
    chunking: {
      maxChunkSize: CHUNKING_CONFIG.MAX_CHUNK_SIZE,
      overlap: CHUNKING_CONFIG.OVERLAP,
    },
    dispatch: {
      maxRetries: DISPATCH_CONFIG.MAX_RETRIES,
      initialDelayMs: DISPATCH_CONFIG.INITIAL_DELAY_MS,
      maxDelayMs: DISPATCH_CONFIG.MAX_DELAY_MS,
      backoffMultiplier: DISPATCH_CONFIG.BACKOFF_MULTIPLIER,
      jitter: DISPATCH_CONFIG.JITTER,
      timeoutMs: DISPATCH_CONFIG.TIMEOUT_MS,
    },
    maxDocumentBytes: MAX_DOCUMENT_BYTES,
  };
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

function isNonNegativeInteger(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0;
}

function applyProviderOverrides(settings: ProviderSettings, source: ProviderOverrides): void {
  if (source.model) settings.defaultModel = source.model;
  if (source.baseUrl) settings.baseUrl = source.baseUrl;
  if (isPositive(source.contextBudget)) settings.contextBudget = source.contextBudget;
  if (isPositive(source.maxPromptChars)) settings.maxPromptChars = source.maxPromptChars;
  if (isPositive(source.maxOutputTokens)) settings.maxOutputTokens = source.maxOutputTokens;
  if (source.temperature !== undefined && Number.isFinite(source.temperature)) {
    settings.temperature = source.temperature;
  }
}

/**
 * Apply a workspace config layer to the resolved config.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.provider) config.provider = source.provider;

  for (const id of PROVIDER_IDS) {
    const overrides = source.providers?.[id];
    if (overrides) applyProviderOverrides(config.providers[id], overrides);
  }

  const chunking = source.chunking;
  if (chunking) {
    if (isPositive(chunking.maxChunkSize)) config.chunking.maxChunkSize = chunking.maxChunkSize;
    if (isNonNegativeInteger(chunking.overlap)) config.chunking.overlap = chunking.overlap;
  }

  const dispatch = source.dispatch;
  if (dispatch) {
    if (isNonNegativeInteger(dispatch.maxRetries)) config.dispatch.maxRetries = dispatch.maxRetries;
    if (isPositive(dispatch.initialDelayMs)) config.dispatch.initialDelayMs = dispatch.initialDelayMs;
    if (isPositive(dispatch.maxDelayMs)) config.dispatch.maxDelayMs = dispatch.maxDelayMs;
    if (isPositive(dispatch.backoffMultiplier)) config.dispatch.backoffMultiplier = dispatch.backoffMultiplier;
    if (dispatch.jitter !== undefined) config.dispatch.jitter = dispatch.jitter;
    if (isPositive(dispatch.timeoutMs)) config.dispatch.timeoutMs = dispatch.timeoutMs;
  }

  if (isPositive(source.maxDocumentBytes)) config.maxDocumentBytes = source.maxDocumentBytes;
}

/**
 * Apply credentials and endpoints read from the environment.
 */
function applyEnvironment(config: ResolvedConfig, env: EnvironmentConfig): void {
  if (env.openaiApiKey) config.providers.openai.apiKey = env.openaiApiKey;
  if (env.anthropicApiKey) config.providers.anthropic.apiKey = env.anthropicApiKey;
  if (env.googleApiKey) config.providers.google.apiKey = env.googleApiKey;
  if (env.ollamaHost) config.providers.ollama.baseUrl = env.ollamaHost;
  if (env.provider) config.provider = env.provider;
}

/**
 * Merge configuration layers into one resolved config.
 * Priority: CLI options > environment > workspace config > global config > defaults
 */
export function mergeConfig(
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions,
  env: EnvironmentConfig = {},
  globalConfig: WorkspaceConfig | null = null
): ResolvedConfig {
  const config = createDefaultConfig();

  // Apply global config (lowest priority, baseline for all projects)
  if (globalConfig) {
    applyWorkspaceConfig(config, globalConfig);
  }

  // Apply workspace config (overrides global)
  if (workspaceConfig) {
    applyWorkspaceConfig(config, workspaceConfig);
  }

  applyEnvironment(config, env);

  // CLI options override everything else
  if (cliOptions.provider) config.provider = cliOptions.provider;
  if (isPositive(cliOptions.chunkSize)) config.chunking.maxChunkSize = cliOptions.chunkSize;
  if (isNonNegativeInteger(cliOptions.overlap)) config.chunking.overlap = cliOptions.overlap;
  if (isPositive(cliOptions.timeoutMs)) config.dispatch.timeoutMs = cliOptions.timeoutMs;
  if (isNonNegativeInteger(cliOptions.maxRetries)) config.dispatch.maxRetries = cliOptions.maxRetries;

  return config;
}
