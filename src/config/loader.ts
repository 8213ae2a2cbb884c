// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Reads configuration files from disk and API keys from the environment.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../logger.js';
import { PROVIDER_IDS, type ProviderId } from '../constants.js';
import type { EnvironmentConfig, ProviderOverrides, WorkspaceConfig } from './types.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.deskmate.json', 'deskmate.config.json'];

/**
 * Global config directory path.
 */
export const GLOBAL_CONFIG_DIR = path.join(os.homedir(), '.deskmate');

/**
 * Global config file path.
 */
export const GLOBAL_CONFIG_FILE = path.join(GLOBAL_CONFIG_DIR, 'config.json');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

function parseProviderOverrides(value: Record<string, unknown>): ProviderOverrides {
  return {
    model: pickString(value, 'model'),
    baseUrl: pickString(value, 'baseUrl'),
    contextBudget: pickNumber(value, 'contextBudget'),
    maxPromptChars: pickNumber(value, 'maxPromptChars'),
    temperature: pickNumber(value, 'temperature'),
    maxOutputTokens: pickNumber(value, 'maxOutputTokens'),
  };
}

/**
 * Turn parsed JSON into a WorkspaceConfig, keeping only known fields of the right type.
 * Unknown providers are dropped here; validateConfig() reports them.
 */
export function parseWorkspaceConfig(value: unknown): WorkspaceConfig {
  if (!isRecord(value)) {
    throw new Error('config must be a JSON object');
  }

  const config: WorkspaceConfig = {};
  const provider = pickString(value, 'provider');
  if (provider !== undefined) config.provider = provider;

  const providers = value.providers;
  if (isRecord(providers)) {
    const byProvider: Partial<Record<ProviderId, ProviderOverrides>> = {};
    for (const id of PROVIDER_IDS) {
      const overrides = providers[id];
      if (isRecord(overrides)) {
        byProvider[id] = parseProviderOverrides(overrides);
      }
    }
    config.providers = byProvider;
  }

  const chunking = value.chunking;
  if (isRecord(chunking)) {
    config.chunking = {
      maxChunkSize: pickNumber(chunking, 'maxChunkSize'),
      overlap: pickNumber(chunking, 'overlap'),
    };
  }

  const dispatch = value.dispatch;
  if (isRecord(dispatch)) {
    config.dispatch = {
      maxRetries: pickNumber(dispatch, 'maxRetries'),
      initialDelayMs: pickNumber(dispatch, 'initialDelayMs'),
      maxDelayMs: pickNumber(dispatch, 'maxDelayMs'),
      backoffMultiplier: pickNumber(dispatch, 'backoffMultiplier'),
      jitter: pickBoolean(dispatch, 'jitter'),
      timeoutMs: pickNumber(dispatch, 'timeoutMs'),
    };
  }

  const maxDocumentBytes = pickNumber(value, 'maxDocumentBytes');
  if (maxDocumentBytes !== undefined) config.maxDocumentBytes = maxDocumentBytes;

  return config;
}

function readConfigFile(configPath: string): WorkspaceConfig | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    return parseWorkspaceConfig(JSON.parse(content));
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }
}

/**
 * Find and load global configuration from ~/.deskmate/config.json.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  const configPath = overrideDir
    ? path.join(overrideDir, 'config.json')
    : GLOBAL_CONFIG_FILE;

  if (fs.existsSync(configPath)) {
    return { config: readConfigFile(configPath), configPath };
  }
  return { config: null, configPath: null };
}

/**
 * Find and load workspace configuration from the current directory.
 * Searches for .deskmate.json, then deskmate.config.json.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read provider credentials and endpoints from the environment.
 * Called once at startup; adapters receive the values through their settings.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    anthropicApiKey: nonEmpty(env.ANTHROPIC_API_KEY),
    googleApiKey: nonEmpty(env.GOOGLE_API_KEY),
    ollamaHost: nonEmpty(env.OLLAMA_HOST),
    provider: nonEmpty(env.DESKMATE_PROVIDER),
  };
}
