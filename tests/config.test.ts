// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, expect, it, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

import {
  createDefaultConfig,
  loadEnvironment,
  loadWorkspaceConfig,
  mergeConfig,
  parseWorkspaceConfig,
  resolveConfig,
  validateConfig,
  type WorkspaceConfig,
} from '../src/config/index.js';

// Use a temp directory for tests
const TEST_DIR = path.join(os.tmpdir(), '.deskmate-config-test');
const EMPTY_GLOBAL_DIR = path.join(TEST_DIR, 'no-global');

describe('Workspace Configuration', () => {
  beforeEach(() => {
    // Create test directory
    if (fs.existsSync(TEST_DIR)) {
      fs.rmSync(TEST_DIR, { recursive: true });
    }
    fs.mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    // Clean up test directory
    if (fs.existsSync(TEST_DIR)) {
      fs.rmSync(TEST_DIR, { recursive: true });
    }
    vi.restoreAllMocks();
  });

  describe('loadWorkspaceConfig', () => {
    it('returns null when no config file exists', () => {
      const { config, configPath } = loadWorkspaceConfig(TEST_DIR);
      expect(config).toBeNull();
      expect(configPath).toBeNull();
    });

    it('loads .deskmate.json config file', () => {
      const testConfig: WorkspaceConfig = {
        provider: 'anthropic',
        chunking: { maxChunkSize: 1500, overlap: 100 },
      };
      fs.writeFileSync(path.join(TEST_DIR, '.deskmate.json'), JSON.stringify(testConfig));

      const { config, configPath } = loadWorkspaceConfig(TEST_DIR);
      expect(config).toEqual(testConfig);
      expect(configPath).toBe(path.join(TEST_DIR, '.deskmate.json'));
    });

    it('loads deskmate.config.json config file', () => {
      fs.writeFileSync(path.join(TEST_DIR, 'deskmate.config.json'), JSON.stringify({ provider: 'ollama' }));

      const { config, configPath } = loadWorkspaceConfig(TEST_DIR);
      expect(config).toEqual({ provider: 'ollama' });
      expect(configPath).toBe(path.join(TEST_DIR, 'deskmate.config.json'));
    });

    it('prefers .deskmate.json over deskmate.config.json', () => {
      fs.writeFileSync(path.join(TEST_DIR, '.deskmate.json'), JSON.stringify({ provider: 'google' }));
      fs.writeFileSync(path.join(TEST_DIR, 'deskmate.config.json'), JSON.stringify({ provider: 'ollama' }));

      expect(loadWorkspaceConfig(TEST_DIR).config).toEqual({ provider: 'google' });
    });

    it('returns null config and warns on invalid JSON', () => {
      fs.writeFileSync(path.join(TEST_DIR, '.deskmate.json'), '{ invalid json }');

      const { config, configPath } = loadWorkspaceConfig(TEST_DIR);
      expect(config).toBeNull();
      expect(configPath).toBe(path.join(TEST_DIR, '.deskmate.json'));
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('parseWorkspaceConfig', () => {
    it('keeps known fields of the right type', () => {
      const config = parseWorkspaceConfig({
        provider: 'openai',
        providers: {
          openai: { model: 'gpt-4o', contextBudget: 20000, temperature: 'hot' },
          mystery: { model: 'x' },
        },
        dispatch: { maxRetries: 5, jitter: false },
        maxDocumentBytes: 1024,
        extra: true,
      });

      expect(config).toEqual({
        provider: 'openai',
        providers: { openai: { model: 'gpt-4o', contextBudget: 20000 } },
        dispatch: { maxRetries: 5, jitter: false },
        maxDocumentBytes: 1024,
      });
    });

    it('rejects non-object input', () => {
      expect(() => parseWorkspaceConfig([1, 2])).toThrow('config must be a JSON object');
    });
  });

  describe('validateConfig', () => {
    it('returns no warnings for valid config', () => {
      const config: WorkspaceConfig = {
        provider: 'anthropic',
        providers: { anthropic: { contextBudget: 1000, temperature: 0.2 } },
        chunking: { maxChunkSize: 1000, overlap: 100 },
        dispatch: { maxRetries: 2, timeoutMs: 5000 },
      };
      expect(validateConfig(config)).toEqual([]);
    });

    it('warns about an unknown provider', () => {
      expect(validateConfig({ provider: 'fakeml' })).toEqual([
        'Unknown provider "fakeml". Valid: openai, anthropic, google, ollama',
      ]);
    });

    it('warns about out-of-range values', () => {
      const warnings = validateConfig({
        providers: { google: { maxPromptChars: 0, temperature: 3 } },
        chunking: { maxChunkSize: 100, overlap: 100 },
        dispatch: { maxRetries: -1 },
        maxDocumentBytes: -5,
      });

      expect(warnings).toEqual([
        'providers.google.maxPromptChars must be a positive number',
        'providers.google.temperature must be between 0 and 2',
        'chunking.overlap must be smaller than chunking.maxChunkSize',
        'dispatch.maxRetries must be a non-negative integer',
        'maxDocumentBytes must be a positive number',
      ]);
    });
  });

  describe('mergeConfig', () => {
    it('returns defaults when nothing is configured', () => {
      expect(mergeConfig(null, {})).toEqual(createDefaultConfig());
    });

    it('has per-provider defaults', () => {
      const config = createDefaultConfig();

      expect(config.provider).toBe('openai');
      expect(config.providers.ollama.baseUrl).toBe('http://localhost:11434');
      expect(config.providers.anthropic.defaultModel).toBe('claude-opus-4-1-20250805');
      expect(config.chunking).toEqual({ maxChunkSize: 2000, overlap: 0 });
      expect(config.dispatch.maxRetries).toBe(3);
    });

    it('applies workspace overrides', () => {
      const config = mergeConfig(
        {
          provider: 'google',
          providers: { google: { model: 'gemini-1.5-flash', maxOutputTokens: 2048 } },
          chunking: { overlap: 50 },
          dispatch: { timeoutMs: 5000 },
        },
        {}
      );

      expect(config.provider).toBe('google');
      expect(config.providers.google.defaultModel).toBe('gemini-1.5-flash');
      expect(config.providers.google.maxOutputTokens).toBe(2048);
      expect(config.chunking).toEqual({ maxChunkSize: 2000, overlap: 50 });
      expect(config.dispatch.timeoutMs).toBe(5000);
    });

    it('ignores invalid numbers instead of applying them', () => {
      const config = mergeConfig({ chunking: { maxChunkSize: -1, overlap: 1.5 } }, {});
      expect(config.chunking).toEqual({ maxChunkSize: 2000, overlap: 0 });
    });

    it('takes API keys only from the environment', () => {
      const config = mergeConfig(null, {}, { anthropicApiKey: 'test-secret', ollamaHost: 'http://gpu:11434' });

      expect(config.providers.anthropic.apiKey).toBe('test-secret');
      expect(config.providers.openai.apiKey).toBeUndefined();
      expect(config.providers.ollama.baseUrl).toBe('http://gpu:11434');
    });

    it('applies priority CLI > environment > workspace > global', () => {
      const global: WorkspaceConfig = { provider: 'ollama', chunking: { maxChunkSize: 500 }, dispatch: { maxRetries: 1 } };
      const workspace: WorkspaceConfig = { provider: 'google', chunking: { maxChunkSize: 800 } };

      expect(mergeConfig(workspace, {}, {}, global).provider).toBe('google');
      expect(mergeConfig(workspace, {}, { provider: 'anthropic' }, global).provider).toBe('anthropic');

      const config = mergeConfig(workspace, { provider: 'openai', chunkSize: 1200, maxRetries: 0 }, { provider: 'anthropic' }, global);
      expect(config.provider).toBe('openai');
      expect(config.chunking.maxChunkSize).toBe(1200);
      expect(config.dispatch.maxRetries).toBe(0);
    });

    it('does not share state between calls', () => {
      const first = mergeConfig(null, {});
      first.providers.openai.defaultModel = 'changed';

      expect(mergeConfig(null, {}).providers.openai.defaultModel).toBe('gpt-4o-mini');
    });
  });

  describe('loadEnvironment', () => {
    it('reads provider keys and ignores blank values', () => {
      expect(loadEnvironment({
        OPENAI_API_KEY: 'test-secret',
        GOOGLE_API_KEY: '   ',
        DESKMATE_PROVIDER: 'google',
      })).toEqual({
        openaiApiKey: 'test-secret',
        anthropicApiKey: undefined,
        googleApiKey: undefined,
        ollamaHost: undefined,
        provider: 'google',
      });
    });
  });

  describe('resolveConfig', () => {
    it('combines files, environment and CLI options', () => {
      fs.writeFileSync(
        path.join(TEST_DIR, '.deskmate.json'),
        JSON.stringify({ provider: 'anthropic', dispatch: { maxRetries: 1 } })
      );

      const config = resolveConfig(
        { overlap: 25 },
        { cwd: TEST_DIR, env: { ANTHROPIC_API_KEY: 'test-secret' }, globalDir: EMPTY_GLOBAL_DIR }
      );

      expect(config.provider).toBe('anthropic');
      expect(config.providers.anthropic.apiKey).toBe('test-secret');
      expect(config.dispatch.maxRetries).toBe(1);
      expect(config.chunking.overlap).toBe(25);
    });

    it('warns about invalid values in config files', () => {
      fs.writeFileSync(path.join(TEST_DIR, '.deskmate.json'), JSON.stringify({ provider: 'fakeml' }));

      resolveConfig({}, { cwd: TEST_DIR, env: {}, globalDir: EMPTY_GLOBAL_DIR });

      expect(console.warn).toHaveBeenCalledWith(
        `Warning: ${path.join(TEST_DIR, '.deskmate.json')}: Unknown provider "fakeml". Valid: openai, anthropic, google, ollama`
      );
    });
  });
});
