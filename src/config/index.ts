// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (WorkspaceConfig, ResolvedConfig, etc.)
 * - loader.ts    - File I/O and environment
 * - validator.ts - Config validation
 * - merger.ts    - Config merging with priority handling
 */

import { logger } from '../logger.js';
import { loadEnvironment, loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
import { mergeConfig, type CLIOptions } from './merger.js';
import type { ResolvedConfig } from './types.js';
import { validateConfig } from './validator.js';

// Re-export all types
export type {
  WorkspaceConfig,
  ProviderOverrides,
  EnvironmentConfig,
  ProviderSettings,
  ChunkingSettings,
  DispatchSettings,
  ResolvedConfig,
} from './types.js';

// Re-export from loader
export {
  CONFIG_FILES,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  loadGlobalConfig,
  loadWorkspaceConfig,
  loadEnvironment,
  parseWorkspaceConfig,
} from './loader.js';

// Re-export from validator
export { validateConfig } from './validator.js';

// Re-export from merger
export { createDefaultConfig, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

/**
 * Load every configuration layer and merge them.
 * Meant to be called once at process start.
 */
export function resolveConfig(
  cliOptions: CLIOptions = {},
  options: { cwd?: string; env?: NodeJS.ProcessEnv; globalDir?: string } = {}
): ResolvedConfig {
  const global = loadGlobalConfig(options.globalDir);
  const workspace = loadWorkspaceConfig(options.cwd);

  for (const { config, configPath } of [global, workspace]) {
    if (config && configPath) {
      for (const warning of validateConfig(config)) {
        logger.warn(`${configPath}: ${warning}`);
      }
    }
  }

  return mergeConfig(workspace.config, cliOptions, loadEnvironment(options.env), global.config);
}
