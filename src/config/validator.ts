// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Functions for validating workspace configuration.
 */

import { PROVIDER_IDS } from '../constants.js';
import type { WorkspaceConfig } from './types.js';

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Validate workspace configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];
  const validProviders: readonly string[] = PROVIDER_IDS;

  // Validate provider
  if (config.provider && !validProviders.includes(config.provider)) {
    warnings.push(`Unknown provider "${config.provider}". Valid: ${PROVIDER_IDS.join(', ')}`);
  }

  for (const [id, overrides] of Object.entries(config.providers ?? {})) {
    if (overrides.contextBudget !== undefined && !isPositive(overrides.contextBudget)) {
      warnings.push(`providers.${id}.contextBudget must be a positive number`);
    }
    if (overrides.maxPromptChars !== undefined && !isPositive(overrides.maxPromptChars)) {
      warnings.push(`providers.${id}.maxPromptChars must be a positive number`);
    }
    if (overrides.maxOutputTokens !== undefined && !isPositive(overrides.maxOutputTokens)) {
      warnings.push(`providers.${id}.maxOutputTokens must be a positive number`);
    }
    if (overrides.temperature !== undefined &&
        (!Number.isFinite(overrides.temperature) || overrides.temperature < 0 || overrides.temperature > 2)) {
      warnings.push(`providers.${id}.temperature must be between 0 and 2`);
    }
  }

  const chunking = config.chunking;
  if (chunking?.maxChunkSize !== undefined && !isPositive(chunking.maxChunkSize)) {
    warnings.push('chunking.maxChunkSize must be a positive number');
  }
  if (chunking?.overlap !== undefined) {
    if (!Number.isInteger(chunking.overlap) || chunking.overlap < 0) {
      warnings.push('chunking.overlap must be a non-negative integer');
    } else if (chunking.maxChunkSize !== undefined && chunking.overlap >= chunking.maxChunkSize) {
      warnings.push('chunking.overlap must be smaller than chunking.maxChunkSize');
    }
  }

  const dispatch = config.dispatch;
  if (dispatch?.maxRetries !== undefined &&
      (!Number.isInteger(dispatch.maxRetries) || dispatch.maxRetries < 0)) {
    warnings.push('dispatch.maxRetries must be a non-negative integer');
  }
  if (dispatch?.timeoutMs !== undefined && !isPositive(dispatch.timeoutMs)) {
    warnings.push('dispatch.timeoutMs must be a positive number');
  }

  if (config.maxDocumentBytes !== undefined && !isPositive(config.maxDocumentBytes)) {
    warnings.push('maxDocumentBytes must be a positive number');
  }

  return warnings;
}
