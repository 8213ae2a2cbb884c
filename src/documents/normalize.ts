// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { NormalizedText } from '../types.js';

/**
 * Normalize decoded text: drop a byte order mark, unify line endings,
 * strip control characters other than newline and tab, trim the ends.
 */
export function normalizeText(raw: string): NormalizedText {
  return raw
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim();
}
