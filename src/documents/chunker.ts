// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Text Chunker
 *
 * Splits normalized text into bounded, ordered chunks, cutting at paragraph
 * or sentence boundaries when one falls inside the size budget.
 */

import { CHUNKING_CONFIG } from '../constants.js';
import { ConfigurationError } from '../errors.js';
import type { Chunk, NormalizedText } from '../types.js';

/**
 * Configuration for the chunker.
 */
export interface ChunkerConfig {
  /** Maximum chunk size in characters */
  maxChunkSize: number;
  /** Characters shared by consecutive chunks (0 = chunks tile the text exactly) */
  overlap: number;
}

/**
 * Default chunker configuration.
 */
export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  maxChunkSize: CHUNKING_CONFIG.MAX_CHUNK_SIZE,
  overlap: CHUNKING_CONFIG.OVERLAP,
};

/** Sentence end: terminal punctuation, optional closing quote/bracket, then whitespace */
const SENTENCE_END = /[.!?]["')\]]*\s/g;

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/**
 * Move `index` back by one when it falls between the halves of a surrogate pair.
 */
function alignToCodePoint(text: string, index: number): number {
  return isLowSurrogate(text.charCodeAt(index)) && isHighSurrogate(text.charCodeAt(index - 1)) ? index - 1 : index;
}

/**
 * Splits text into chunks no longer than `maxChunkSize`.
 * Output depends only on the input text and the configuration.
 */
export class TextChunker {
  private config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };

    const { maxChunkSize, overlap } = this.config;
    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
      throw new ConfigurationError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
      throw new ConfigurationError(
        `overlap must be an integer in [0, ${maxChunkSize}), got ${overlap}`
      );
    }
  }

  getConfig(): ChunkerConfig {
    return { ...this.config };
  }

  /**
   * Split text into ordered chunks. Empty text yields no chunks.
   */
  chunk(text: NormalizedText): Chunk[] {
    const { maxChunkSize, overlap } = this.config;
    const chunks: Chunk[] = [];
    let start = 0;

    while (start < text.length) {
      const limit = start + maxChunkSize;
      const end = limit >= text.length ? text.length : this.findCut(text, start, limit);

      chunks.push({ index: chunks.length, text: text.slice(start, end), start, end });
      if (end >= text.length) break;

      // Step back for overlap, but always make progress
      const next = alignToCodePoint(text, end - overlap);
      start = next > start ? next : end;
    }

    return chunks;
  }

  /**
   * Find where to end a chunk that starts at `start` and may not reach past `limit`.
   * Boundary characters stay with the chunk they end.
   */
  private findCut(text: string, start: number, limit: number): number {
    const window = text.slice(start, limit);

    const paragraph = window.lastIndexOf('\n\n');
    if (paragraph >= 0) {
      return start + paragraph + 2;
    }

    let sentenceCut = -1;
    SENTENCE_END.lastIndex = 0;
    let match;
    while ((match = SENTENCE_END.exec(window)) !== null) {
      sentenceCut = match.index + match[0].length;
    }
    if (sentenceCut > 0) {
      return start + sentenceCut;
    }

    const line = window.lastIndexOf('\n');
    if (line >= 0) {
      return start + line + 1;
    }

    // No boundary within budget: hard cut, never inside a surrogate pair
    const cut = alignToCodePoint(text, limit);
    return cut > start ? cut : limit;
  }
}
