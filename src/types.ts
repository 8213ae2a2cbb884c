// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

// Documents
/** Formats the document loader understands. */
export type DocumentFormat = 'text' | 'markdown' | 'pdf' | 'docx';

/**
 * Raw upload as received from the interface layer.
 * Lives only long enough to be normalized.
 */
export interface SourceDocument {
  readonly format: DocumentFormat;
  readonly bytes: Uint8Array;
  /** Original file name, used in log and error messages */
  readonly name?: string;
}

/**
 * Plain UTF-8 text derived from a document or pasted input.
 * No binary artifacts or format-specific markup.
 */
export type NormalizedText = string;

/**
 * A contiguous slice of normalized text.
 * @property {number} index - Position of the chunk in the sequence (0-based).
 * @property {number} start - Offset of the first character in the source text.
 * @property {number} end - Offset one past the last character.
 */
export interface Chunk {
  index: number;
  text: string;
  start: number;
  end: number;
}

// Queries
/** Answer formatting the user asked for. */
export type AnswerStyle = 'bullets' | 'numbered' | 'flashcards';

/** How much detail to put in an answer (1 = brief, 5 = exhaustive). */
export type DetailLevel = 1 | 2 | 3 | 4 | 5;

/**
 * A single question submitted from an interface.
 * Frozen by createQueryRequest().
 */
export interface QueryRequest {
  readonly question: string;
  readonly styles: readonly AnswerStyle[];
  readonly detailLevel: DetailLevel;
  readonly provider: string;
  /** Model to use; the provider's default model when omitted */
  readonly model?: string;
}

/**
 * Provider-independent prompt. Adapters translate it into their own
 * request schema.
 */
export interface NeutralPrompt {
  /** System instruction */
  system: string;
  /** Task instructions placed before the context (style, detail, grounding rules) */
  instructions: string;
  /** Heading for the context section, e.g. "Study Notes" */
  contextLabel: string;
  /** Concatenated chunk text; may be empty */
  context: string;
  question: string;
  /** Number of chunks that made it into the context */
  includedChunks: number;
  /** Number of chunks left out because of the budget */
  omittedChunks: number;
}

/**
 * Character limits for one provider.
 * @property {number} contextBudget - Maximum characters of document context.
 * @property {number} maxPromptChars - Hard limit for the whole prompt.
 */
export interface PromptBudget {
  contextBudget: number;
  maxPromptChars: number;
}

// Provider results
/**
 * Token usage information from a provider response.
 */
export interface TokenUsage {
  /** Number of tokens in the input/prompt */
  inputTokens: number;
  /** Number of tokens in the output/completion */
  outputTokens: number;
}

/**
 * Normalized provider answer, stripped of the provider's envelope.
 */
export interface ProviderResponse {
  text: string;
  provider: string;
  model: string;
  usage?: TokenUsage;
}
