// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Prompt Assembler
 *
 * Builds a provider-neutral prompt from chunks, a question and the answer
 * style/detail options, keeping the context inside a character budget.
 */

import { ConfigurationError, EmptyQuestionError, PromptTooLargeError } from '../errors.js';
import { logger } from '../logger.js';
import { TAB_SYSTEM_PROMPTS } from '../tabs.js';
import type {
  AnswerStyle,
  Chunk,
  DetailLevel,
  NeutralPrompt,
  PromptBudget,
  QueryRequest,
} from '../types.js';

export const ANSWER_STYLES: readonly AnswerStyle[] = ['bullets', 'numbered', 'flashcards'];

export const DEFAULT_STYLES: readonly AnswerStyle[] = ['bullets'];
export const DEFAULT_DETAIL_LEVEL: DetailLevel = 3;

/** Heading used for document context in the Q&A tab */
export const NOTES_LABEL = 'Study Notes';

const STYLE_INSTRUCTIONS: Record<AnswerStyle, string> = {
  bullets: 'Format the answer as concise bullet points.',
  numbered: 'Format the answer as a numbered list.',
  flashcards: "Format the answer as flashcards, one 'Q:' line followed by an 'A:' line per card.",
};

const DETAIL_INSTRUCTIONS: Record<DetailLevel, string> = {
  1: 'Keep it very brief.',
  2: 'Keep it short.',
  3: 'Use a moderate amount of detail.',
  4: 'Be thorough.',
  5: 'Be exhaustive and include examples.',
};

const GROUNDED_PREAMBLE =
  'Using the study notes below, answer the question. ' +
  'Cite key concepts from the notes, avoid fabricating content, and keep it well-structured.';

const UNGROUNDED_PREAMBLE =
  'No study notes were provided. Answer the question from general knowledge and keep it well-structured.';

const OMITTED_PREAMBLE =
  'The study notes were too long to include. Answer the question from general knowledge and keep it well-structured.';

export function isAnswerStyle(value: string): value is AnswerStyle {
  return ANSWER_STYLES.some((style) => style === value);
}

export function isDetailLevel(value: number): value is DetailLevel {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

/**
 * Input for createQueryRequest(). Styles and detail fall back to the defaults.
 */
export interface QueryRequestInput {
  question: string;
  provider: string;
  model?: string;
  styles?: readonly AnswerStyle[];
  detailLevel?: number;
}

/**
 * Build an immutable QueryRequest.
 */
export function createQueryRequest(input: QueryRequestInput): QueryRequest {
  const detailLevel = input.detailLevel ?? DEFAULT_DETAIL_LEVEL;
  if (!isDetailLevel(detailLevel)) {
    throw new ConfigurationError(`Detail level must be an integer from 1 to 5, got ${detailLevel}`);
  }

  // Keep the first occurrence of each style, in the order given
  const styles = input.styles && input.styles.length > 0
    ? Object.freeze([...new Set(input.styles)])
    : DEFAULT_STYLES;

  return Object.freeze({
    question: input.question.trim(),
    styles,
    detailLevel,
    provider: input.provider,
    model: input.model,
  });
}

/**
 * Build the instruction block for a request.
 *
 * `notesOmitted` marks a request whose notes were all dropped for size, so
 * the model is not told that no notes exist.
 */
export function buildInstructions(
  styles: readonly AnswerStyle[],
  detailLevel: DetailLevel,
  hasContext: boolean,
  notesOmitted = false
): string {
  const lines = [hasContext ? GROUNDED_PREAMBLE : notesOmitted ? OMITTED_PREAMBLE : UNGROUNDED_PREAMBLE];
  for (const style of styles) {
    lines.push(STYLE_INSTRUCTIONS[style]);
  }
  lines.push(DETAIL_INSTRUCTIONS[detailLevel]);
  return lines.join(' ');
}

// ============================================
// Context selection
// ============================================

export interface ChunkSelection {
  context: string;
  included: number;
  omitted: number;
}

/**
 * Take the longest prefix of chunks whose text fits in `budget` characters.
 * Overlapping chunks contribute only the part not already covered, so the
 * context is an exact span of the source. Chunks are never truncated.
 */
export function selectChunks(chunks: readonly Chunk[], budget: number): ChunkSelection {
  let context = '';
  let included = 0;
  let coveredEnd = -1;

  for (const chunk of chunks) {
    const piece = coveredEnd > chunk.start ? chunk.text.slice(coveredEnd - chunk.start) : chunk.text;
    if (context.length + piece.length > budget) break;
    context += piece;
    coveredEnd = chunk.end;
    included++;
  }

  return { context, included, omitted: chunks.length - included };
}

// ============================================
// Rendering
// ============================================

/**
 * Render the single user turn sent to providers.
 */
export function renderUserMessage(prompt: Pick<NeutralPrompt, 'instructions' | 'contextLabel' | 'context' | 'question'>): string {
  const sections: string[] = [];
  if (prompt.instructions) {
    sections.push(prompt.instructions);
  }
  if (prompt.context) {
    sections.push(prompt.contextLabel ? `${prompt.contextLabel}:\n${prompt.context}` : prompt.context);
  }
  sections.push(sections.length > 0 ? `Question:\n${prompt.question}` : prompt.question);
  return sections.join('\n\n');
}

/**
 * Total characters a provider receives for this prompt.
 */
export function promptSize(prompt: NeutralPrompt): number {
  return prompt.system.length + renderUserMessage(prompt).length;
}

/**
 * Characters the context label adds around non-empty context.
 */
function contextOverhead(label: string): number {
  // "\n\n" section separator, plus "<label>:\n" when labelled
  return label ? label.length + 4 : 2;
}

export interface AssembleOptions {
  /** System instruction; the study-notes prompt by default */
  system?: string;
  /** Heading for the context section */
  contextLabel?: string;
}

/**
 * Assemble a NeutralPrompt for a Q&A request.
 *
 * The context never exceeds `budget.contextBudget`, and is shrunk further so
 * the whole prompt stays within `budget.maxPromptChars`. With no chunks, or
 * when every chunk is too large, the prompt carries the question alone.
 */
export function assemblePrompt(
  chunks: readonly Chunk[],
  request: QueryRequest,
  budget: PromptBudget,
  options: AssembleOptions = {}
): NeutralPrompt {
  const question = request.question.trim();
  if (!question) {
    throw new EmptyQuestionError();
  }
  if (question.length > budget.maxPromptChars) {
    throw new PromptTooLargeError(question.length, budget.maxPromptChars);
  }

  const system = options.system ?? TAB_SYSTEM_PROMPTS.studyNotes;
  const contextLabel = options.contextLabel ?? NOTES_LABEL;

  // Size the fixed parts with the grounded instructions, which are what we send when context is present
  const fixedSize = system.length + renderUserMessage({
    instructions: buildInstructions(request.styles, request.detailLevel, true),
    contextLabel,
    context: '',
    question,
  }).length;
  const available = budget.maxPromptChars - fixedSize - contextOverhead(contextLabel);
  const contextBudget = Math.max(0, Math.min(budget.contextBudget, available));

  const selection = selectChunks(chunks, contextBudget);
  logger.promptAssembled(selection.included, selection.omitted, selection.context.length, contextBudget);

  return {
    system,
    instructions: buildInstructions(
      request.styles,
      request.detailLevel,
      selection.context.length > 0,
      selection.omitted > 0
    ),
    contextLabel,
    context: selection.context,
    question,
    includedChunks: selection.included,
    omittedChunks: selection.omitted,
  };
}

/**
 * Parts of a prompt built outside the Q&A flow (job match, code explainer, chat).
 */
export interface PromptParts {
  system: string;
  instructions?: string;
  contextLabel?: string;
  context?: string;
  question: string;
}

/**
 * Build a NeutralPrompt from fixed parts, enforcing the provider's hard limit.
 */
export function composePrompt(parts: PromptParts, maxPromptChars: number): NeutralPrompt {
  const question = parts.question.trim();
  if (!question) {
    throw new EmptyQuestionError();
  }

  const context = parts.context ?? '';
  const prompt: NeutralPrompt = {
    system: parts.system,
    instructions: parts.instructions ?? '',
    contextLabel: parts.contextLabel ?? '',
    context,
    question,
    includedChunks: context ? 1 : 0,
    omittedChunks: 0,
  };

  const size = promptSize(prompt);
  if (size > maxPromptChars) {
    throw new PromptTooLargeError(size, maxPromptChars);
  }
  return prompt;
}
