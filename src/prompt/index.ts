// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

export {
  ANSWER_STYLES,
  DEFAULT_STYLES,
  DEFAULT_DETAIL_LEVEL,
  NOTES_LABEL,
  assemblePrompt,
  buildInstructions,
  composePrompt,
  createQueryRequest,
  isAnswerStyle,
  isDetailLevel,
  promptSize,
  renderUserMessage,
  selectChunks,
} from './assembler.js';
export type { AssembleOptions, ChunkSelection, PromptParts, QueryRequestInput } from './assembler.js';
