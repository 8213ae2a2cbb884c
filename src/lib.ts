// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Library entry point.
 */

export * from './types.js';
export * from './errors.js';
export { PROVIDER_IDS, PROVIDER_DEFAULTS } from './constants.js';
export type { ProviderId } from './constants.js';
export { logger, LogLevel, parseLogLevel } from './logger.js';
export * from './config/index.js';
export * from './documents/index.js';
export * from './prompt/index.js';
export * from './providers/index.js';
export { ModelDispatcher } from './dispatcher.js';
export type { DispatchRequest, DispatchResult, DispatchState, DispatcherOptions } from './dispatcher.js';
export { Assistant } from './assistant.js';
export type {
  AssistantAnswer,
  AssistantOptions,
  AskAboutNotesInput,
  ChatInput,
  ExplainCodeInput,
  MatchJobInput,
  NotesSource,
  QuickQuestionInput,
} from './assistant.js';
export { QueryGate } from './query-gate.js';
export type { QueryOutcome } from './query-gate.js';
export * from './tabs.js';
