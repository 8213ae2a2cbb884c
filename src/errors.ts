// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy shared by ingestion, prompt assembly and dispatch.
 *
 * Every failure path raises one of these so the interface layer can render a
 * message from a stable `kind` instead of a provider payload or stack trace.
 */

/**
 * Error categories for grouping kinds in output.
 */
export enum ErrorCategory {
  INGESTION = 'ingestion',
  ASSEMBLY = 'assembly',
  DISPATCH = 'dispatch',
  CONFIGURATION = 'configuration',
}

export type ErrorKind =
  | 'decode'
  | 'unsupported_format'
  | 'document_too_large'
  | 'document_read'
  | 'prompt_too_large'
  | 'empty_question'
  | 'auth'
  | 'rate_limit'
  | 'timeout'
  | 'provider_unavailable'
  | 'invalid_response'
  | 'unknown_provider'
  | 'dispatch'
  | 'cancelled'
  | 'configuration';

/**
 * Base class for all errors raised by the pipeline.
 */
export abstract class DeskmateError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly category: ErrorCategory;
  /** Whether the dispatcher may retry the failed call */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================
// Ingestion
// ============================================

export class DecodeError extends DeskmateError {
  readonly kind = 'decode';
  readonly category = ErrorCategory.INGESTION;
}

export class UnsupportedFormatError extends DeskmateError {
  readonly kind = 'unsupported_format';
  readonly category = ErrorCategory.INGESTION;

  constructor(public readonly extension: string) {
    super(`Unsupported document format: ${extension || '(no extension)'}`);
  }
}

export class DocumentTooLargeError extends DeskmateError {
  readonly kind = 'document_too_large';
  readonly category = ErrorCategory.INGESTION;

  constructor(public readonly limitBytes: number, public readonly actualBytes?: number) {
    super(
      actualBytes !== undefined
        ? `Document is ${actualBytes} bytes, limit is ${limitBytes}`
        : `Document exceeds the ${limitBytes} byte limit`
    );
  }
}

function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * The file system refused the read: missing file, a directory, no permission.
 */
export class DocumentReadError extends DeskmateError {
  readonly kind = 'document_read';
  readonly category = ErrorCategory.INGESTION;

  constructor(public readonly filePath: string, cause: unknown) {
    super(
      `Could not read ${filePath}: ${systemErrorCode(cause) ?? (cause instanceof Error ? cause.message : String(cause))}`,
      { cause }
    );
  }
}

// ============================================
// Assembly
// ============================================

export class PromptTooLargeError extends DeskmateError {
  readonly kind = 'prompt_too_large';
  readonly category = ErrorCategory.ASSEMBLY;

  constructor(public readonly size: number, public readonly limit: number) {
    super(`Question is ${size} characters, provider limit is ${limit}`);
  }
}

export class EmptyQuestionError extends DeskmateError {
  readonly kind = 'empty_question';
  readonly category = ErrorCategory.ASSEMBLY;

  constructor(message = 'Question is empty') {
    super(message);
  }
}

// ============================================
// Dispatch
// ============================================

/**
 * Failure reported by a provider adapter.
 */
export abstract class ProviderError extends DeskmateError {
  readonly category = ErrorCategory.DISPATCH;

  constructor(public readonly provider: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AuthError extends ProviderError {
  readonly kind = 'auth';
}

export class RateLimitError extends ProviderError {
  readonly kind = 'rate_limit';
  readonly retryable = true;
}

export class TimeoutError extends ProviderError {
  readonly kind = 'timeout';
  readonly retryable = true;
}

export class ProviderUnavailableError extends ProviderError {
  readonly kind = 'provider_unavailable';
  readonly retryable = true;
}

export class InvalidResponseError extends ProviderError {
  readonly kind = 'invalid_response';
}

export class UnknownProviderError extends DeskmateError {
  readonly kind = 'unknown_provider';
  readonly category = ErrorCategory.DISPATCH;

  constructor(public readonly provider: string, available: string[]) {
    super(`Unknown provider: ${provider}. Available: ${available.join(', ')}`);
  }
}

/**
 * Terminal failure after the dispatcher gave up retrying.
 * `cause` holds the last underlying error.
 */
export class DispatchError extends DeskmateError {
  readonly kind = 'dispatch';
  readonly category = ErrorCategory.DISPATCH;

  constructor(
    public readonly provider: string,
    public readonly attempts: number,
    public readonly lastError: ProviderError
  ) {
    super(`${provider} failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
  }
}

export class QueryCancelledError extends DeskmateError {
  readonly kind = 'cancelled';
  readonly category = ErrorCategory.DISPATCH;

  constructor(message = 'Query was cancelled') {
    super(message);
  }
}

// ============================================
// Configuration
// ============================================

export class ConfigurationError extends DeskmateError {
  readonly kind = 'configuration';
  readonly category = ErrorCategory.CONFIGURATION;
}

/**
 * Error-kind classifier used by the dispatcher's retry loop.
 */
export function isTransientError(error: unknown): error is ProviderError {
  return error instanceof ProviderError && error.retryable;
}

const USER_MESSAGES: Record<ErrorKind, string> = {
  decode: 'The file could not be read. Make sure it is a valid, UTF-8 encoded document.',
  unsupported_format: 'This file type is not supported. Upload a .txt, .md, .pdf or .docx file.',
  document_too_large: 'The document is too large. Try a smaller file or paste an excerpt.',
  document_read: 'The file could not be opened. Check the path and its permissions.',
  prompt_too_large: 'The question is too long for the selected model. Shorten it and try again.',
  empty_question: 'Please enter a question.',
  auth: 'The API key for the selected provider is missing or invalid.',
  rate_limit: 'The provider is rate limiting requests. Wait a moment and try again.',
  timeout: 'The provider took too long to respond. Try again.',
  provider_unavailable: 'The provider is temporarily unavailable. Try again later.',
  invalid_response: 'The provider returned an empty or malformed answer.',
  unknown_provider: 'The selected provider is not available.',
  dispatch: 'The provider could not be reached after several attempts. Try again later.',
  cancelled: 'The request was cancelled.',
  configuration: 'The configuration is invalid.',
};

/**
 * Map any error to the message shown to the user.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof DeskmateError) {
    return USER_MESSAGES[error.kind];
  }
  return 'Something went wrong while answering. Try again.';
}

/**
 * Stable kind for any error; `unexpected` when it is not one of ours.
 */
export function errorKindOf(error: unknown): ErrorKind | 'unexpected' {
  return error instanceof DeskmateError ? error.kind : 'unexpected';
}
