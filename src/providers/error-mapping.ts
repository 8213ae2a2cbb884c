// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Maps SDK and HTTP failures into the shared error kinds.
 *
 * Errors are classified by shape (HTTP `status`, error `name`, socket `code`)
 * rather than by SDK class, so every client is handled the same way.
 */

import {
  AuthError,
  DeskmateError,
  InvalidResponseError,
  ProviderUnavailableError,
  QueryCancelledError,
  RateLimitError,
  TimeoutError,
  type ProviderError,
} from '../errors.js';

const TIMEOUT_NAMES = new Set(['APIConnectionTimeoutError', 'TimeoutError', 'ConnectTimeoutError']);
const CONNECTION_NAMES = new Set(['APIConnectionError', 'FetchError', 'GoogleGenerativeAIFetchError']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function readStatus(error: unknown): number | undefined {
  const status = readProperty(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

function readCode(error: unknown): string | undefined {
  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Gemini rejects a bad key with 400 and an `API_KEY_INVALID` reason.
 */
function isRejectedKey(error: unknown): boolean {
  const details = readProperty(error, 'errorDetails');
  if (Array.isArray(details) && details.some((detail) => readProperty(detail, 'reason') === 'API_KEY_INVALID')) {
    return true;
  }
  return describe(error).includes('API key not valid');
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map an HTTP status to a provider error.
 */
export function errorFromStatus(
  provider: string,
  status: number,
  detail: string,
  cause?: unknown
): ProviderError {
  const message = `${provider} returned ${status}: ${detail}`;
  if (status === 401 || status === 403) return new AuthError(provider, message, { cause });
  if (status === 429) return new RateLimitError(provider, message, { cause });
  if (status === 408 || status === 504) return new TimeoutError(provider, message, { cause });
  if (status >= 500) return new ProviderUnavailableError(provider, message, { cause });
  return new InvalidResponseError(provider, message, { cause });
}

/**
 * Convert anything thrown by a provider call into a DeskmateError.
 *
 * When `signal` has been aborted the abort reason wins: the dispatcher
 * aborts with a TimeoutError on timeout, callers abort to cancel.
 */
export function mapProviderError(provider: string, error: unknown, signal?: AbortSignal): DeskmateError {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof DeskmateError ? reason : new QueryCancelledError();
  }
  if (error instanceof DeskmateError) {
    return error;
  }

  const status = readStatus(error);
  if (status === 400 && isRejectedKey(error)) {
    return new AuthError(provider, `${provider} rejected the API key: ${describe(error)}`, { cause: error });
  }
  if (status !== undefined) {
    return errorFromStatus(provider, status, describe(error), error);
  }

  const name = error instanceof Error ? error.name : '';
  if (TIMEOUT_NAMES.has(name)) {
    return new TimeoutError(provider, `${provider} timed out: ${describe(error)}`, { cause: error });
  }

  const code = readCode(error);
  if (
    CONNECTION_NAMES.has(name) ||
    (code !== undefined && CONNECTION_CODES.has(code)) ||
    (error instanceof TypeError && error.message === 'fetch failed')
  ) {
    return new ProviderUnavailableError(provider, `Could not reach ${provider}: ${describe(error)}`, { cause: error });
  }

  // Unclassified failures during a network call are treated as transient
  return new ProviderUnavailableError(provider, `${provider} request failed: ${describe(error)}`, { cause: error });
}
