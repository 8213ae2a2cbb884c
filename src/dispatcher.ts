// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Model Dispatcher
 *
 * Routes a prompt to the selected provider adapter, bounds each attempt with
 * a timeout, and retries transient failures with exponential backoff.
 *
 * Per request: pending -> in_flight -> succeeded | failed
 */

import { DISPATCH_CONFIG } from './constants.js';
import {
  DispatchError,
  QueryCancelledError,
  TimeoutError,
  isTransientError,
  type ProviderError,
} from './errors.js';
import { logger } from './logger.js';
import { promptSize, renderUserMessage } from './prompt/assembler.js';
import type { BaseProvider } from './providers/base.js';
import type { ProviderRegistry } from './providers/index.js';
import { calculateDelay, sleep as defaultSleep } from './providers/retry.js';
import type { DispatchSettings } from './config/types.js';
import type { NeutralPrompt, ProviderResponse } from './types.js';

export type DispatchState = 'pending' | 'in_flight' | 'succeeded' | 'failed';

export interface DispatchRequest {
  provider: string;
  /** Provider's default model when omitted */
  model?: string;
  prompt: NeutralPrompt;
  /** Aborting cancels the in-flight attempt and any pending retry */
  signal?: AbortSignal;
}

export interface DispatchResult {
  response: ProviderResponse;
  /** Number of adapter calls made, including the successful one */
  attempts: number;
}

export interface DispatcherOptions extends Partial<DispatchSettings> {
  /** Replaces the backoff wait (tests pass a no-op) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Source of jitter in [0, 1) */
  random?: () => number;
  /** Called before each backoff wait */
  onRetry?: (attempt: number, error: ProviderError, delayMs: number) => void;
  onStateChange?: (state: DispatchState) => void;
}

const DEFAULT_SETTINGS: DispatchSettings = {
  maxRetries: DISPATCH_CONFIG.MAX_RETRIES,
  initialDelayMs: DISPATCH_CONFIG.INITIAL_DELAY_MS,
  maxDelayMs: DISPATCH_CONFIG.MAX_DELAY_MS,
  backoffMultiplier: DISPATCH_CONFIG.BACKOFF_MULTIPLIER,
  jitter: DISPATCH_CONFIG.JITTER,
  timeoutMs: DISPATCH_CONFIG.TIMEOUT_MS,
};

export class ModelDispatcher {
  private settings: DispatchSettings;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private random: () => number;
  private onRetry?: DispatcherOptions['onRetry'];
  private onStateChange?: DispatcherOptions['onStateChange'];

  constructor(private registry: ProviderRegistry, options: DispatcherOptions = {}) {
    const { sleep, random, onRetry, onStateChange } = options;
    this.settings = {
      maxRetries: options.maxRetries ?? DEFAULT_SETTINGS.maxRetries,
      initialDelayMs: options.initialDelayMs ?? DEFAULT_SETTINGS.initialDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_SETTINGS.maxDelayMs,
      backoffMultiplier: options.backoffMultiplier ?? DEFAULT_SETTINGS.backoffMultiplier,
      jitter: options.jitter ?? DEFAULT_SETTINGS.jitter,
      timeoutMs: options.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs,
    };
    this.sleep = sleep ?? defaultSleep;
    this.random = random ?? Math.random;
    this.onRetry = onRetry;
    this.onStateChange = onStateChange;
  }

  getSettings(): DispatchSettings {
    return { ...this.settings };
  }

  /**
   * Send a prompt to the requested provider.
   *
   * @throws UnknownProviderError before any call when the provider is not registered
   * @throws DispatchError when every attempt failed with a transient error
   * @throws QueryCancelledError when the request's signal is aborted
   * Other errors (auth, invalid response) propagate unchanged after one attempt.
   */
  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    this.setState(request.provider, 'pending');
    try {
      const provider = this.registry.resolve(request.provider);
      const model = request.model || provider.getDefaultModel();
      this.setState(request.provider, 'in_flight');

      const result = await this.runWithRetries(provider, model, request);
      this.setState(request.provider, 'succeeded');
      return result;
    } catch (error) {
      this.setState(request.provider, 'failed');
      throw error;
    }
  }

  private setState(provider: string, state: DispatchState): void {
    logger.trace(`dispatch ${provider}: ${state}`);
    this.onStateChange?.(state);
  }

  private async runWithRetries(
    provider: BaseProvider,
    model: string,
    request: DispatchRequest
  ): Promise<DispatchResult> {
    const { maxRetries } = this.settings;
    const name = provider.getName();

    for (let attempt = 0; ; attempt++) {
      if (request.signal?.aborted) {
        throw new QueryCancelledError();
      }

      try {
        const response = await this.attempt(provider, model, request, attempt + 1);
        return { response, attempts: attempt + 1 };
      } catch (error) {
        if (!isTransientError(error)) {
          throw error;
        }
        if (attempt >= maxRetries) {
          throw new DispatchError(name, attempt + 1, error);
        }

        const delayMs = calculateDelay(attempt, this.settings, this.random);
        logger.retry(name, attempt + 1, error.kind, delayMs);
        this.onRetry?.(attempt + 1, error, delayMs);

        try {
          await this.sleep(delayMs, request.signal);
        } catch {
          throw new QueryCancelledError();
        }
      }
    }
  }

  /**
   * One adapter call, aborted after `timeoutMs` or when the caller aborts.
   * Racing the abort means an adapter that ignores its signal still times out.
   */
  private async attempt(
    provider: BaseProvider,
    model: string,
    request: DispatchRequest,
    attemptNumber: number
  ): Promise<ProviderResponse> {
    const name = provider.getName();
    const { timeoutMs } = this.settings;
    const controller = new AbortController();

    const onCallerAbort = (): void => controller.abort(new QueryCancelledError());
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new TimeoutError(name, `${name} did not respond within ${timeoutMs}ms`)),
      timeoutMs
    );
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    logger.apiRequest(name, model, promptSize(request.prompt), attemptNumber);
    logger.apiRequestFull(name, model, request.prompt.system, renderUserMessage(request.prompt));
    const startTime = Date.now();

    try {
      const response = await Promise.race([
        provider.send(request.prompt, model, { signal: controller.signal }),
        aborted,
      ]);
      logger.apiResponse(name, response.text.length, (Date.now() - startTime) / 1000, response.usage?.outputTokens);
      logger.apiResponseFull(name, response.text);
      return response;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
