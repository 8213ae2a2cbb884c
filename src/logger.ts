// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for debug output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - document loading and chunking summaries */
  VERBOSE = 1,
  /** Debug - API details, prompt budgets, retries */
  DEBUG = 2,
  /** Trace - full prompt and response payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.level >= LogLevel.TRACE) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a loaded document at VERBOSE level.
   */
  documentLoaded(name: string, format: string, characters: number, duration: number): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.dim(
        `[Document] ${name} (${format}): ${characters.toLocaleString()} chars, ${duration.toFixed(2)}s`
      ));
    }
  }

  /**
   * Log chunking results at VERBOSE level.
   */
  chunked(chunkCount: number, maxChunkSize: number, overlap: number): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.dim(`[Chunker] ${chunkCount} chunks (max ${maxChunkSize}, overlap ${overlap})`));
    }
  }

  /**
   * Log prompt assembly at DEBUG level.
   */
  promptAssembled(included: number, omitted: number, contextChars: number, budget: number): void {
    if (this.level >= LogLevel.DEBUG) {
      const omittedStr = omitted > 0 ? `, ${omitted} omitted` : '';
      console.log(chalk.dim(
        `[Prompt] ${included} chunks included${omittedStr}, ` +
        `${contextChars.toLocaleString()}/${budget.toLocaleString()} context chars`
      ));
    }
  }

  /**
   * Log API request at DEBUG level.
   */
  apiRequest(provider: string, model: string, promptChars: number, attempt: number): void {
    if (this.level >= LogLevel.DEBUG) {
      const attemptStr = attempt > 1 ? `, attempt ${attempt}` : '';
      console.log(chalk.dim(`[API] Sending to ${provider}/${model} (${promptChars.toLocaleString()} chars${attemptStr})...`));
    }
  }

  /**
   * Log API response at DEBUG level.
   */
  apiResponse(provider: string, outputChars: number, duration: number, outputTokens?: number): void {
    if (this.level >= LogLevel.DEBUG) {
      let details = `${outputChars.toLocaleString()} chars`;
      if (outputTokens !== undefined) {
        details += `, ${outputTokens} tokens`;
      }
      details += `, ${duration.toFixed(2)}s`;
      console.log(chalk.dim(`[API] Response from ${provider}: ${details}`));
    }
  }

  /**
   * Log a scheduled retry at DEBUG level.
   */
  retry(provider: string, attempt: number, kind: string, delayMs: number): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.yellow(chalk.dim(`[API] ${provider} ${kind}, retry ${attempt} in ${delayMs}ms`)));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    // Replace control characters and escape sequences that could mess up the terminal
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n') // Show newlines as \n
      .replace(/\t/g, '\\t'); // Show tabs as \t
  }

  /**
   * Log the full outgoing prompt at TRACE level.
   */
  apiRequestFull(provider: string, model: string, system: string, userMessage: string): void {
    if (this.level >= LogLevel.TRACE) {
      console.log(chalk.gray('\n' + '='.repeat(60)));
      console.log(chalk.gray('[API Request]'));
      console.log(chalk.gray('='.repeat(60)));
      console.log(chalk.gray(`  provider: ${provider}`));
      console.log(chalk.gray(`  model: ${model}`));
      const truncatedSystem = system.length > 200 ? system.slice(0, 200) + '...' : system;
      console.log(chalk.gray(`  system: "${this.sanitize(truncatedSystem)}"`));
      const truncatedUser = userMessage.length > 500 ? userMessage.slice(0, 500) + '...' : userMessage;
      console.log(chalk.gray(`  user: "${this.sanitize(truncatedUser)}"`));
      console.log(chalk.gray('='.repeat(60) + '\n'));
    }
  }

  /**
   * Log the full response text at TRACE level.
   */
  apiResponseFull(provider: string, text: string): void {
    if (this.level >= LogLevel.TRACE) {
      const truncated = text.length > 300 ? text.slice(0, 300) + '...' : text;
      console.log(chalk.gray(`[API Response] ${provider}: "${this.sanitize(truncated)}"`));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
