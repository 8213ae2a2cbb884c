// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Single ora spinner shown while a provider call is in flight.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.stop();
    }
  }

  /**
   * Start a new spinner, replacing any running one.
   */
  start(text: string): void {
    if (!this.enabled) return;
    this.spinner?.stop();
    this.spinner = ora({ text, color: 'cyan', spinner: 'dots' }).start();
  }

  update(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    }
  }

  succeed(text?: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }

  fail(text?: string): void {
    this.spinner?.fail(text);
    this.spinner = null;
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  // ============================================
  // Convenience methods
  // ============================================

  /**
   * Show the waiting spinner for a provider call.
   */
  thinking(provider: string, model: string): void {
    this.start(chalk.cyan(`Asking ${provider} (${model})...`));
  }

  /**
   * Note a scheduled retry on the running spinner.
   */
  retrying(provider: string, attempt: number, delayMs: number): void {
    this.update(chalk.yellow(`${provider} is busy, retry ${attempt} in ${(delayMs / 1000).toFixed(1)}s...`));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
