// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach } from 'vitest';
import ora from 'ora';
import { spinner } from '../src/spinner.js';

const mockSpinner = vi.hoisted(() => ({
  start: vi.fn().mockReturnThis(),
  stop: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  fail: vi.fn().mockReturnThis(),
  text: '',
}));

// Mock ora module
vi.mock('ora', () => ({
  default: vi.fn(() => mockSpinner),
}));

describe('SpinnerManager', () => {
  beforeEach(() => {
    // Reset spinner state before each test
    spinner.setEnabled(true);
    spinner.stop();
    vi.clearAllMocks();
    mockSpinner.text = '';
  });

  describe('setEnabled', () => {
    it('starts again once re-enabled', () => {
      spinner.setEnabled(false);
      spinner.setEnabled(true);
      spinner.start('Working...');
      expect(ora).toHaveBeenCalledTimes(1);
    });

    it('stops a running spinner when disabled', () => {
      spinner.start('Working...');
      spinner.setEnabled(false);
      expect(mockSpinner.stop).toHaveBeenCalledTimes(1);
    });

    it('does not start when disabled', () => {
      spinner.setEnabled(false);
      spinner.start('Working...');
      expect(ora).not.toHaveBeenCalled();
    });
  });

  describe('start', () => {
    it('starts spinner with text', () => {
      spinner.start('Loading...');
      expect(ora).toHaveBeenCalledWith({ text: 'Loading...', color: 'cyan', spinner: 'dots' });
      expect(mockSpinner.start).toHaveBeenCalledTimes(1);
    });

    it('replaces running spinner with new one', () => {
      spinner.start('First...');
      spinner.start('Second...');
      expect(mockSpinner.stop).toHaveBeenCalledTimes(1);
      expect(ora).toHaveBeenCalledTimes(2);
    });
  });

  describe('stop methods', () => {
    it('succeed stops spinner with success', () => {
      spinner.start('Working...');
      spinner.succeed('Done!');
      expect(mockSpinner.succeed).toHaveBeenCalledWith('Done!');
    });

    it('fail stops spinner with error', () => {
      spinner.start('Working...');
      spinner.fail('Error!');
      expect(mockSpinner.fail).toHaveBeenCalledWith('Error!');
    });

    it('handles stop when no spinner running', () => {
      spinner.stop();
      spinner.succeed('Done');
      expect(mockSpinner.stop).not.toHaveBeenCalled();
      expect(mockSpinner.succeed).not.toHaveBeenCalled();
    });
  });

  describe('convenience methods', () => {
    it('thinking names the provider and model', () => {
      spinner.thinking('OpenAI', 'gpt-4o-mini');
      expect(ora).toHaveBeenCalledWith({ text: 'Asking OpenAI (gpt-4o-mini)...', color: 'cyan', spinner: 'dots' });
    });

    it('retrying updates the running spinner', () => {
      spinner.thinking('Anthropic', 'claude-opus-4-1-20250805');
      spinner.retrying('Anthropic', 2, 1500);
      expect(mockSpinner.text).toBe('Anthropic is busy, retry 2 in 1.5s...');
    });

    it('update is ignored when no spinner is running', () => {
      spinner.update('Text');
      expect(mockSpinner.text).toBe('');
    });
  });
});
