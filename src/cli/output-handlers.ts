// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Output Handlers for CLI Commands
 *
 * Formatting of answers, provider listings and quick questions for display.
 */

import chalk from 'chalk';
import type { AssistantAnswer } from '../assistant.js';
import type { QuickQuestion } from '../tabs.js';

/**
 * Row shown by `deskmate providers`.
 */
export interface ProviderRow {
  name: string;
  defaultModel: string;
  configured: boolean;
  isDefault: boolean;
}

/**
 * Notice shown when part of the document did not fit in the prompt.
 */
export function formatOmittedNotice(omittedChunks: number): string | null {
  if (omittedChunks <= 0) return null;
  const sections = omittedChunks === 1 ? '1 section' : `${omittedChunks} sections`;
  return `Note: ${sections} of the document did not fit in the prompt and ${omittedChunks === 1 ? 'was' : 'were'} left out.`;
}

/**
 * Format an answer, with provider details when `showDetails` is set.
 */
export function formatAnswer(answer: AssistantAnswer, showDetails: boolean): string {
  const lines = [answer.text];

  const notice = formatOmittedNotice(answer.omittedChunks);
  if (notice) {
    lines.push('', chalk.yellow(notice));
  }

  if (showDetails) {
    let details = `${answer.provider}/${answer.model}, ${answer.attempts} ${answer.attempts === 1 ? 'attempt' : 'attempts'}`;
    if (answer.usage) {
      details += `, ${answer.usage.inputTokens} in / ${answer.usage.outputTokens} out tokens`;
    }
    lines.push('', chalk.dim(details));
  }

  return lines.join('\n');
}

/**
 * Format the provider listing.
 */
export function formatProviders(rows: ProviderRow[]): string {
  const width = Math.max(...rows.map((row) => row.name.length));
  return rows
    .map((row) => {
      const marker = row.isDefault ? '*' : ' ';
      const status = row.configured ? chalk.green('ready') : chalk.yellow('no API key');
      return `${marker} ${row.name.padEnd(width)}  ${row.defaultModel}  ${status}`;
    })
    .join('\n');
}

/**
 * Format the quick question list, grouped by category.
 */
export function formatQuickQuestions(questions: readonly QuickQuestion[]): string {
  const titles: Record<QuickQuestion['category'], string> = {
    summary: 'Summary & Overview',
    studyTools: 'Study Tools',
    analysis: 'Analysis & Understanding',
  };

  const lines: string[] = [];
  for (const category of ['summary', 'studyTools', 'analysis'] as const) {
    const inCategory = questions.filter((question) => question.category === category);
    if (inCategory.length === 0) continue;
    if (lines.length > 0) lines.push('');
    lines.push(chalk.bold(titles[category]));
    for (const question of inCategory) {
      lines.push(`  ${question.id.padEnd(15)} ${question.prompt}`);
    }
  }
  return lines.join('\n');
}
