// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI program definition.
 *
 * createProgram() builds the commander program without side effects so it
 * can be driven from tests with an injected registry and output sink.
 */

import { Command, InvalidArgumentError } from 'commander';
import { Assistant, type AssistantAnswer } from '../assistant.js';
import { resolveConfig, type ResolvedConfig } from '../config/index.js';
import { PROVIDER_IDS } from '../constants.js';
import type { DispatcherOptions } from '../dispatcher.js';
import { DocumentLoader } from '../documents/loader.js';
import { readUtf8File } from '../documents/text.js';
import { ConfigurationError, DeskmateError, toUserMessage } from '../errors.js';
import { logger, parseLogLevel, LogLevel } from '../logger.js';
import { createQueryRequest, isAnswerStyle } from '../prompt/assembler.js';
import { createProviderRegistry, type ProviderRegistry } from '../providers/index.js';
import { QueryGate } from '../query-gate.js';
import { spinner } from '../spinner.js';
import { CHAT_TOPICS, QUICK_QUESTIONS, isChatTopic } from '../tabs.js';
import type { AnswerStyle } from '../types.js';
import { VERSION } from '../version.js';
import { formatAnswer, formatProviders, formatQuickQuestions } from './output-handlers.js';

/**
 * Process-level collaborators, replaceable in tests.
 */
export interface CliRuntime {
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Directory holding the global config.json */
  globalConfigDir?: string;
  createRegistry: (config: ResolvedConfig) => ProviderRegistry;
  dispatcherOptions?: DispatcherOptions;
  /** Where answers and listings are written */
  print: (text: string) => void;
}

interface GlobalOptions {
  provider?: string;
  model?: string;
  chunkSize?: number;
  overlap?: number;
  timeout?: number;
  maxRetries?: number;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

interface AskOptions {
  file?: string;
  text?: string;
  style?: string[];
  detail?: number;
  quick?: string;
}

/**
 * Everything an answering command needs once configuration is resolved.
 */
interface ActionContext {
  config: ResolvedConfig;
  assistant: Assistant;
  provider: string;
  model?: string;
  signal: AbortSignal;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseStyles(values: string[] | undefined): AnswerStyle[] | undefined {
  if (!values) return undefined;
  return values.map((value) => {
    if (!isAnswerStyle(value)) {
      throw new ConfigurationError(`Unknown answer style "${value}". Use bullets, numbered or flashcards.`);
    }
    return value;
  });
}

/**
 * Report a failure with the user-facing message for its kind.
 * The underlying message and stack are only shown at DEBUG level.
 */
function reportError(error: unknown): void {
  logger.error(toUserMessage(error), error instanceof Error ? error : undefined);
  if (error instanceof DeskmateError) {
    logger.debug(`${error.kind}: ${error.message}`);
  }
  process.exitCode = 1;
}

function configure(runtime: CliRuntime, options: GlobalOptions): ResolvedConfig {
  logger.setLevel(parseLogLevel(options));
  // Debug output would be overwritten by the spinner line
  if (logger.isLevelEnabled(LogLevel.DEBUG)) {
    spinner.setEnabled(false);
  }
  return resolveConfig(
    {
      provider: options.provider,
      chunkSize: options.chunkSize,
      overlap: options.overlap,
      timeoutMs: options.timeout,
      maxRetries: options.maxRetries,
    },
    { cwd: runtime.cwd, env: runtime.env, globalDir: runtime.globalConfigDir }
  );
}

/**
 * Run an answering command behind a QueryGate, so Ctrl+C cancels the
 * in-flight provider call instead of killing the process mid-write.
 */
async function runAnswer(
  runtime: CliRuntime,
  command: Command,
  action: (context: ActionContext) => Promise<AssistantAnswer>
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const gate = new QueryGate();
  const onInterrupt = (): void => {
    gate.cancel();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const config = configure(runtime, options);
    const registry = runtime.createRegistry(config);
    const assistant = new Assistant(config, registry, {
      dispatcherOptions: {
        ...runtime.dispatcherOptions,
        onRetry: (attempt, error, delayMs) => spinner.retrying(error.provider, attempt, delayMs),
      },
    });
    const provider = config.provider;
    const model = options.model;
    const adapter = registry.get(provider);
    if (adapter) {
      spinner.thinking(adapter.getDisplayName(), model ?? adapter.getDefaultModel());
    }

    const outcome = await gate.submit((signal) => action({ config, assistant, provider, model, signal }));

    switch (outcome.status) {
      case 'completed':
        spinner.succeed();
        runtime.print(formatAnswer(outcome.value, logger.isLevelEnabled(LogLevel.VERBOSE)));
        break;
      case 'failed':
        spinner.fail();
        reportError(outcome.error);
        break;
      case 'cancelled':
      case 'superseded':
        spinner.stop();
        logger.warn('Request cancelled.');
        process.exitCode = 130;
        break;
    }
  } catch (error) {
    spinner.fail();
    reportError(error);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Build the deskmate command-line program.
 */
export function createProgram(overrides: Partial<CliRuntime> = {}): Command {
  const runtime: CliRuntime = {
    env: process.env,
    cwd: process.cwd(),
    createRegistry: createProviderRegistry,
    print: (text) => console.log(text),
    ...overrides,
  };

  const program = new Command();

  program
    .name('deskmate')
    .description('Study notes Q&A, job matching and code explanation with your choice of LLM provider')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('-p, --provider <name>', `Provider to use (${PROVIDER_IDS.join(', ')})`)
    .option('-m, --model <name>', 'Model to use (default: the provider\'s default model)')
    .option('--chunk-size <chars>', 'Maximum chunk size in characters', parseInteger)
    .option('--overlap <chars>', 'Characters shared by consecutive chunks', parseInteger)
    .option('--timeout <ms>', 'Per-attempt provider timeout in milliseconds', parseInteger)
    .option('--max-retries <count>', 'Retries for transient provider failures', parseInteger)
    .option('--verbose', 'Show document and chunking details')
    .option('--debug', 'Show API, prompt budget and retry details')
    .option('--trace', 'Show full request/response payloads');

  program
    .command('ask')
    .description('Ask a question about your study notes')
    .argument('[question...]', 'The question to ask')
    .option('-f, --file <path>', 'Notes file (.txt, .md, .pdf, .docx)')
    .option('--text <notes>', 'Notes pasted as text')
    .option('-s, --style <styles...>', 'Answer style(s): bullets, numbered, flashcards')
    .option('-d, --detail <level>', 'Detail level from 1 (brief) to 5 (exhaustive)', parseInteger)
    .option('-q, --quick <id>', 'Ask a predefined question (see `deskmate quick`)')
    .action(async (words: string[], askOptions: AskOptions, command: Command) => {
      await runAnswer(runtime, command, async ({ assistant, provider, model, signal }) => {
        const notes = { filePath: askOptions.file, pastedText: askOptions.text };
        const styles = parseStyles(askOptions.style);
        if (askOptions.quick) {
          return assistant.askQuickQuestion({
            ...notes,
            questionId: askOptions.quick,
            provider,
            model,
            styles,
            detailLevel: askOptions.detail,
            signal,
          });
        }
        const request = createQueryRequest({
          question: words.join(' '),
          provider,
          model,
          styles,
          detailLevel: askOptions.detail,
        });
        return assistant.askAboutNotes({ ...notes, request, signal });
      });
    });

  program
    .command('match')
    .description('Match a candidate profile against a job description')
    .requiredOption('--job <file>', 'Job description file')
    .requiredOption('--resume <file>', 'Candidate profile / resume file')
    .action(async (matchOptions: { job: string; resume: string }, command: Command) => {
      await runAnswer(runtime, command, async ({ config, assistant, provider, model, signal }) => {
        const loader = new DocumentLoader({ maxDocumentBytes: config.maxDocumentBytes });
        const jobDescription = await loader.loadFile(matchOptions.job);
        const resume = await loader.loadFile(matchOptions.resume);
        return assistant.matchJob({ jobDescription, resume, provider, model, signal });
      });
    });

  program
    .command('explain')
    .description('Explain a source file')
    .argument('<file>', 'Source file to explain')
    .argument('[question...]', 'Specific question about the code')
    .action(async (file: string, words: string[], _options: object, command: Command) => {
      await runAnswer(runtime, command, async ({ config, assistant, provider, model, signal }) => {
        const code = await readUtf8File(file, config.maxDocumentBytes);
        return assistant.explainCode({ code, question: words.join(' '), provider, model, signal });
      });
    });

  program
    .command('chat')
    .description('Send a single message to the assistant')
    .argument('<message...>', 'Message to send')
    .option('-t, --topic <topic>', `Topic: ${CHAT_TOPICS.join(', ')}`, 'general')
    .action(async (words: string[], chatOptions: { topic: string }, command: Command) => {
      await runAnswer(runtime, command, async ({ assistant, provider, model, signal }) => {
        const topic = chatOptions.topic;
        if (!isChatTopic(topic)) {
          throw new ConfigurationError(`Unknown topic "${topic}". Use ${CHAT_TOPICS.join(', ')}.`);
        }
        return assistant.chat({ message: words.join(' '), topic, provider, model, signal });
      });
    });

  program
    .command('providers')
    .description('List providers and whether they are configured')
    .action((_options: object, command: Command) => {
      try {
        const config = configure(runtime, command.optsWithGlobals<GlobalOptions>());
        const registry = runtime.createRegistry(config);
        runtime.print(formatProviders(registry.list().map((provider) => ({
          name: provider.getName(),
          defaultModel: provider.getDefaultModel(),
          configured: provider.isConfigured(),
          isDefault: provider.getName() === config.provider,
        }))));
      } catch (error) {
        reportError(error);
      }
    });

  program
    .command('quick')
    .description('List the predefined study questions')
    .action(() => {
      runtime.print(formatQuickQuestions(QUICK_QUESTIONS));
    });

  return program;
}
