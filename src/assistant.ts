// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Assistant
 *
 * Per-tab operations. Each one runs the pipeline
 * load -> chunk -> assemble -> dispatch sequentially for a single request.
 */

import { DocumentLoader } from './documents/loader.js';
import { TextChunker } from './documents/chunker.js';
import { ModelDispatcher, type DispatcherOptions } from './dispatcher.js';
import { ConfigurationError, EmptyQuestionError } from './errors.js';
import { logger } from './logger.js';
import { assemblePrompt, composePrompt, createQueryRequest, selectChunks } from './prompt/assembler.js';
import type { ProviderRegistry } from './providers/index.js';
import {
  CODE_EXPLAIN_TASK,
  JOB_MATCH_TASK,
  TAB_NAMES,
  TAB_SYSTEM_PROMPTS,
  getQuickQuestion,
  type ChatTopic,
  type TabId,
} from './tabs.js';
import type { ResolvedConfig } from './config/types.js';
import type {
  AnswerStyle,
  NeutralPrompt,
  NormalizedText,
  QueryRequest,
  SourceDocument,
  TokenUsage,
} from './types.js';

/**
 * Answer returned to the interface layer.
 */
export interface AssistantAnswer {
  text: string;
  provider: string;
  model: string;
  /** Adapter calls made, including retries */
  attempts: number;
  /** Chunks of context that fit in the prompt */
  includedChunks: number;
  omittedChunks: number;
  usage?: TokenUsage;
}

/** Where the study notes come from. At most one is used, in this order. */
export interface NotesSource {
  document?: SourceDocument;
  filePath?: string;
  pastedText?: string;
}

export interface AskAboutNotesInput extends NotesSource {
  request: QueryRequest;
  signal?: AbortSignal;
}

export interface QuickQuestionInput extends NotesSource {
  questionId: string;
  provider: string;
  model?: string;
  styles?: readonly AnswerStyle[];
  detailLevel?: number;
  signal?: AbortSignal;
}

export interface MatchJobInput {
  jobDescription: string;
  resume: string;
  provider: string;
  model?: string;
  signal?: AbortSignal;
}

export interface ExplainCodeInput {
  code: string;
  question?: string;
  provider: string;
  model?: string;
  signal?: AbortSignal;
}

export interface ChatInput {
  message: string;
  topic?: ChatTopic;
  provider: string;
  model?: string;
  signal?: AbortSignal;
}

export interface AssistantOptions {
  loader?: DocumentLoader;
  dispatcher?: ModelDispatcher;
  /** Used when no dispatcher is given */
  dispatcherOptions?: DispatcherOptions;
}

const MATCH_QUESTION = 'How well does this candidate match the job?';
const DEFAULT_CODE_QUESTION = 'What does this code do?';

export class Assistant {
  private readonly loader: DocumentLoader;
  private readonly dispatcher: ModelDispatcher;

  constructor(
    private readonly config: ResolvedConfig,
    private readonly registry: ProviderRegistry,
    options: AssistantOptions = {}
  ) {
    this.loader = options.loader ?? new DocumentLoader({ maxDocumentBytes: config.maxDocumentBytes });
    this.dispatcher = options.dispatcher ?? new ModelDispatcher(registry, {
      ...config.dispatch,
      ...options.dispatcherOptions,
    });
  }

  /**
   * Study-notes Q&A. Without notes the question is sent with empty context.
   */
  async askAboutNotes(input: AskAboutNotesInput): Promise<AssistantAnswer> {
    const { request } = input;
    // Resolve first so an unknown provider fails before any document work
    const provider = this.registry.resolve(request.provider);

    const notes = await this.loadNotes(input);
    const chunks = this.createChunker().chunk(notes);
    logger.chunked(chunks.length, this.config.chunking.maxChunkSize, this.config.chunking.overlap);

    const prompt = assemblePrompt(chunks, request, provider.getBudget());
    return this.send('studyNotes', prompt, request.provider, request.model, input.signal);
  }

  /**
   * Ask one of the predefined study questions about the notes.
   */
  async askQuickQuestion(input: QuickQuestionInput): Promise<AssistantAnswer> {
    const quick = getQuickQuestion(input.questionId);
    if (!quick) {
      throw new ConfigurationError(`Unknown quick question: ${input.questionId}`);
    }
    const request = createQueryRequest({
      question: quick.prompt,
      provider: input.provider,
      model: input.model,
      styles: input.styles,
      detailLevel: input.detailLevel,
    });
    return this.askAboutNotes({ ...input, request });
  }

  /**
   * Compare a job description with a candidate profile. Each side gets half
   * of the provider's context budget.
   */
  async matchJob(input: MatchJobInput): Promise<AssistantAnswer> {
    const provider = this.registry.resolve(input.provider);
    const jobDescription = this.loader.fromPastedText(input.jobDescription);
    const resume = this.loader.fromPastedText(input.resume);
    if (!jobDescription || !resume) {
      throw new EmptyQuestionError('Both a job description and a candidate profile are required');
    }

    const { contextBudget, maxPromptChars } = provider.getBudget();
    const half = Math.floor(contextBudget / 2);
    const chunker = this.createChunker();
    const job = selectChunks(chunker.chunk(jobDescription), half);
    const candidate = selectChunks(chunker.chunk(resume), half);

    const prompt = composePrompt(
      {
        system: TAB_SYSTEM_PROMPTS.jobMatch,
        instructions: JOB_MATCH_TASK,
        context: `Job Description:\n${job.context}\n\nCandidate Profile:\n${candidate.context}`,
        question: MATCH_QUESTION,
      },
      maxPromptChars
    );
    prompt.includedChunks = job.included + candidate.included;
    prompt.omittedChunks = job.omitted + candidate.omitted;

    return this.send('jobMatch', prompt, input.provider, input.model, input.signal);
  }

  /**
   * Explain a piece of code, optionally answering a specific question about it.
   */
  async explainCode(input: ExplainCodeInput): Promise<AssistantAnswer> {
    const provider = this.registry.resolve(input.provider);
    const code = this.loader.fromPastedText(input.code);
    if (!code) {
      throw new EmptyQuestionError('No code to explain');
    }

    const { contextBudget, maxPromptChars } = provider.getBudget();
    const selection = selectChunks(this.createChunker().chunk(code), contextBudget);

    const prompt = composePrompt(
      {
        system: TAB_SYSTEM_PROMPTS.codeExplainer,
        instructions: CODE_EXPLAIN_TASK,
        contextLabel: 'Code',
        context: selection.context,
        question: input.question?.trim() || DEFAULT_CODE_QUESTION,
      },
      maxPromptChars
    );
    prompt.includedChunks = selection.included;
    prompt.omittedChunks = selection.omitted;

    return this.send('codeExplainer', prompt, input.provider, input.model, input.signal);
  }

  /**
   * Free-form single message on one of the chat topics.
   */
  async chat(input: ChatInput): Promise<AssistantAnswer> {
    const provider = this.registry.resolve(input.provider);
    const topic = input.topic ?? 'general';
    const prompt = composePrompt(
      { system: TAB_SYSTEM_PROMPTS[topic], question: input.message },
      provider.getBudget().maxPromptChars
    );
    return this.send(topic, prompt, input.provider, input.model, input.signal);
  }

  private createChunker(): TextChunker {
    return new TextChunker(this.config.chunking);
  }

  private async loadNotes(source: NotesSource): Promise<NormalizedText> {
    if (source.document) {
      return this.loader.loadDocument(source.document);
    }
    if (source.filePath) {
      return this.loader.loadFile(source.filePath);
    }
    if (source.pastedText !== undefined) {
      return this.loader.fromPastedText(source.pastedText);
    }
    return '';
  }

  private async send(
    tab: TabId,
    prompt: NeutralPrompt,
    provider: string,
    model: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<AssistantAnswer> {
    logger.verbose(`[Tab] ${TAB_NAMES[tab]}`);
    const { response, attempts } = await this.dispatcher.dispatch({ provider, model, prompt, signal });
    return {
      text: response.text,
      provider: response.provider,
      model: response.model,
      attempts,
      includedChunks: prompt.includedChunks,
      omittedChunks: prompt.omittedChunks,
      usage: response.usage,
    };
  }
}
