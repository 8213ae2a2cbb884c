// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => {
  const openaiCreate = vi.fn();
  const anthropicCreate = vi.fn();
  const generateContent = vi.fn();
  const getGenerativeModel = vi.fn<(...args: unknown[]) => { generateContent: typeof generateContent }>(() => ({ generateContent }));
  return {
    openaiCreate,
    anthropicCreate,
    generateContent,
    getGenerativeModel,
    OpenAI: vi.fn().mockImplementation(function () {
      return { chat: { completions: { create: openaiCreate } } };
    }),
    Anthropic: vi.fn().mockImplementation(function () {
      return { messages: { create: anthropicCreate } };
    }),
    GoogleGenerativeAI: vi.fn().mockImplementation(function () {
      return { getGenerativeModel };
    }),
  };
});

vi.mock('openai', () => ({ default: mocks.OpenAI }));
vi.mock('@anthropic-ai/sdk', () => ({ default: mocks.Anthropic }));
vi.mock('@google/generative-ai', () => ({ GoogleGenerativeAI: mocks.GoogleGenerativeAI }));

import { OpenAIProvider } from '../src/providers/openai.js';
import { AnthropicProvider } from '../src/providers/anthropic.js';
import { GoogleProvider } from '../src/providers/google.js';
import {
  AuthError,
  InvalidResponseError,
  ProviderUnavailableError,
  QueryCancelledError,
  RateLimitError,
  TimeoutError,
} from '../src/errors.js';
import { composePrompt } from '../src/prompt/assembler.js';
import { testSettings } from './helpers/fake-provider.js';

const prompt = composePrompt(
  { system: 'Be brief.', instructions: 'Task.', contextLabel: 'Study Notes', context: 'Cells.', question: 'What?' },
  1000
);
const USER_MESSAGE = 'Task.\n\nStudy Notes:\nCells.\n\nQuestion:\nWhat?';

function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

function namedError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

const FAILURES: Array<[string, () => Error, new (...args: never[]) => Error]> = [
  ['401', () => httpError(401, 'Incorrect API key provided'), AuthError],
  ['403', () => httpError(403), AuthError],
  ['429', () => httpError(429, 'Rate limit reached'), RateLimitError],
  ['500', () => httpError(500), ProviderUnavailableError],
  ['503', () => httpError(503, 'Overloaded'), ProviderUnavailableError],
  ['400', () => httpError(400, 'Invalid model'), InvalidResponseError],
  ['connection timeout', () => namedError('APIConnectionTimeoutError', 'Request timed out.'), TimeoutError],
  ['connection failure', () => namedError('APIConnectionError', 'Connection error.'), ProviderUnavailableError],
];

describe('OpenAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends system and user messages with generation settings', async () => {
    mocks.openaiCreate.mockResolvedValue({
      model: 'gpt-4o-mini-2024-07-18',
      choices: [{ message: { role: 'assistant', content: '  - Cells are units of life.  ' } }],
      usage: { prompt_tokens: 42, completion_tokens: 7, total_tokens: 49 },
    });
    const controller = new AbortController();
    const provider = new OpenAIProvider(testSettings({ defaultModel: 'gpt-4o-mini' }));

    const response = await provider.send(prompt, 'gpt-4o-mini', { signal: controller.signal });

    expect(mocks.OpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: undefined, maxRetries: 0 });
    expect(mocks.openaiCreate).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: USER_MESSAGE },
        ],
        temperature: 0.7,
        max_tokens: 256,
      },
      { signal: controller.signal }
    );
    expect(response).toEqual({
      text: '- Cells are units of life.',
      provider: 'openai',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { inputTokens: 42, outputTokens: 7 },
    });
  });

  it('fails with AuthError before any network call when the key is missing', async () => {
    const provider = new OpenAIProvider(testSettings({ apiKey: undefined }));

    await expect(provider.send(prompt, 'gpt-4o-mini')).rejects.toThrow(AuthError);
    expect(mocks.OpenAI).not.toHaveBeenCalled();
    expect(provider.isConfigured()).toBe(false);
  });

  it('reuses one client across calls', async () => {
    mocks.openaiCreate.mockResolvedValue({ model: 'm', choices: [{ message: { content: 'ok' } }] });
    const provider = new OpenAIProvider(testSettings());

    await provider.send(prompt, 'm');
    await provider.send(prompt, 'm');

    expect(mocks.OpenAI).toHaveBeenCalledTimes(1);
  });

  it.each(FAILURES)('maps %s failures', async (_label, makeError, ErrorClass) => {
    mocks.openaiCreate.mockRejectedValue(makeError());
    const provider = new OpenAIProvider(testSettings());

    await expect(provider.send(prompt, 'gpt-4o-mini')).rejects.toThrow(ErrorClass);
  });

  it('fails with InvalidResponseError on an empty completion', async () => {
    mocks.openaiCreate.mockResolvedValue({ model: 'm', choices: [{ message: { content: '   ' } }] });
    const provider = new OpenAIProvider(testSettings());

    await expect(provider.send(prompt, 'm')).rejects.toThrow(InvalidResponseError);
  });

  it('reports the abort reason when the call is cancelled', async () => {
    const controller = new AbortController();
    mocks.openaiCreate.mockImplementation(async () => {
      controller.abort(new QueryCancelledError());
      throw namedError('APIUserAbortError', 'Request was aborted.');
    });
    const provider = new OpenAIProvider(testSettings());

    await expect(provider.send(prompt, 'm', { signal: controller.signal })).rejects.toThrow(QueryCancelledError);
  });
});

describe('AnthropicProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('puts the system prompt in the top-level system field', async () => {
    mocks.anthropicCreate.mockResolvedValue({
      model: 'claude-opus-4-1-20250805',
      content: [
        { type: 'text', text: 'Part one. ' },
        { type: 'text', text: 'Part two.' },
      ],
      usage: { input_tokens: 30, output_tokens: 5 },
    });
    const provider = new AnthropicProvider(testSettings());

    const response = await provider.send(prompt, 'claude-opus-4-1-20250805');

    expect(mocks.Anthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: undefined, maxRetries: 0 });
    expect(mocks.anthropicCreate).toHaveBeenCalledWith(
      {
        model: 'claude-opus-4-1-20250805',
        max_tokens: 256,
        temperature: 0.7,
        system: 'Be brief.',
        messages: [{ role: 'user', content: USER_MESSAGE }],
      },
      { signal: undefined }
    );
    expect(response).toEqual({
      text: 'Part one. Part two.',
      provider: 'anthropic',
      model: 'claude-opus-4-1-20250805',
      usage: { inputTokens: 30, outputTokens: 5 },
    });
  });

  it('omits the system field when there is no system prompt', async () => {
    mocks.anthropicCreate.mockResolvedValue({ model: 'c', content: [{ type: 'text', text: 'Hi' }] });
    const provider = new AnthropicProvider(testSettings());

    await provider.send({ ...prompt, system: '' }, 'c');

    expect(mocks.anthropicCreate.mock.calls[0][0]).not.toHaveProperty('system');
  });

  it('fails with AuthError when the key is missing', async () => {
    const provider = new AnthropicProvider(testSettings({ apiKey: undefined }));
    await expect(provider.send(prompt, 'c')).rejects.toThrow('ANTHROPIC_API_KEY is not set');
    expect(mocks.Anthropic).not.toHaveBeenCalled();
  });

  it.each(FAILURES)('maps %s failures', async (_label, makeError, ErrorClass) => {
    mocks.anthropicCreate.mockRejectedValue(makeError());
    const provider = new AnthropicProvider(testSettings());

    await expect(provider.send(prompt, 'c')).rejects.toThrow(ErrorClass);
  });

  it('fails with InvalidResponseError when there is no text block', async () => {
    mocks.anthropicCreate.mockResolvedValue({ model: 'c', content: [{ type: 'tool_use', id: 't', name: 'x', input: {} }] });
    const provider = new AnthropicProvider(testSettings());

    await expect(provider.send(prompt, 'c')).rejects.toThrow(InvalidResponseError);
  });
});

describe('GoogleProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends the system instruction and user content', async () => {
    mocks.generateContent.mockResolvedValue({
      response: {
        text: () => ' Gemini says hi ',
        usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 4, totalTokenCount: 14 },
      },
    });
    const controller = new AbortController();
    const provider = new GoogleProvider(testSettings());

    const response = await provider.send(prompt, 'gemini-1.5-pro', { signal: controller.signal });

    expect(mocks.GoogleGenerativeAI).toHaveBeenCalledWith('test-secret');
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith(
      {
        model: 'gemini-1.5-pro',
        systemInstruction: 'Be brief.',
        generationConfig: { temperature: 0.7, maxOutputTokens: 256 },
      },
      undefined
    );
    expect(mocks.generateContent).toHaveBeenCalledWith(
      { contents: [{ role: 'user', parts: [{ text: USER_MESSAGE }] }] },
      { signal: controller.signal }
    );
    expect(response).toEqual({
      text: 'Gemini says hi',
      provider: 'google',
      model: 'gemini-1.5-pro',
      usage: { inputTokens: 10, outputTokens: 4 },
    });
  });

  it('passes a custom base URL to the model', async () => {
    mocks.generateContent.mockResolvedValue({ response: { text: () => 'ok' } });
    const provider = new GoogleProvider(testSettings({ baseUrl: 'http://localhost:8080' }));

    await provider.send(prompt, 'gemini-1.5-pro');

    expect(mocks.getGenerativeModel.mock.calls[0][1]).toEqual({ baseUrl: 'http://localhost:8080' });
  });

  it('fails with AuthError when the key is missing', async () => {
    const provider = new GoogleProvider(testSettings({ apiKey: undefined }));
    await expect(provider.send(prompt, 'gemini-1.5-pro')).rejects.toThrow(AuthError);
    expect(mocks.GoogleGenerativeAI).not.toHaveBeenCalled();
  });

  it('maps fetch errors by status', async () => {
    mocks.generateContent.mockRejectedValue(
      Object.assign(namedError('GoogleGenerativeAIFetchError', 'Resource has been exhausted'), { status: 429 })
    );
    const provider = new GoogleProvider(testSettings());

    await expect(provider.send(prompt, 'gemini-1.5-pro')).rejects.toThrow(RateLimitError);
  });

  it('maps a rejected API key to AuthError', async () => {
    mocks.generateContent.mockRejectedValue(
      Object.assign(namedError('GoogleGenerativeAIFetchError', 'API key not valid. Please pass a valid API key.'), {
        status: 400,
        errorDetails: [{ reason: 'API_KEY_INVALID' }],
      })
    );
    const provider = new GoogleProvider(testSettings());

    const error = await provider.send(prompt, 'gemini-1.5-pro').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ kind: 'auth', provider: 'google' });
  });

  it('keeps other 400 responses as InvalidResponseError', async () => {
    mocks.generateContent.mockRejectedValue(
      Object.assign(namedError('GoogleGenerativeAIFetchError', 'Invalid JSON payload'), { status: 400 })
    );
    const provider = new GoogleProvider(testSettings());

    await expect(provider.send(prompt, 'gemini-1.5-pro')).rejects.toThrow(InvalidResponseError);
  });

  it('fails with InvalidResponseError when the candidate was blocked', async () => {
    mocks.generateContent.mockResolvedValue({
      response: {
        text: () => {
          throw new Error('Candidate was blocked due to SAFETY');
        },
      },
    });
    const provider = new GoogleProvider(testSettings());

    await expect(provider.send(prompt, 'gemini-1.5-pro'))
      .rejects.toThrow('Gemini returned no usable text: Candidate was blocked due to SAFETY');
  });
});
