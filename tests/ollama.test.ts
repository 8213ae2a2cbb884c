// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OllamaProvider } from '../src/providers/ollama.js';
import {
  InvalidResponseError,
  ProviderUnavailableError,
  QueryCancelledError,
  RateLimitError,
} from '../src/errors.js';
import { composePrompt } from '../src/prompt/assembler.js';
import { testSettings } from './helpers/fake-provider.js';

const fetchMock = vi.fn();

const prompt = composePrompt({ system: 'Be brief.', question: 'Why is the sky blue?' }, 1000);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function ollama(baseUrl?: string): OllamaProvider {
  return new OllamaProvider(testSettings({ apiKey: undefined, baseUrl }));
}

describe('OllamaProvider', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('is configured without an API key', () => {
    expect(ollama().isConfigured()).toBe(true);
  });

  it('posts a non-streaming chat request to /api/chat', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      model: 'llama3.2',
      message: { role: 'assistant', content: ' Rayleigh scattering. ' },
      done: true,
      prompt_eval_count: 12,
      eval_count: 3,
    }));

    const response = await ollama('http://gpu-box:11434').send(prompt, 'llama3.2');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://gpu-box:11434/api/chat');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      model: 'llama3.2',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Why is the sky blue?' },
      ],
      stream: false,
      options: { temperature: 0.7, num_predict: 256 },
    });
    expect(response).toEqual({
      text: 'Rayleigh scattering.',
      provider: 'ollama',
      model: 'llama3.2',
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it('strips trailing slashes from the base URL', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: { content: 'ok' } }));

    await ollama('http://localhost:11434//').send(prompt, 'llama3.2');

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/chat');
  });

  it('falls back to the local default server', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: { content: 'ok' } }));

    const response = await ollama().send(prompt, 'llama3.2');

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/chat');
    expect(response.model).toBe('llama3.2');
    expect(response.usage).toBeUndefined();
  });

  it('maps a missing model to InvalidResponseError', async () => {
    fetchMock.mockResolvedValue(new Response('model "nope" not found', { status: 404 }));

    await expect(ollama().send(prompt, 'nope'))
      .rejects.toThrow('ollama returned 404: model "nope" not found');
  });

  it('maps 429 to RateLimitError', async () => {
    fetchMock.mockResolvedValue(new Response('slow down', { status: 429 }));
    await expect(ollama().send(prompt, 'llama3.2')).rejects.toThrow(RateLimitError);
  });

  it('maps 503 to ProviderUnavailableError', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 503, statusText: 'Service Unavailable' }));
    await expect(ollama().send(prompt, 'llama3.2'))
      .rejects.toThrow('ollama returned 503: Service Unavailable');
  });

  it('maps a refused connection to ProviderUnavailableError', async () => {
    fetchMock.mockRejectedValue(
      new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) })
    );
    await expect(ollama().send(prompt, 'llama3.2')).rejects.toThrow(ProviderUnavailableError);
  });

  it('rejects a body that is not JSON', async () => {
    fetchMock.mockResolvedValue(new Response('<html>proxy error</html>', { status: 200 }));
    await expect(ollama().send(prompt, 'llama3.2')).rejects.toThrow('Ollama returned invalid JSON');
  });

  it('rejects an error payload', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'out of memory' }));
    await expect(ollama().send(prompt, 'llama3.2')).rejects.toThrow('Ollama error: out of memory');
  });

  it('rejects an empty message', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: 'llama3.2', message: { role: 'assistant', content: '' } }));
    await expect(ollama().send(prompt, 'llama3.2')).rejects.toThrow(InvalidResponseError);
  });

  it('reports cancellation when the signal was aborted', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementation(async () => {
      controller.abort(new QueryCancelledError());
      throw new DOMException('This operation was aborted', 'AbortError');
    });

    await expect(ollama().send(prompt, 'llama3.2', { signal: controller.signal }))
      .rejects.toThrow(QueryCancelledError);
  });
});
