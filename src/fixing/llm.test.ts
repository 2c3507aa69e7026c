import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import type { Config } from '../config.js';
import { REQUEST_TIMEOUT_MS, requestFixes } from './llm.js';
import type { TokenStats } from './types.js';

const CONFIG: Config = {
  apiKey: 'test-secret',
  apiBaseUrl: 'http://llm.test/v1',
  model: 'gpt-4o-mini',
  batchSize: 10,
  dryRun: false,
  maxTokens: 4000,
  temperature: 0,
  retries: 0,
};

function completion(content: string): Response {
  return new Response(
    JSON.stringify({
      id: 'chatcmpl-test',
      object: 'chat.completion',
      created: 0,
      model: 'gpt-4o-mini',
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          finish_reason: 'stop',
        },
      ],
      usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 },
    }),
    { status: 200, headers: { 'content-type': 'application/json' } },
  );
}

function failure(status: number): Response {
  return new Response(JSON.stringify({ error: { message: 'boom' } }), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function createClient(fetchMock: typeof fetch): OpenAI {
  return new OpenAI({
    apiKey: CONFIG.apiKey,
    baseURL: CONFIG.apiBaseUrl,
    maxRetries: 0,
    fetch: fetchMock,
  });
}

describe('requestFixes', () => {
  let tokenStats: TokenStats;

  beforeEach(() => {
    tokenStats = { input: 0, output: 0 };
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('sends the style guide and batch and returns the reply text', async () => {
    const fetchMock = vi.fn<typeof fetch>(() =>
      Promise.resolve(completion('  {"processed_cards": []}\n')),
    );

    const reply = await requestFixes({
      client: createClient(fetchMock),
      config: CONFIG,
      systemPrompt: 'style guide',
      userPrompt: 'cards',
      tokenStats,
      label: 'batch 1/1',
    });

    expect(reply).toBe('{"processed_cards": []}');
    expect(tokenStats).toEqual({ input: 120, output: 30 });
    expect(String(fetchMock.mock.calls[0][0])).toBe(
      'http://llm.test/v1/chat/completions',
    );
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'style guide' },
        { role: 'user', content: 'cards' },
      ],
      temperature: 0,
      max_tokens: 4000,
    });
  });

  it('retries server errors', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(failure(500))
      .mockResolvedValueOnce(completion('{"processed_cards": []}'));

    const reply = await requestFixes({
      client: createClient(fetchMock),
      config: { ...CONFIG, retries: 1 },
      systemPrompt: 'style guide',
      userPrompt: 'cards',
      tokenStats,
      label: 'batch 1/1',
    });

    expect(reply).toBe('{"processed_cards": []}');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry authentication errors', async () => {
    const fetchMock = vi.fn<typeof fetch>(() =>
      Promise.resolve(failure(401)),
    );

    await expect(
      requestFixes({
        client: createClient(fetchMock),
        config: { ...CONFIG, retries: 2 },
        systemPrompt: 'style guide',
        userPrompt: 'cards',
        tokenStats,
        label: 'batch 1/1',
      }),
    ).rejects.toBeInstanceOf(OpenAI.AuthenticationError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails on an empty reply', async () => {
    const fetchMock = vi.fn<typeof fetch>(() =>
      Promise.resolve(completion('   ')),
    );

    await expect(
      requestFixes({
        client: createClient(fetchMock),
        config: CONFIG,
        systemPrompt: 'style guide',
        userPrompt: 'cards',
        tokenStats,
        label: 'batch 1/1',
      }),
    ).rejects.toThrow('Empty response from model');
  });

  it('aborts a timed-out request before retrying it', async () => {
    vi.useFakeTimers();
    try {
      let inFlight = 0;
      let maxInFlight = 0;
      const fetchMock = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            init?.signal?.addEventListener('abort', () => {
              inFlight--;
              reject(new DOMException('aborted', 'AbortError'));
            });
          }),
      );

      const outcome = expect(
        requestFixes({
          client: createClient(fetchMock),
          config: { ...CONFIG, retries: 1 },
          systemPrompt: 'style guide',
          userPrompt: 'cards',
          tokenStats,
          label: 'batch 1/1',
        }),
      ).rejects.toThrow('Request timeout after 120 seconds for batch 1/1');
      await vi.advanceTimersByTimeAsync(2 * REQUEST_TIMEOUT_MS + 5000);
      await outcome;

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(maxInFlight).toBe(1);
      expect(inFlight).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });
});
