import { describe, it, expect, vi } from 'vitest';
import { getProviderConfig, parseConfig } from './config.js';

const ARGS = {
  batchSize: 10,
  maxTokens: 4000,
  temperature: 0,
  retries: 2,
  dryRun: false,
};

describe('getProviderConfig', () => {
  it('routes models to their provider', () => {
    expect(getProviderConfig('claude-sonnet-4-5-20250929')).toEqual({
      baseURL: 'https://api.anthropic.com/v1/',
      recommendedApiKeyEnv: 'ANTHROPIC_API_KEY',
    });
    expect(getProviderConfig('gemini-2.5-flash').recommendedApiKeyEnv).toBe(
      'GEMINI_API_KEY',
    );
    expect(getProviderConfig('gpt-4o')).toEqual({
      recommendedApiKeyEnv: 'OPENAI_API_KEY',
    });
  });
});

describe('parseConfig', () => {
  it('reads the key from the provider variable', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    expect(
      parseConfig({ ...ARGS, model: 'claude-sonnet-4-5-20250929' }),
    ).toEqual({
      apiKey: 'test-secret',
      apiBaseUrl: 'https://api.anthropic.com/v1/',
      model: 'claude-sonnet-4-5-20250929',
      ...ARGS,
    });
  });

  it('does not need a key for a dry run', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const config = parseConfig({ ...ARGS, model: 'gpt-4o', dryRun: true });
    expect(config.dryRun).toBe(true);
  });

  it('exits on an unknown model', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });
    expect(() => parseConfig({ ...ARGS, model: 'gpt-2' })).toThrow('exit');
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('exits when the key is missing', () => {
    vi.stubEnv('GEMINI_API_KEY', '');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });
    expect(() => parseConfig({ ...ARGS, model: 'gemini-2.5-pro' })).toThrow(
      'exit',
    );
    expect(error).toHaveBeenCalledWith(
      "❌ Error: GEMINI_API_KEY environment variable is required for model 'gemini-2.5-pro'",
    );
  });

  it('exits on an invalid batch size', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });
    expect(() =>
      parseConfig({ ...ARGS, model: 'gpt-4o', batchSize: 0 }),
    ).toThrow('exit');
  });
});
