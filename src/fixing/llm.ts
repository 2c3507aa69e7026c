import OpenAI from 'openai';
import pRetry, { AbortError } from 'p-retry';
import chalk from 'chalk';
import type { Config } from '../config.js';
import type { TokenStats } from './types.js';
import { withTimeout } from './util.js';
import { logDebug, logVerbose } from './logger.js';

export const REQUEST_TIMEOUT_MS = 120_000;

export function createOpenAIClient(config: Config): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    // Retries are handled by p-retry below
    maxRetries: 0,
    timeout: REQUEST_TIMEOUT_MS,
    ...(config.apiBaseUrl && { baseURL: config.apiBaseUrl }),
  });
}

function isPermanentFailure(error: unknown): boolean {
  return (
    error instanceof OpenAI.AuthenticationError ||
    error instanceof OpenAI.PermissionDeniedError ||
    error instanceof OpenAI.BadRequestError ||
    error instanceof OpenAI.NotFoundError
  );
}

async function completeOnce(params: {
  client: OpenAI;
  config: Config;
  systemPrompt: string;
  userPrompt: string;
  tokenStats: TokenStats;
  label: string;
}): Promise<string> {
  const { client, config, systemPrompt, userPrompt, tokenStats, label } =
    params;

  await logDebug(`${label}: Sending request to ${config.model}`);
  const requestStartTime = Date.now();

  // Aborted on timeout so a retry never overlaps the request it replaces
  const controller = new AbortController();
  let response: OpenAI.Chat.Completions.ChatCompletion;
  try {
    response = await withTimeout(
      client.chat.completions.create(
        {
          model: config.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: config.temperature,
          max_tokens: config.maxTokens,
        },
        { signal: controller.signal },
      ),
      REQUEST_TIMEOUT_MS,
      `Request timeout after ${REQUEST_TIMEOUT_MS / 1000} seconds for ${label}`,
      () => controller.abort(),
    );
  } catch (error) {
    if (isPermanentFailure(error)) {
      throw new AbortError(error instanceof Error ? error : String(error));
    }
    throw error;
  }

  const requestDurationMs = Date.now() - requestStartTime;
  const content = response.choices[0]?.message?.content?.trim() || '';
  await logDebug(
    `${label}: Received response (${content.length} chars) in ${(requestDurationMs / 1000).toFixed(2)}s`,
  );

  if (response.usage) {
    tokenStats.input += response.usage.prompt_tokens;
    tokenStats.output += response.usage.completion_tokens;
    await logDebug(
      `${label}: Token usage - Input: ${response.usage.prompt_tokens}, Output: ${response.usage.completion_tokens}`,
    );
  }

  await logVerbose(`${label}: Raw response:\n${content}`);

  if (!content) {
    throw new Error('Empty response from model');
  }
  return content;
}

/**
 * Sends one batch to the model and returns the raw reply text. Transient
 * failures are retried with exponential backoff; authentication and
 * request errors are not.
 */
export async function requestFixes(params: {
  client: OpenAI;
  config: Config;
  systemPrompt: string;
  userPrompt: string;
  tokenStats: TokenStats;
  label: string;
}): Promise<string> {
  const { config, label } = params;
  return await pRetry(() => completeOnce(params), {
    retries: config.retries,
    onFailedAttempt: async (error) => {
      if (error.retriesLeft === 0) return;
      const retryMsg = `Retry ${error.attemptNumber}/${config.retries + 1} for ${label}: ${error.message}`;
      console.log(chalk.yellow(`\n  ${retryMsg}`));
      await logDebug(retryMsg);
    },
    minTimeout: 1000,
    maxTimeout: 30000,
    factor: 2,
  });
}
