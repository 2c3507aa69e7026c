import { z } from 'zod';

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

export const SupportedModel = z.enum([
  'claude-sonnet-4-5-20250929',
  'claude-haiku-4-5-20251001',
  'gpt-4.1',
  'gpt-4o',
  'gpt-4o-mini',
  'gemini-2.5-flash',
  'gemini-2.5-pro',
]);

export type SupportedChatModel = z.infer<typeof SupportedModel>;

/**
 * USD per million tokens.
 */
export const MODEL_PRICING: Record<
  SupportedChatModel,
  { inputCostPerMillion: number; outputCostPerMillion: number }
> = {
  'claude-sonnet-4-5-20250929': {
    inputCostPerMillion: 3,
    outputCostPerMillion: 15,
  },
  'claude-haiku-4-5-20251001': {
    inputCostPerMillion: 1,
    outputCostPerMillion: 5,
  },
  'gpt-4.1': { inputCostPerMillion: 2, outputCostPerMillion: 8 },
  'gpt-4o': { inputCostPerMillion: 2.5, outputCostPerMillion: 10 },
  'gpt-4o-mini': { inputCostPerMillion: 0.15, outputCostPerMillion: 0.6 },
  'gemini-2.5-flash': { inputCostPerMillion: 0.3, outputCostPerMillion: 2.5 },
  'gemini-2.5-pro': { inputCostPerMillion: 1.25, outputCostPerMillion: 10 },
};

const Config = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  apiBaseUrl: z.string().optional(),
  model: SupportedModel,
  batchSize: z.number().int().positive(),
  dryRun: z.boolean(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  retries: z.number().int().min(0),
});

export type Config = z.infer<typeof Config>;

/**
 * Determines the provider endpoint and credential variable from the model name.
 * Every provider is reached through its OpenAI-compatible API.
 */
export function getProviderConfig(model: SupportedChatModel): {
  baseURL?: string;
  recommendedApiKeyEnv: string;
} {
  if (model.startsWith('claude-')) {
    return {
      baseURL: 'https://api.anthropic.com/v1/',
      recommendedApiKeyEnv: 'ANTHROPIC_API_KEY',
    };
  } else if (model.startsWith('gemini-')) {
    return {
      baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai',
      recommendedApiKeyEnv: 'GEMINI_API_KEY',
    };
  }
  return {
    recommendedApiKeyEnv: 'OPENAI_API_KEY',
  };
}

export function parseConfig(cliArgs: {
  model: string;
  batchSize: number;
  maxTokens: number;
  temperature: number;
  retries: number;
  dryRun: boolean;
}): Config {
  const { model: modelStr, dryRun } = cliArgs;

  const modelResult = SupportedModel.safeParse(modelStr);

  if (!modelResult.success) {
    console.error(`❌ Invalid model: ${modelStr}`);
    console.error(`Supported models: ${SupportedModel.options.join(', ')}`);
    process.exit(1);
  }

  const model = modelResult.data;
  const providerConfig = getProviderConfig(model);
  const apiKey = process.env[providerConfig.recommendedApiKeyEnv];

  // Dry runs never reach the API
  if (!dryRun && !apiKey) {
    console.error(
      `❌ Error: ${providerConfig.recommendedApiKeyEnv} environment variable is required for model '${model}'`,
    );
    console.error(
      `  Export it in your shell: export ${providerConfig.recommendedApiKeyEnv}='your-key-here'`,
    );
    console.error('Or use --dry-run to preview without an API key');
    process.exit(1);
  }

  const result = Config.safeParse({
    apiKey: apiKey || 'dummy-key-for-dry-run',
    apiBaseUrl: providerConfig.baseURL,
    model,
    batchSize: cliArgs.batchSize,
    dryRun,
    maxTokens: cliArgs.maxTokens,
    temperature: cliArgs.temperature,
    retries: cliArgs.retries,
  });

  if (!result.success) {
    console.error('❌ Invalid configuration:');
    console.error(z.prettifyError(result.error));
    process.exit(1);
  }

  return result.data;
}
