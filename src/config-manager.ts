import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

export const CONFIG_KEYS = ['model', 'ankiConnectUrl', 'prompt'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

const PersistentConfig = z.object({
  model: z.string().optional(),
  ankiConnectUrl: z.url().optional(),
  prompt: z.string().optional(),
});

export type PersistentConfig = z.infer<typeof PersistentConfig>;

function getConfigDir(): string {
  return (
    process.env.CARD_FIXER_CONFIG_DIR ||
    path.join(os.homedir(), '.config', 'card-fixer')
  );
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof (error as { code?: unknown }).code === 'string'
  );
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

export async function readConfigFile(): Promise<PersistentConfig> {
  let content: string;
  try {
    content = await fs.readFile(getConfigPath(), 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const result = PersistentConfig.safeParse(JSON.parse(content) as unknown);
  if (!result.success) {
    throw new Error(
      `Invalid config file ${getConfigPath()}:\n${z.prettifyError(result.error)}`,
    );
  }
  return result.data;
}

export async function writeConfigFile(config: PersistentConfig): Promise<void> {
  const result = PersistentConfig.safeParse(config);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${z.prettifyError(result.error)}`);
  }
  const validated = result.data;
  await fs.mkdir(getConfigDir(), { recursive: true });
  await fs.writeFile(
    getConfigPath(),
    JSON.stringify(validated, null, 2),
    'utf-8',
  );
}

/**
 * Points AnkiConnect requests at the configured URL unless the environment
 * already names one.
 */
export function applyAnkiConnectUrl(config: PersistentConfig): void {
  if (config.ankiConnectUrl && !process.env.ANKI_CONNECT_URL) {
    process.env.ANKI_CONNECT_URL = config.ankiConnectUrl;
  }
}
