import { readFile } from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { AppConfig, RecognizerConfig, ServiceCredentials } from './types.js';

const configSchema = z.object({
  service: z
    .object({
      host: z.string().min(1).default('openspeech.bytedance.com'),
      path: z.string().startsWith('/').default('/api/v2/asr'),
      successCode: z.number().int().default(1000),
    })
    .default({}),
  session: z
    .object({
      segmentDurationMs: z.number().int().min(100).max(60_000).default(15_000),
      receiveTimeoutMs: z.number().int().min(1).default(10_000),
      connectTimeoutMs: z.number().int().min(1).default(10_000),
    })
    .default({}),
  audio: z
    .object({
      language: z.string().min(2).default('zh-CN'),
    })
    .default({}),
  archive: z
    .object({
      outputDir: z.string().min(1).optional(),
    })
    .default({}),
});

const credentialsSchema = z.object({
  ASR_APP_ID: z.string({ required_error: 'ASR_APP_ID is required' }).min(1, 'ASR_APP_ID is required'),
  ASR_CLUSTER: z.string({ required_error: 'ASR_CLUSTER is required' }).min(1, 'ASR_CLUSTER is required'),
  ASR_ACCESS_TOKEN: z.string({ required_error: 'ASR_ACCESS_TOKEN is required' }).min(1, 'ASR_ACCESS_TOKEN is required'),
});

let cachedConfig: AppConfig | null = null;

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = await readFile(configPath, 'utf-8');
  const parsed: AppConfig = configSchema.parse(JSON.parse(raw));
  cachedConfig = parsed;
  return parsed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}

/** Loads `.env` (a missing file is fine) on top of the process environment. */
export function loadEnvironment(envPath = path.resolve('.env')): void {
  const result = dotenv.config({ path: path.resolve(envPath), override: true });
  const code = result.error && 'code' in result.error ? result.error.code : undefined;
  if (result.error && code !== 'ENOENT') {
    throw result.error;
  }
}

export function readCredentials(env: NodeJS.ProcessEnv = process.env): ServiceCredentials {
  const parsed = credentialsSchema.safeParse(env);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.message).join(', ');
    throw new Error(`ASR credentials are incomplete: ${missing}. Set them in .env`);
  }
  return {
    appId: parsed.data.ASR_APP_ID,
    cluster: parsed.data.ASR_CLUSTER,
    accessToken: parsed.data.ASR_ACCESS_TOKEN,
  };
}

export function buildRecognizerConfig(config: AppConfig, credentials: ServiceCredentials): RecognizerConfig {
  return Object.freeze({
    ...credentials,
    url: `wss://${config.service.host}${config.service.path}`,
    successCode: config.service.successCode,
    segmentDurationMs: config.session.segmentDurationMs,
    receiveTimeoutMs: config.session.receiveTimeoutMs,
    connectTimeoutMs: config.session.connectTimeoutMs,
    language: config.audio.language,
    outputDir: config.archive.outputDir,
  });
}
