import os from 'os';
import path from 'path';
import { z } from 'zod';
import { LLMProvider, ProcessingMode } from '@pagelaunch/shared';

export interface AppConfig {
  port: number;
  apiSecret: string;
  processingMode: ProcessingMode;
  pagesSettleDelayMs: number;
  workDir: string;
  commandTimeoutMs?: number;
  github: {
    user: string;
    token: string;
    host: string;
    apiUrl: string;
    pagesDomain: string;
    authorName: string;
    authorEmail: string;
  };
  llm: {
    provider: LLMProvider;
    apiKey: string;
    model?: string;
    maxTokens?: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n- ${problems.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  API_SECRET: requiredString('API_SECRET'),
  PROCESSING_MODE: z.enum(['sync', 'background']).default('sync'),
  PAGES_SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(0),
  WORK_DIR: optionalString,
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  GITHUB_USER: requiredString('GITHUB_USER'),
  GITHUB_TOKEN: requiredString('GITHUB_TOKEN'),
  GITHUB_HOST: z.string().default('github.com'),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  GITHUB_PAGES_DOMAIN: z.string().min(1).default('github.io'),
  GIT_AUTHOR_NAME: optionalString,
  GIT_AUTHOR_EMAIL: optionalString,
  LLM_PROVIDER: z.enum(['gemini', 'claude']).default('gemini'),
  LLM_MODEL: optionalString,
  LLM_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  GEMINI_API_KEY: optionalString,
  CLAUDE_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
});

/**
 * Reads the service configuration from environment variables. Throws
 * `ConfigError` listing every missing or malformed value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.message.endsWith('is required') ? issue.message : `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const apiKey =
    vars.LLM_PROVIDER === 'gemini' ? vars.GEMINI_API_KEY : vars.CLAUDE_API_KEY || vars.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigError([
      vars.LLM_PROVIDER === 'gemini'
        ? 'GEMINI_API_KEY is required when LLM_PROVIDER is gemini'
        : 'CLAUDE_API_KEY or ANTHROPIC_API_KEY is required when LLM_PROVIDER is claude',
    ]);
  }

  return {
    port: vars.PORT,
    apiSecret: vars.API_SECRET,
    processingMode: vars.PROCESSING_MODE,
    pagesSettleDelayMs: vars.PAGES_SETTLE_DELAY_MS,
    workDir: vars.WORK_DIR || path.join(os.tmpdir(), 'pagelaunch'),
    commandTimeoutMs: vars.COMMAND_TIMEOUT_MS,
    github: {
      user: vars.GITHUB_USER,
      token: vars.GITHUB_TOKEN,
      host: vars.GITHUB_HOST,
      apiUrl: vars.GITHUB_API_URL.replace(/\/+$/, ''),
      pagesDomain: vars.GITHUB_PAGES_DOMAIN,
      authorName: vars.GIT_AUTHOR_NAME || vars.GITHUB_USER,
      authorEmail: vars.GIT_AUTHOR_EMAIL || `${vars.GITHUB_USER}@users.noreply.github.com`,
    },
    llm: {
      provider: vars.LLM_PROVIDER,
      apiKey,
      model: vars.LLM_MODEL,
      maxTokens: vars.LLM_MAX_TOKENS,
    },
  };
}
