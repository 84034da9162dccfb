/**
 * Configuration Module
 *
 * Loads and validates environment variables.
 */

import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://open.feishu.cn/open-apis';

export interface Config {
  feishu: {
    appId: string;
    appSecret: string;
    baseUrl: string;
  };
  cache: {
    tokenTtlMs: number;
    userTtlMs: number;
    groupTtlMs: number;
    userCacheSize: number;
  };
  http: {
    timeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
  };
  log: {
    level: 'debug' | 'info' | 'warn' | 'error';
  };
}

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

// Environment schema validation
const envSchema = z.object({
  FEISHU_APP_ID: z.string().default(''),
  FEISHU_APP_SECRET: z.string().default(''),
  FEISHU_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((val) => val.replace(/\/+$/, '')),
  FEISHU_TOKEN_TTL_MS: positiveInt('3600000'),
  FEISHU_USER_TTL_MS: positiveInt('86400000'),
  FEISHU_GROUP_TTL_MS: positiveInt('300000'),
  FEISHU_USER_CACHE_SIZE: positiveInt('32'),
  FEISHU_TIMEOUT_MS: positiveInt('30000'),
  FEISHU_RETRY_ATTEMPTS: positiveInt('3'),
  FEISHU_RETRY_DELAY_MS: positiveInt('1000'),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((val) => val.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
});

type Env = z.infer<typeof envSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Configuration errors:\n${formatIssues(parsed.error).join('\n')}`);
  }
  const vars: Env = parsed.data;

  return {
    feishu: {
      appId: vars.FEISHU_APP_ID,
      appSecret: vars.FEISHU_APP_SECRET,
      baseUrl: vars.FEISHU_BASE_URL,
    },
    cache: {
      tokenTtlMs: vars.FEISHU_TOKEN_TTL_MS,
      userTtlMs: vars.FEISHU_USER_TTL_MS,
      groupTtlMs: vars.FEISHU_GROUP_TTL_MS,
      userCacheSize: vars.FEISHU_USER_CACHE_SIZE,
    },
    http: {
      timeoutMs: vars.FEISHU_TIMEOUT_MS,
      retryAttempts: vars.FEISHU_RETRY_ATTEMPTS,
      retryDelayMs: vars.FEISHU_RETRY_DELAY_MS,
    },
    log: {
      level: vars.LOG_LEVEL,
    },
  };
}

export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!config.feishu.appId) {
    errors.push('FEISHU_APP_ID is required');
  }

  if (!config.feishu.appSecret) {
    errors.push('FEISHU_APP_SECRET is required');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }
}

// Singleton config instance
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
    validateConfig(_config);
  }
  return _config;
}

export function resetConfig(): void {
  _config = null;
}
