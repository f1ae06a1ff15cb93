import { z } from 'zod';
import { ConfigError, SecretsManagerError, TimeoutError } from './errors';
import { parseKeyList } from './keystore/static';
import { log } from './log';
import { getMediaServerConfig, type SecretReader } from './secrets';
import { withTimeout } from './utils/timeout';

const booleanish = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

// 秒数（"86400"）または期間（"24h", "30 m"）。秒数は "86400s" に正規化する
const tokenTtl = z
  .string()
  .regex(/^[1-9]\d*( ?[smhd])?$/, 'expected seconds or a duration such as 24h')
  .transform((value) => (/^\d+$/.test(value) ? `${value}s` : value))
  .default('24h');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanish,
  CORS_ORIGIN: z.string().default('*'),

  DEFAULT_AGENT: z.string().min(1).default('ivy'),
  TOKEN_TTL: tokenTtl,
  ROOM_EMPTY_TIMEOUT: z.coerce.number().int().nonnegative().default(300),

  MEDIA_SERVER_URL: optionalString,
  MEDIA_SERVER_API_KEY: optionalString,
  MEDIA_SERVER_API_SECRET: optionalString,
  MEDIA_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  AWS_SECRET_NAME: z.string().min(1).default('asr-media-server-config'),
  CUSTOM_AWS_REGION: z.string().min(1).default('ap-southeast-1'),

  KEY_STORE: z.enum(['secrets-manager', 'env']).default('secrets-manager'),
  SECRET_KEYS: optionalString,
  KEY_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  KEY_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(0),
  KEY_CACHE_SERVE_STALE: booleanish,
});

export type Env = z.infer<typeof EnvSchema>;

export interface KeyStoreConfig {
  kind: 'secrets-manager' | 'env';
  secretName: string;
  staticKeys: readonly string[];
  timeoutMs: number;
  cacheTtlMs: number;
  serveStaleOnError: boolean;
}

export interface MediaConfig {
  url: string;
  apiKey: string;
  apiSecret: string;
  timeoutMs: number;
  tokenTtl: string;
  emptyTimeout: number;
}

export interface AppConfig {
  server: { port: number; host: string; corsOrigin: string };
  defaultAgent: string;
  media: MediaConfig;
  keyStore: KeyStoreConfig;
}

/**
 * 環境変数を検証する
 */
export function parseEnv(env: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${details.join('; ')}`);
  }
  return parsed.data;
}

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
};

/**
 * 起動時に一度だけ設定を組み立てる
 *
 * メディアサーバーの接続情報はシークレットを優先し、
 * 読み出せない場合は環境変数にフォールバックする。
 */
export async function resolveConfig(env: Env, reader?: SecretReader): Promise<Readonly<AppConfig>> {
  let url = env.MEDIA_SERVER_URL;
  let apiKey = env.MEDIA_SERVER_API_KEY;
  let apiSecret = env.MEDIA_SERVER_API_SECRET;

  if (reader) {
    try {
      const secret = await withTimeout('secret read', env.KEY_STORE_TIMEOUT_MS, (signal) =>
        getMediaServerConfig(reader, env.AWS_SECRET_NAME, { signal }),
      );
      url = secret.url;
      apiKey = secret.apiKey;
      apiSecret = secret.apiSecret;
    } catch (error) {
      if (!(error instanceof SecretsManagerError || error instanceof TimeoutError)) throw error;
      log().warn({ err: error }, 'failed to load configuration from Secrets Manager, falling back to environment');
    }
  }

  if (!url || !apiKey || !apiSecret) {
    const missing = [
      !url && 'MEDIA_SERVER_URL',
      !apiKey && 'MEDIA_SERVER_API_KEY',
      !apiSecret && 'MEDIA_SERVER_API_SECRET',
    ].filter(Boolean);
    throw new ConfigError(`Missing media server credentials: ${missing.join(', ')}`);
  }

  return deepFreeze<AppConfig>({
    server: { port: env.PORT, host: env.HOST, corsOrigin: env.CORS_ORIGIN },
    defaultAgent: env.DEFAULT_AGENT,
    media: {
      url,
      apiKey,
      apiSecret,
      timeoutMs: env.MEDIA_TIMEOUT_MS,
      tokenTtl: env.TOKEN_TTL,
      emptyTimeout: env.ROOM_EMPTY_TIMEOUT,
    },
    keyStore: {
      kind: env.KEY_STORE,
      secretName: env.AWS_SECRET_NAME,
      staticKeys: parseKeyList(env.SECRET_KEYS),
      timeoutMs: env.KEY_STORE_TIMEOUT_MS,
      cacheTtlMs: env.KEY_CACHE_TTL_MS,
      serveStaleOnError: env.KEY_CACHE_SERVE_STALE,
    },
  });
}
