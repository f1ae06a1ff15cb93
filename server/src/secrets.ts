import {
  GetSecretValueCommand,
  type GetSecretValueCommandOutput,
} from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import { SecretsManagerError } from './errors';
import { log } from './log';

/**
 * SecretsManagerClient のうち、このサービスが使う部分
 */
export interface SecretsClient {
  send(
    command: GetSecretValueCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<GetSecretValueCommandOutput>;
}

export interface SecretReader {
  read(secretId: string, options?: { signal?: AbortSignal }): Promise<Record<string, unknown>>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function toSecretsManagerError(secretId: string, error: unknown): SecretsManagerError {
  const name = error instanceof Error ? error.name : 'UnknownError';
  const message = error instanceof Error ? error.message : String(error);

  switch (name) {
    case 'DecryptionFailureException':
      return new SecretsManagerError(`Failed to decrypt secret '${secretId}': ${message}`, { cause: error });
    case 'InternalServiceErrorException':
      return new SecretsManagerError(`Internal service error while retrieving secret '${secretId}': ${message}`, {
        cause: error,
      });
    case 'InvalidParameterException':
      return new SecretsManagerError(`Invalid parameter for secret '${secretId}': ${message}`, { cause: error });
    case 'InvalidRequestException':
      return new SecretsManagerError(`Invalid request for secret '${secretId}': ${message}`, { cause: error });
    case 'ResourceNotFoundException':
      return new SecretsManagerError(`Secret '${secretId}' not found: ${message}`, { cause: error });
    case 'CredentialsProviderError':
      return new SecretsManagerError('AWS credentials not found. Please configure your AWS credentials.', {
        cause: error,
      });
    default:
      return new SecretsManagerError(`AWS error retrieving secret '${secretId}': ${name} - ${message}`, {
        cause: error,
      });
  }
}

/**
 * AWS Secrets Manager から JSON 形式のシークレットを読み出す
 */
export class AwsSecretReader implements SecretReader {
  constructor(private readonly client: SecretsClient) {}

  async read(secretId: string, { signal }: { signal?: AbortSignal } = {}): Promise<Record<string, unknown>> {
    let secretString: string | undefined;

    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }), {
        abortSignal: signal,
      });
      secretString = response.SecretString;
    } catch (error) {
      throw toSecretsManagerError(secretId, error);
    }

    if (secretString === undefined) {
      throw new SecretsManagerError(`Secret '${secretId}' has no string value`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(secretString);
    } catch (error) {
      throw new SecretsManagerError(`Secret '${secretId}' is not valid JSON`, { cause: error });
    }

    if (!isRecord(parsed)) {
      throw new SecretsManagerError(`Secret '${secretId}' is not a JSON object`);
    }

    return parsed;
  }
}

const MediaServerSecretSchema = z.object({
  MEDIA_SERVER_URL: z.string(),
  MEDIA_SERVER_API_KEY: z.string(),
  MEDIA_SERVER_API_SECRET: z.string(),
  SECRET_KEYS: z.string(),
});

export interface MediaServerSecret {
  url: string;
  apiKey: string;
  apiSecret: string;
}

/**
 * メディアサーバーの接続情報をシークレットから取得する
 *
 * 期待する形式:
 * { "MEDIA_SERVER_URL", "MEDIA_SERVER_API_KEY", "MEDIA_SERVER_API_SECRET", "SECRET_KEYS" }
 */
export async function getMediaServerConfig(
  reader: SecretReader,
  secretName: string,
  { signal }: { signal?: AbortSignal } = {},
): Promise<MediaServerSecret> {
  const secret = await reader.read(secretName, { signal });
  const parsed = MediaServerSecretSchema.safeParse(secret);

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new SecretsManagerError(`Secret '${secretName}' is missing required keys: ${keys.join(', ')}`);
  }

  log().info({ secretName }, 'retrieved media server configuration');

  return {
    url: parsed.data.MEDIA_SERVER_URL,
    apiKey: parsed.data.MEDIA_SERVER_API_KEY,
    apiSecret: parsed.data.MEDIA_SERVER_API_SECRET,
  };
}
