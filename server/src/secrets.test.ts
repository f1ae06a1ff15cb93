import type { GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { describe, expect, it, vi } from 'vitest';
import { FakeSecretReader } from './__tests__/helpers/fakes';
import { SecretsManagerError } from './errors';
import { AwsSecretReader, getMediaServerConfig } from './secrets';

const awsError = (name: string, message: string) => Object.assign(new Error(message), { name });

function clientReturning(secretString: string | undefined) {
  return {
    send: vi.fn(async (_command: GetSecretValueCommand, _options?: { abortSignal?: AbortSignal }) => ({
      $metadata: {},
      SecretString: secretString,
    })),
  };
}

function clientFailing(error: Error) {
  return {
    send: vi.fn(async (_command: GetSecretValueCommand, _options?: { abortSignal?: AbortSignal }) => {
      throw error;
    }),
  };
}

describe('AwsSecretReader', () => {
  it('should request the secret by id and parse its JSON', async () => {
    const client = clientReturning('{"SECRET_KEYS":"abc123"}');
    const controller = new AbortController();

    const secret = await new AwsSecretReader(client).read('token-server', { signal: controller.signal });

    expect(secret).toEqual({ SECRET_KEYS: 'abc123' });
    expect(client.send).toHaveBeenCalledTimes(1);
    const [command, options] = client.send.mock.calls[0];
    expect(command.input).toEqual({ SecretId: 'token-server' });
    expect(options?.abortSignal).toBe(controller.signal);
  });

  it.each([
    ['ResourceNotFoundException', "Secret 'token-server' not found: gone"],
    ['DecryptionFailureException', "Failed to decrypt secret 'token-server': gone"],
    ['InternalServiceErrorException', "Internal service error while retrieving secret 'token-server': gone"],
    ['InvalidParameterException', "Invalid parameter for secret 'token-server': gone"],
    ['InvalidRequestException', "Invalid request for secret 'token-server': gone"],
    ['CredentialsProviderError', 'AWS credentials not found. Please configure your AWS credentials.'],
    ['ThrottlingException', "AWS error retrieving secret 'token-server': ThrottlingException - gone"],
  ])('should map %s to a SecretsManagerError', async (name, message) => {
    const reader = new AwsSecretReader(clientFailing(awsError(name, 'gone')));

    const result = reader.read('token-server');

    await expect(result).rejects.toBeInstanceOf(SecretsManagerError);
    await expect(result).rejects.toThrow(message);
  });

  it('should reject a secret without a string value', async () => {
    const reader = new AwsSecretReader(clientReturning(undefined));
    await expect(reader.read('token-server')).rejects.toThrow("Secret 'token-server' has no string value");
  });

  it('should reject a secret that is not valid JSON', async () => {
    const reader = new AwsSecretReader(clientReturning('abc123,def456'));
    await expect(reader.read('token-server')).rejects.toThrow("Secret 'token-server' is not valid JSON");
  });

  it('should reject JSON that is not an object', async () => {
    const reader = new AwsSecretReader(clientReturning('["abc123"]'));
    await expect(reader.read('token-server')).rejects.toThrow("Secret 'token-server' is not a JSON object");
  });
});

describe('getMediaServerConfig', () => {
  it('should return the media server settings', async () => {
    const reader = new FakeSecretReader({
      'media-config': {
        MEDIA_SERVER_URL: 'wss://media.example.com',
        MEDIA_SERVER_API_KEY: 'test-key',
        MEDIA_SERVER_API_SECRET: 'test-secret',
        SECRET_KEYS: 'abc123',
      },
    });

    await expect(getMediaServerConfig(reader, 'media-config')).resolves.toEqual({
      url: 'wss://media.example.com',
      apiKey: 'test-key',
      apiSecret: 'test-secret',
    });
  });

  it('should list the missing keys', async () => {
    const reader = new FakeSecretReader({ 'media-config': { MEDIA_SERVER_URL: 'wss://media.example.com' } });

    await expect(getMediaServerConfig(reader, 'media-config')).rejects.toThrow(
      "Secret 'media-config' is missing required keys: MEDIA_SERVER_API_KEY, MEDIA_SERVER_API_SECRET, SECRET_KEYS",
    );
  });
});
