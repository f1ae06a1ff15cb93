import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { serve } from '@hono/node-server';
import { config as loadEnv } from 'dotenv';
import { createApp } from './app';
import { KeyValidator } from './auth';
import { parseEnv, resolveConfig } from './config';
import { createKeyStore } from './keystore';
import { initializeLogger, log } from './log';
import { LiveKitMediaService } from './media';
import { AwsSecretReader } from './secrets';
import { SessionIssuer } from './session';

loadEnv();

async function main() {
  const env = parseEnv(process.env);
  initializeLogger({ pretty: env.LOG_PRETTY, level: env.LOG_LEVEL });

  const secrets = new AwsSecretReader(new SecretsManagerClient({ region: env.CUSTOM_AWS_REGION }));
  log().info({ secretName: env.AWS_SECRET_NAME }, 'loading configuration');
  const config = await resolveConfig(env, secrets);

  const validator = new KeyValidator(createKeyStore(config.keyStore, secrets), {
    timeoutMs: config.keyStore.timeoutMs,
  });
  const issuer = new SessionIssuer(
    new LiveKitMediaService({
      url: config.media.url,
      apiKey: config.media.apiKey,
      apiSecret: config.media.apiSecret,
      tokenTtl: config.media.tokenTtl,
      emptyTimeout: config.media.emptyTimeout,
    }),
    { defaultAgent: config.defaultAgent, mediaTimeoutMs: config.media.timeoutMs },
  );

  const app = createApp({ validator, issuer, corsOrigin: config.server.corsOrigin });
  const { port, host: hostname } = config.server;

  serve({ fetch: app.fetch, port, hostname }, (info) => {
    log().info(
      { port: info.port, keyStore: config.keyStore.kind, defaultAgent: config.defaultAgent },
      'voice token server listening (GET / welcome, POST /token issue token)',
    );
  });
}

main().catch((error) => {
  console.error('Failed to start voice token server:', error);
  process.exit(1);
});
