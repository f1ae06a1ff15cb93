import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { API_KEY_HEADER, type KeyValidator } from './auth';
import { log } from './log';
import { createTokenRoutes } from './routes/token';
import type { SessionIssuer } from './session';
import type { ApiError, WelcomeResponse } from './types';

export const WELCOME_MESSAGE = 'Welcome to the voice token server. Use /token endpoint to generate a token.';

export interface AppDeps {
  validator: KeyValidator;
  issuer: SessionIssuer;
  corsOrigin?: string;
}

export function createApp({ validator, issuer, corsOrigin = '*' }: AppDeps) {
  const app = new Hono();

  // Middleware
  app.use('*', logger((message, ...rest) => log().info([message, ...rest].join(' '))));
  app.use('*', cors({
    origin: corsOrigin,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', API_KEY_HEADER],
  }));

  // Welcome
  app.get('/', (c) => {
    return c.json({ message: WELCOME_MESSAGE } satisfies WelcomeResponse);
  });

  // API Routes
  app.route('/token', createTokenRoutes({ validator, issuer }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      { error: 'not_found', message: 'Endpoint not found' } satisfies ApiError,
      404
    );
  });

  // Error handler: 内部エラーの詳細はログのみ
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    log().error({ err }, 'request failed');
    return c.json(
      { error: 'server_error', message: 'Internal server error' } satisfies ApiError,
      500
    );
  });

  return app;
}
