import { createMiddleware } from 'hono/factory';
import type { ApiError, AuthorizationRecord } from '../types';
import type { KeyValidator } from './validator';

export const API_KEY_HEADER = 'X-API-Key';

export type AuthEnv = {
  Variables: {
    authorization: AuthorizationRecord;
  };
};

/**
 * X-API-Key ヘッダーを検証するミドルウェア
 *
 * キーなし・無効なキーはどちらも同じ 401 を返す（理由は返さない）。
 * ValidatorError はそのまま投げ、app.onError で 500 にする。
 */
export function apiKeyAuth(validator: KeyValidator) {
  return createMiddleware<AuthEnv>(async (c, next) => {
    const result = await validator.validate(c.req.header(API_KEY_HEADER));

    if (result.status === 'unauthorized') {
      return c.json({ error: 'unauthorized', message: 'Unauthorized' } satisfies ApiError, 401);
    }

    c.set('authorization', result.record);
    await next();
  });
}
