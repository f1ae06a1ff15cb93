import { Hono } from 'hono';
import { z } from 'zod';
import { apiKeyAuth, type AuthEnv, type KeyValidator } from '../auth';
import type { SessionIssuer } from '../session';
import type { ApiError, TokenResponse } from '../types';

const TokenRequestSchema = z.object({
  agent_name: z.string().min(1).optional(),
  customer: z
    .object({
      name: z.string().min(1),
      email: z.string().email(),
    })
    .optional(),
});

export interface TokenRouteDeps {
  validator: KeyValidator;
  issuer: SessionIssuer;
}

export function createTokenRoutes({ validator, issuer }: TokenRouteDeps) {
  const tokenRoutes = new Hono<AuthEnv>();

  /**
   * POST /token
   * ルームを作成し、エージェントディスパッチ付きのアクセストークンを発行
   * Headers:
   *   - X-API-Key: API キー（必須）
   * Body (任意):
   *   - agent_name: ディスパッチするエージェント（省略時は DEFAULT_AGENT）
   *   - customer: { name, email } エージェントに渡す顧客情報
   */
  tokenRoutes.post('/', apiKeyAuth(validator), async (c) => {
    let body: unknown = {};
    const text = await c.req.text();

    if (text.trim()) {
      try {
        body = JSON.parse(text);
      } catch {
        return c.json(
          { error: 'validation_error', message: 'request body must be valid JSON' } satisfies ApiError,
          400,
        );
      }
    }

    const parsed = TokenRequestSchema.safeParse(body);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return c.json({ error: 'validation_error', message } satisfies ApiError, 400);
    }

    const session = await issuer.issue({
      userId: c.get('authorization').userId,
      agentName: parsed.data.agent_name,
      customer: parsed.data.customer,
    });

    const response: TokenResponse = {
      token: session.token,
      room_name: session.roomName,
      participant: session.participantIdentity,
      agent: session.agentName,
    };

    return c.json(response);
  });

  return tokenRoutes;
}
