/**
 * AuthorizationRecord - キーストアに登録された API キーの情報
 */
export interface AuthorizationRecord {
  userId: number; // 許可リスト内の位置（1 始まり）
}

/**
 * AuthorizationResult - API キー検証の結果
 */
export type AuthorizationResult =
  | { status: 'authorized'; record: AuthorizationRecord }
  | { status: 'unauthorized'; reason: 'missing' | 'invalid' };

export interface CustomerInfo {
  name: string;
  email: string;
}

/**
 * SessionDescriptor - トークンに埋め込むルーム・参加者・エージェント
 */
export interface SessionDescriptor {
  roomName: string;
  participantIdentity: string;
  agentName: string;
}

/**
 * DispatchDirective - どのエージェントをルームに参加させるか
 */
export interface DispatchDirective {
  agentName: string;
  metadata: string; // JSON: { agent, user_id, customer? }
}

/**
 * IssuedSession - 署名済みトークンとセッション情報
 */
export interface IssuedSession extends SessionDescriptor {
  token: string;
}

/**
 * API Request/Response types
 */
export interface TokenResponse {
  token: string;
  room_name: string;
  participant: string;
  agent: string;
}

export interface WelcomeResponse {
  message: string;
}

export interface ApiError {
  error: string;
  message: string;
}
