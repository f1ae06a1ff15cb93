import type { DispatchDirective, SessionDescriptor } from '../types';

/**
 * メディアセッションサービス（ルーム作成とトークン署名）
 */
export interface MediaSessionService {
  createRoom(roomName: string, signal: AbortSignal): Promise<void>;
  issueToken(descriptor: SessionDescriptor, dispatch: DispatchDirective): Promise<string>;
}
