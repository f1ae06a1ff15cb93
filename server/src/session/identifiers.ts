import { v4 as uuidv4 } from 'uuid';

const randomHex = () => uuidv4().replace(/-/g, '');

export const ROOM_NAME_PREFIX = 'web-call-';
export const PARTICIPANT_PREFIX = 'identity-';

/**
 * ルーム名を生成（web-call-<32 hex>）
 *
 * 重複チェックはしない。衝突確率は無視できる前提。
 */
export function generateRoomName(): string {
  return `${ROOM_NAME_PREFIX}${randomHex()}`;
}

/**
 * 参加者 ID を生成（identity-<12 hex>）
 */
export function generateParticipantIdentity(): string {
  return `${PARTICIPANT_PREFIX}${randomHex().slice(0, 12)}`;
}
