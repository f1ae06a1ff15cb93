import { RoomAgentDispatch, RoomConfiguration } from '@livekit/protocol';
import { AccessToken, RoomServiceClient } from 'livekit-server-sdk';
import type { DispatchDirective, SessionDescriptor } from '../types';
import type { MediaSessionService } from './types';

export interface LiveKitMediaServiceOptions {
  url: string;
  apiKey: string;
  apiSecret: string;
  /** AccessToken の有効期限（例: '24h'、秒数） */
  tokenTtl: string | number;
  /** 誰も参加しないままルームを閉じるまでの秒数 */
  emptyTimeout: number;
  roomService?: Pick<RoomServiceClient, 'createRoom'>;
}

/**
 * LiveKit を使った MediaSessionService
 */
export class LiveKitMediaService implements MediaSessionService {
  private readonly roomService: Pick<RoomServiceClient, 'createRoom'>;

  constructor(private readonly options: LiveKitMediaServiceOptions) {
    this.roomService =
      options.roomService ?? new RoomServiceClient(options.url, options.apiKey, options.apiSecret);
  }

  /** RoomServiceClient は signal を受け取らないため、呼び出し前に確認するだけ（時間制限は呼び出し側の withTimeout） */
  async createRoom(roomName: string, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    await this.roomService.createRoom({
      name: roomName,
      emptyTimeout: this.options.emptyTimeout,
    });
  }

  async issueToken(descriptor: SessionDescriptor, dispatch: DispatchDirective): Promise<string> {
    const at = new AccessToken(this.options.apiKey, this.options.apiSecret, {
      identity: descriptor.participantIdentity,
      ttl: this.options.tokenTtl,
    });

    at.addGrant({
      roomJoin: true,
      room: descriptor.roomName,
      canPublish: true,
      canSubscribe: true,
    });

    // 参加時にエージェントを自動ディスパッチ
    at.roomConfig = new RoomConfiguration({
      agents: [
        new RoomAgentDispatch({
          agentName: dispatch.agentName,
          metadata: dispatch.metadata,
        }),
      ],
    });

    return at.toJwt();
  }
}
