import { IssuerError } from '../errors';
import { log } from '../log';
import type { MediaSessionService } from '../media';
import type { CustomerInfo, DispatchDirective, IssuedSession, SessionDescriptor } from '../types';
import { withTimeout } from '../utils/timeout';
import { generateParticipantIdentity, generateRoomName } from './identifiers';

export interface SessionIssuerOptions {
  defaultAgent: string;
  mediaTimeoutMs: number;
}

export interface IssueRequest {
  userId: number;
  agentName?: string;
  customer?: CustomerInfo;
}

/**
 * 認可済みリクエストに対してルームを作成し、トークンを発行する
 *
 * ルーム作成は 1 リクエストにつき 1 回だけ。リトライはしない。
 */
export class SessionIssuer {
  constructor(
    private readonly media: MediaSessionService,
    private readonly options: SessionIssuerOptions,
  ) {}

  async issue(request: IssueRequest): Promise<IssuedSession> {
    const agentName = request.agentName ?? this.options.defaultAgent;
    if (!agentName) {
      throw new IssuerError('No agent configured for dispatch');
    }

    const descriptor: SessionDescriptor = {
      roomName: generateRoomName(),
      participantIdentity: generateParticipantIdentity(),
      agentName,
    };

    const dispatch: DispatchDirective = {
      agentName,
      metadata: JSON.stringify({
        agent: agentName,
        user_id: request.userId,
        ...(request.customer && { customer: request.customer }),
      }),
    };

    try {
      await withTimeout('room creation', this.options.mediaTimeoutMs, (signal) =>
        this.media.createRoom(descriptor.roomName, signal),
      );
    } catch (error) {
      throw new IssuerError(`Failed to create room ${descriptor.roomName}`, { cause: error });
    }

    let token: string;
    try {
      token = await this.media.issueToken(descriptor, dispatch);
    } catch (error) {
      throw new IssuerError('Failed to sign access token', { cause: error });
    }

    log().info(
      { room: descriptor.roomName, participant: descriptor.participantIdentity, agent: agentName },
      'issued session token',
    );

    return { ...descriptor, token };
  }
}
