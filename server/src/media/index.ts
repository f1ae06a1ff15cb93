export { LiveKitMediaService, type LiveKitMediaServiceOptions } from './livekit';
export type { MediaSessionService } from './types';
