export { generateParticipantIdentity, generateRoomName } from './identifiers';
export { SessionIssuer, type IssueRequest, type SessionIssuerOptions } from './issuer';
