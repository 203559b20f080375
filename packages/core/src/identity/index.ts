export { isSessionId, SESSION_ID_PREFIX } from './session-id.js';
export type { SessionId } from './session-id.js';
