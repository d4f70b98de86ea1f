export { SessionRegistry, SESSION_TOKEN_PREFIX, type SessionInfo } from './session-registry.js';
