export type {
  User,
  Session,
  LogoutScope,
  UpdateUserPayload,
  SessionStore,
  SessionChangeListener,
  AuthClientOptions,
} from './types.js';
export { AuthError, type AuthErrorCode } from './error.js';
export { AuthClient } from './auth-client.js';
export { MemorySessionStore } from './session-store.js';
export { SessionResponseSchema, UserSchema, toSession } from './schema.js';
