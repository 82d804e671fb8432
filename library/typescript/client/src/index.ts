export { SupakitClient, createClient } from './client.js';
export { ClientError, type ClientErrorCode } from './error.js';
export {
  createPostgrestClient,
  type PostgrestFactory,
  type PostgrestFactoryOptions,
} from './postgrest.js';
export type { ClientOptions, RpcOptions } from './types.js';
export { UpdateUserBuilder } from './update-user.js';

export {
  AuthError,
  type AuthErrorCode,
  type LogoutScope,
  type Session,
  type SessionChangeListener,
  type SessionStore,
  type User,
} from '@supakit/auth';
export {
  ListRequest,
  SortOrder,
  StorageError,
  type StorageErrorCode,
  type StorageObject,
  type ObjectIdentifier,
  type UploadOptions,
} from '@supakit/storage-client';
