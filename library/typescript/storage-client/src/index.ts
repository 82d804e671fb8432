export type {
  BucketInformation,
  StorageObject,
  ObjectIdentifier,
  UploadData,
  UploadOptions,
  StorageClientOptions,
} from './types.js';
export { StorageError, type StorageErrorCode } from './error.js';
export { ListRequest, SortOrder, type SortBy, type ListRequestBody } from './list-request.js';
export { StorageClient, ObjectApi } from './client.js';
