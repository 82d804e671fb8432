import { z } from 'zod';
import type { BucketInformation, ObjectIdentifier, StorageObject } from './types.js';

const timestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' })
  .nullable()
  .optional()
  .transform((value) => (value ? new Date(value) : null));

const nullableString = z
  .string()
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const jsonObject = z
  .record(z.unknown())
  .nullable()
  .optional()
  .transform((value) => value ?? null);

export const BucketInformationSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    owner: nullableString,
    public: z.boolean().nullable().optional(),
    file_size_limit: z.number().nullable().optional(),
    allowed_mime_types: z.array(z.string()).nullable().optional(),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(
    (b): BucketInformation => ({
      id: b.id,
      name: b.name,
      owner: b.owner,
      public: b.public ?? null,
      fileSizeLimit: b.file_size_limit ?? null,
      allowedMimeTypes: b.allowed_mime_types ?? null,
      createdAt: b.created_at,
      updatedAt: b.updated_at,
    }),
  );

export const StorageObjectSchema = z
  .object({
    name: z.string(),
    id: nullableString,
    bucket_id: nullableString,
    owner: nullableString,
    owner_id: nullableString,
    version: nullableString,
    metadata: jsonObject,
    user_metadata: jsonObject,
    created_at: timestamp,
    updated_at: timestamp,
    last_accessed_at: timestamp,
    buckets: BucketInformationSchema.nullable().optional(),
  })
  .transform((o): StorageObject => {
    const object: StorageObject = {
      name: o.name,
      id: o.id,
      bucketId: o.bucket_id,
      owner: o.owner,
      ownerId: o.owner_id,
      version: o.version,
      metadata: o.metadata,
      userMetadata: o.user_metadata,
      createdAt: o.created_at,
      updatedAt: o.updated_at,
      lastAccessedAt: o.last_accessed_at,
    };
    if (o.buckets) object.bucket = o.buckets;
    return object;
  });

export const StorageObjectListSchema = z.array(StorageObjectSchema);

export const ObjectIdentifierSchema = z
  .object({ Id: z.string(), Key: z.string() })
  .transform((o): ObjectIdentifier => ({ id: o.Id, key: o.Key }));

export const DeleteResponseSchema = z.object({ message: z.string() });

export const ErrorBodySchema = z.object({
  statusCode: z.union([z.string(), z.number()]).optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});
