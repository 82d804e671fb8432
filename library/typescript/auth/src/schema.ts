import { z } from 'zod';
import type { Session, User } from './types.js';

export const UserSchema = z
  .object({
    id: z.string(),
    aud: z.string().optional(),
    role: z.string().optional(),
    email: z.string().optional(),
    phone: z.string().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    app_metadata: z.record(z.unknown()).optional(),
    user_metadata: z.record(z.unknown()).optional(),
  })
  .transform(
    (u): User => ({
      id: u.id,
      aud: u.aud,
      role: u.role,
      email: u.email,
      phone: u.phone,
      createdAt: u.created_at,
      updatedAt: u.updated_at,
      appMetadata: u.app_metadata ?? {},
      userMetadata: u.user_metadata ?? {},
    }),
  );

export const SessionResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string(),
    token_type: z.string().default('bearer'),
    expires_in: z.number().optional(),
    expires_at: z.number().optional(),
    user: UserSchema.nullable().optional(),
  })
  .refine((s) => s.expires_at !== undefined || s.expires_in !== undefined, {
    message: 'expires_at or expires_in is required',
  });

export type SessionResponse = z.infer<typeof SessionResponseSchema>;

/** プロバイダーのエラーボディ。GoTrue の新旧両形式を受け付ける。 */
export const ErrorBodySchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
  error_code: z.string().optional(),
  msg: z.string().optional(),
  message: z.string().optional(),
});

/** expires_at がない場合は nowMs と expires_in から算出する。 */
export function toSession(data: SessionResponse, nowMs: number): Session {
  return {
    accessToken: data.access_token,
    refreshToken: data.refresh_token,
    tokenType: data.token_type,
    expiresIn: data.expires_in,
    expiresAt: data.expires_at ?? Math.floor(nowMs / 1000) + (data.expires_in ?? 0),
    user: data.user ?? null,
  };
}
