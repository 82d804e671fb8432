import { z } from 'zod';

/** setTimeout が扱える最大の遅延 (ms)。これを超えると 1ms に丸められる。 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

function hasHttpScheme(url: string): boolean {
  try {
    return /^https?:$/.test(new URL(url).protocol);
  } catch {
    // 解析できない URL は url() の検証で報告される
    return true;
  }
}

export const LogConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
  format: z.enum(['json', 'text']).default('json'),
});

export const ClientConfigSchema = z.object({
  url: z
    .string()
    .url()
    .refine(hasHttpScheme, { message: 'URL must use http or https' })
    .transform((url) => url.replace(/\/+$/, '')),
  apiKey: z.string().min(1),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000),
  log: LogConfigSchema.default({}),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
