import { z } from 'zod';

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => {
    if (typeof v === 'string' && v.trim().length === 0) return undefined;
    return v;
  }, schema);

const ServerEnvSchema = z.object({
  PORT: emptyToUndefined(z.coerce.number().int().min(0).max(65535).default(8787)),
  DATABASE_PATH: emptyToUndefined(z.string().min(1).default('data/expenses.db')),
  DB_MAX_RETRIES: emptyToUndefined(z.coerce.number().int().min(1).max(10).default(3)),

  // Without a key the server still starts; only /api/analyze-expense fails
  GEMINI_API_KEY: emptyToUndefined(z.string().min(1).optional()),
  GEMINI_MODEL: emptyToUndefined(z.string().min(1).default('gemini-2.0-flash')),
  GEMINI_TIMEOUT_MS: emptyToUndefined(z.coerce.number().int().positive().default(10_000)),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function getServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid server environment variables: ${message}`);
  }
  return parsed.data;
}
