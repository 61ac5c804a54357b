import { z } from 'zod';

const serviceAccountSchema = z.object({
  type: z.string().optional(),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  client_email: z.string(),
  private_key: z.string(),
  client_id: z.string().optional(),
});

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8080),

    EXCHANGE_API_URL: z.string().url().default('https://api.binance.us/api/v3'),
    EXCHANGE_API_KEY: z.string().min(1).optional(),
    EXCHANGE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10000),
    EXCHANGE_MAX_CONCURRENCY: z.coerce.number().int().nonnegative().default(0),
    QUOTE_ASSET: z.string().min(1).default('USDT'),

    GOOGLE_CREDENTIALS_FILE: z.string().min(1).optional(),
    GOOGLE_CREDENTIALS: z.string().min(1).optional(),
    SHEET_NAME: z.string().min(1).default('Crypto_Tracker'),
    SPREADSHEET_ID: z.string().min(1).optional(),

    UPDATE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5000),
    CONTINUE_ON_ERROR: booleanString.default('false'),
  })
  .superRefine((env, ctx) => {
    if (!env.GOOGLE_CREDENTIALS_FILE && !env.GOOGLE_CREDENTIALS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_CREDENTIALS_FILE'],
        message: 'Set GOOGLE_CREDENTIALS_FILE or GOOGLE_CREDENTIALS',
      });
    }
    if (env.GOOGLE_CREDENTIALS) {
      try {
        parseServiceAccount(env.GOOGLE_CREDENTIALS);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['GOOGLE_CREDENTIALS'],
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  });

export type AppEnv = z.infer<typeof envSchema>;

export function parseServiceAccount(raw: string): ServiceAccountCredentials {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error('GOOGLE_CREDENTIALS is not valid JSON');
  }
  const parsed = serviceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`GOOGLE_CREDENTIALS is not a service account key: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

export function validate(config: Record<string, unknown>): AppEnv {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}
