import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

export const DEV_AUTH_SECRET = 'dev-only-auth-secret';
const MIN_AUTH_SECRET_LENGTH = 16;

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: optionalString,
  STRIPE_SECRET_KEY: optionalString,
  STRIPE_WEBHOOK_SECRET: optionalString,
  STRIPE_PRICE_ID: optionalString,
  APP_URL: z.string().url().default('http://localhost:3000'),
  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  EMAIL_SENDER: optionalString,
  GOOGLE_SERVICE_ACCOUNT_EMAIL: optionalString,
  GOOGLE_PRIVATE_KEY: optionalString,
  LEADS_SPREADSHEET_ID: optionalString,
  LEADS_SHEET_RANGE: z.string().default('Leads!A:C'),
  AUTH_SECRET: optionalString,
  PRO_SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  PROBE_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(10),
})
  .superRefine((env, ctx) => {
    if (env.AUTH_SECRET && env.AUTH_SECRET.length < MIN_AUTH_SECRET_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTH_SECRET'],
        message: `must be at least ${MIN_AUTH_SECRET_LENGTH} characters`,
      });
    }
    if (!env.AUTH_SECRET && env.NODE_ENV === 'production') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTH_SECRET'],
        message: 'is required in production',
      });
    }
  })
  // The placeholder only ever signs sessions outside production.
  .transform(env => ({ ...env, AUTH_SECRET: env.AUTH_SECRET ?? DEV_AUTH_SECRET }));

export type AppConfig = z.infer<typeof EnvSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
