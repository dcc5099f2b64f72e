import { z } from 'zod';

/** App-wide ENV keys; feature namespaces pick from here instead of redeclaring. */
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(4000),

  // Cart sessions
  CART_SESSION_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(172800),

  // CORS can be CSV list
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Redis can be URL or host/port
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().int().positive().optional(),

  GLOBAL_PREFIX: z.string().default('api'),
});

export const formatEnvIssues = (error: z.ZodError): string =>
  error.issues
    .map(
      (issue: z.ZodIssue) => `${issue.path.join('.') || 'ENV'}: ${issue.message}`,
    )
    .join('; ');
