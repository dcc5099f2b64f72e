import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import type { z } from 'zod';
import { addonUploadsConfig } from '@app/config/addon-uploads.config';
import { baseEnvSchema, formatEnvIssues } from '@app/config/env.schema';

/**
 * Base ENV schema
 * - Feature settings live in their own namespace (addon-uploads.config.ts)
 */
const envSchema = baseEnvSchema.passthrough();

type RawEnv = z.infer<typeof envSchema>;

export type AppConfig = RawEnv & {
  REDIS_URL: string;
  corsOrigins: string[];
};

/**
 * Normalize/derive a few fields after successful parse:
 * - Ensure REDIS_URL is always present (fallback from host/port)
 * - Expand CORS_ORIGIN (CSV) → string[]
 */
export const validateEnv = (config: Record<string, unknown>): AppConfig => {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    throw new Error(
      `Environment validation error: ${formatEnvIssues(parsed.error)}`,
    );
  }

  const env = parsed.data;

  const redisUrl =
    env.REDIS_URL ??
    `redis://${env.REDIS_HOST ?? 'localhost'}:${env.REDIS_PORT ?? 6379}`;

  const corsOrigins = env.CORS_ORIGIN.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    ...env,
    REDIS_URL: redisUrl,
    corsOrigins:
      corsOrigins.length > 0 ? corsOrigins : ['http://localhost:3000'],
  };
};

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      expandVariables: true,
      envFilePath: ['.env'],
      validate: validateEnv,
      load: [addonUploadsConfig],
    }),
  ],
})
export class AppConfigModule {}
