import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { baseEnvSchema, formatEnvIssues } from '@app/config/env.schema';
import {
  DEFAULT_ALLOWED_EXTS,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const csv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

export const addonUploadsEnvSchema = baseEnvSchema
  .pick({ GLOBAL_PREFIX: true })
  .extend({
    ADDON_UPLOADS_ENABLED: z
      .string()
      .optional()
      .transform((value) => TRUTHY.has((value ?? '').trim().toLowerCase())),
    ADDON_UPLOADS_PRODUCT_IDS: csv,
    ADDON_UPLOADS_CATEGORIES: csv,
    ADDON_UPLOADS_ALLOWED_EXTS: csv,
    ADDON_UPLOADS_DIR: z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, {
        message: 'ADDON_UPLOADS_DIR must be a single directory name',
      })
      .default('addon-uploads'),
    ADDON_UPLOADS_TMP_DIR: z.string().optional(),
    MEDIA_ROOT: z.string().default('./media'),
    MEDIA_BASE_URL: z.string().url().default('http://localhost:4000/media'),
    APP_BASE_URL: z.string().url().default('http://localhost:4000'),
    // Anti-forgery token for the upload field
    FORM_TOKEN_SECRET: z.string().min(1, {
      message: 'FORM_TOKEN_SECRET must be provided',
    }),
    FORM_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  });

export type AddonUploadsEnv = z.infer<typeof addonUploadsEnvSchema>;

export const parseAddonUploadsEnv = (
  raw: Record<string, unknown>,
): AddonUploadsEnv => {
  const parsed = addonUploadsEnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Environment validation error: ${formatEnvIssues(parsed.error)}`,
    );
  }
  return parsed.data;
};

const stripTrailingSlash = (value: string) => value.replace(/\/+$/, '');

export const buildAddonUploadsConfig = (
  raw: AddonUploadsEnv,
): AddonUploadsConfig => {
  const mediaRoot = resolve(raw.MEDIA_ROOT);
  const allowedExts = raw.ADDON_UPLOADS_ALLOWED_EXTS.map((ext) =>
    ext.replace(/^\./, '').toLowerCase(),
  );

  return {
    enabled: raw.ADDON_UPLOADS_ENABLED,
    productIds: raw.ADDON_UPLOADS_PRODUCT_IDS,
    categoryIds: raw.ADDON_UPLOADS_CATEGORIES,
    allowedExts: allowedExts.length > 0 ? allowedExts : [...DEFAULT_ALLOWED_EXTS],
    mediaRoot,
    storageDir: raw.ADDON_UPLOADS_DIR,
    storageRoot: join(mediaRoot, raw.ADDON_UPLOADS_DIR),
    storageBaseUrl: `${stripTrailingSlash(raw.MEDIA_BASE_URL)}/${raw.ADDON_UPLOADS_DIR}`,
    tmpDir: raw.ADDON_UPLOADS_TMP_DIR ?? join(tmpdir(), 'addon-uploads'),
    appBaseUrl: stripTrailingSlash(raw.APP_BASE_URL),
    routePrefix: raw.GLOBAL_PREFIX.replace(/^\/+|\/+$/g, ''),
    formToken: {
      secret: raw.FORM_TOKEN_SECRET,
      ttlSeconds: raw.FORM_TOKEN_TTL_SECONDS,
    },
  };
};

export const addonUploadsConfig = registerAs(
  'addonUploads',
  (): AddonUploadsConfig =>
    buildAddonUploadsConfig(parseAddonUploadsEnv(process.env)),
);

export type { AddonUploadsConfig };
