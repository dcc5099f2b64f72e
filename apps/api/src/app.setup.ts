import { mkdir } from 'node:fs/promises';
import { ValidationPipe } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import helmet from 'helmet';
import type { NextFunction, Request, Response } from 'express';
import { HttpExceptionFilter } from '@app/common/filters/http-exception.filter';
import { TransformResponseInterceptor } from '@app/common/interceptors/transform-response.interceptor';
import { TracingInterceptor } from '@app/common/interceptors/tracing.interceptor';
import type { AddonUploadsConfig } from '@app/addon-uploads/addon-uploads.tokens';
import { addonMediaGuard } from '@app/addon-uploads/access-policy';

export const MEDIA_ROUTE = '/media';

export interface AppSetup {
  globalPrefix: string;
  allowedOrigins: string[];
}

/** HTTP pipeline shared by bootstrap and the e2e specs. */
export async function configureApp(
  app: NestExpressApplication,
  config: ConfigService,
  uploads: AddonUploadsConfig,
): Promise<AppSetup> {
  // ---- Security headers (Helmet) ----
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'same-site' } }));

  // ---- ValidationPipe (strict) ----
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  // ---- Cookie parser (cart session) ----
  app.use(cookieParser());

  // ---- Global prefix ----
  const globalPrefix = config.get<string>('GLOBAL_PREFIX') ?? 'api';
  if (globalPrefix) {
    app.setGlobalPrefix(globalPrefix);
  }

  // ---- CORS (with credentials, the cart cookie travels cross-origin) ----
  const allowedOrigins = (
    config.get<string[]>('corsOrigins') ??
    (config.get<string>('CORS_ORIGIN') ?? 'http://localhost:3000').split(',')
  ).map((s) => s.trim());

  app.enableCors({
    origin: allowedOrigins.length === 1 ? allowedOrigins[0] : allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    optionsSuccessStatus: 204,
  });

  app.use((_req: Request, res: Response, next: NextFunction) => {
    const existingVary = res.getHeader('Vary');
    const varyVal = Array.isArray(existingVary)
      ? [...existingVary, 'Origin'].join(', ')
      : existingVary
        ? `${existingVary}, Origin`
        : 'Origin';
    res.setHeader('Vary', varyVal);
    next();
  });

  // ---- Global filters & interceptors ----
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(
    new TracingInterceptor(),
    new TransformResponseInterceptor(),
  );

  // ---- Media area: uploads are only served directly as images ----
  await mkdir(uploads.tmpDir, { recursive: true });
  await mkdir(uploads.storageRoot, { recursive: true });
  app.use(
    `${MEDIA_ROUTE}/${uploads.storageDir}`,
    addonMediaGuard(uploads.allowedExts),
  );
  app.useStaticAssets(uploads.mediaRoot, {
    prefix: MEDIA_ROUTE,
    dotfiles: 'deny',
    index: false,
  });

  return { globalPrefix, allowedOrigins };
}
