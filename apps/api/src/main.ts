import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { AppModule } from '@app/app.module';
import { configureApp } from '@app/app.setup';
import {
  ADDON_UPLOADS_CONFIG,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  const bootstrapLogger = new Logger('Bootstrap');
  const config = app.get(ConfigService);
  const uploads = app.get<AddonUploadsConfig>(ADDON_UPLOADS_CONFIG);
  const isProduction =
    (config.get<string>('NODE_ENV') || '').toLowerCase() === 'production';

  app.useLogger(bootstrapLogger);
  app.flushLogs();

  // ---- Trust proxy in production (for correct req.secure / HTTPS) ----
  if (isProduction) {
    app.set('trust proxy', 1);
  }

  app.enableShutdownHooks();

  const { globalPrefix, allowedOrigins } = await configureApp(app, config, uploads);

  // ---- Swagger (only non-production) ----
  const docsPath = `${globalPrefix ? `/${globalPrefix}` : ''}/docs`;
  if (!isProduction) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Product Add-on Uploads API')
      .setDescription(
        'Cart line image uploads, cart and order flow, and the gated download endpoint.',
      )
      .setVersion('1.0.0')
      .addCookieAuth('cart_session', {
        type: 'apiKey',
        in: 'cookie',
        name: 'cart_session',
      })
      .build();

    const swaggerDocument = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup(docsPath, app, swaggerDocument);
  }

  // ---- Listen ----
  const port = config.get<number>('PORT') ?? 4000;
  await app.listen(port, '0.0.0.0');

  const appUrl = await app.getUrl();
  bootstrapLogger.log(`Application running at ${appUrl}`);
  if (!isProduction) {
    bootstrapLogger.log(`Swagger Docs available at ${appUrl}${docsPath}`);
  }
  bootstrapLogger.log(
    `Add-on uploads ${uploads.enabled ? 'enabled' : 'disabled'} root=${uploads.storageRoot}`,
  );
  bootstrapLogger.log(`Allowed CORS Origins: ${allowedOrigins.join(', ')}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  if (error instanceof Error) {
    logger.error('Failed to start application', error.stack);
  } else {
    logger.error(`Failed to start application: ${String(error)}`);
  }
  process.exitCode = 1;
});
