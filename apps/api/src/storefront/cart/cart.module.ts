import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { AddonUploadsModule } from '@app/addon-uploads/addon-uploads.module';
import {
  ADDON_UPLOADS_CONFIG,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import { OrdersModule } from '@app/storefront/orders/orders.module';
import { CartController } from '@app/storefront/cart/cart.controller';
import { CartService } from '@app/storefront/cart/cart.service';
import {
  CART_SESSION_TTL_SECONDS,
  RedisCartSessionStore,
} from '@app/storefront/cart/cart-session.store';
import { CART_SESSION_STORE } from '@app/storefront/cart/cart.types';

@Module({
  imports: [
    AddonUploadsModule,
    OrdersModule,
    MulterModule.registerAsync({
      imports: [AddonUploadsModule],
      inject: [ADDON_UPLOADS_CONFIG],
      // multer names temp files itself; the store renames them on admission
      useFactory: (cfg: AddonUploadsConfig) => ({
        dest: cfg.tmpDir,
        limits: { files: 1, fields: 16 },
      }),
    }),
  ],
  controllers: [CartController],
  providers: [
    CartService,
    {
      provide: CART_SESSION_TTL_SECONDS,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        Number(config.get('CART_SESSION_TTL_SECONDS') ?? 172800),
    },
    { provide: CART_SESSION_STORE, useClass: RedisCartSessionStore },
  ],
  exports: [CartService],
})
export class CartModule {}
