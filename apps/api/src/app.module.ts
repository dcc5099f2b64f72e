import { Module } from '@nestjs/common';
import { AppConfigModule } from '@app/config/config.module';
import { RedisModule } from '@app/redis/redis.module';
import { AddonUploadsModule } from '@app/addon-uploads/addon-uploads.module';
import { StorefrontModule } from '@app/storefront/storefront.module';

@Module({
  imports: [AppConfigModule, RedisModule, AddonUploadsModule, StorefrontModule],
})
export class AppModule {}
