import { Module } from '@nestjs/common';
import { CartModule } from '@app/storefront/cart/cart.module';
import { OrdersModule } from '@app/storefront/orders/orders.module';

/** Minimal host cart and order flow the add-on plugs into. */
@Module({
  imports: [CartModule, OrdersModule],
})
export class StorefrontModule {}
