import { Module } from '@nestjs/common';
import { OrdersController } from '@app/storefront/orders/orders.controller';
import { RedisOrderStore } from '@app/storefront/orders/order.store';
import { ORDER_STORE } from '@app/storefront/orders/order.types';

@Module({
  controllers: [OrdersController],
  providers: [{ provide: ORDER_STORE, useClass: RedisOrderStore }],
  exports: [ORDER_STORE],
})
export class OrdersModule {}
