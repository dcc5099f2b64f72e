import {
  Controller,
  Get,
  Inject,
  NotFoundException,
  Param,
} from '@nestjs/common';
import {
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { CartSession } from '@app/common/decorators/cart-session.decorator';
import {
  ORDER_STORE,
  type OrderRecord,
  type OrderStore,
} from '@app/storefront/orders/order.types';
import { OrderResponseDto } from '@app/storefront/orders/dto/order-response.dto';

@ApiTags('Orders')
@Controller('orders')
export class OrdersController {
  constructor(@Inject(ORDER_STORE) private readonly orders: OrderStore) {}

  @Get(':id')
  @ApiOperation({ summary: 'Get an order placed from the current cart session.' })
  @ApiOkResponse({ type: OrderResponseDto })
  @ApiNotFoundResponse({ description: 'Order not found.' })
  async getOrderById(
    @Param('id') orderId: string,
    @CartSession() sessionId: string,
  ): Promise<OrderResponseDto> {
    const order = await this.orders.get(orderId);
    if (!order || order.sessionId !== sessionId) {
      throw new NotFoundException('Order not found.');
    }
    return this.toOrderResponse(order);
  }

  private toOrderResponse(order: OrderRecord): OrderResponseDto {
    return {
      id: order.id,
      createdAt: order.createdAt,
      lines: order.lines.map((line) => ({
        productId: line.productId,
        quantity: line.quantity,
        meta: line.meta.map((entry) => ({ key: entry.key, value: entry.value })),
      })),
    };
  }
}
