import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConsumes,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import {
  UPLOAD_FIELD_NAME,
  UPLOAD_TOKEN_FIELD_NAME,
} from '@app/addon-uploads/addon-uploads.tokens';
import type { UploadDescriptor } from '@app/addon-uploads/addon-uploads.types';
import { CartSession } from '@app/common/decorators/cart-session.decorator';
import { CartService, type CheckoutResult } from '@app/storefront/cart/cart.service';
import type { AddItemResult, CartView } from '@app/storefront/cart/cart.types';
import { AddCartItemDto } from '@app/storefront/cart/dto/add-cart-item.dto';
import { CartQueryDto } from '@app/storefront/cart/dto/cart-query.dto';
import {
  AddCartItemResponseDto,
  CartCheckoutResponseDto,
  CartResponseDto,
} from '@app/storefront/cart/dto/cart-response.dto';

function toDescriptor(file: Express.Multer.File | undefined): UploadDescriptor | null {
  if (!file) {
    return null;
  }
  return {
    originalName: file.originalname,
    tempPath: file.path,
    size: file.size,
  };
}

@ApiTags('Cart')
@Controller('cart')
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get()
  @ApiOperation({ summary: 'Get the current cart.' })
  @ApiOkResponse({ type: CartResponseDto })
  async getCart(
    @Query() query: CartQueryDto,
    @CartSession() sessionId: string,
  ): Promise<CartResponseDto> {
    const cart = await this.cartService.getCart(sessionId, {
      compact: query.compact,
    });
    return this.toCartResponse(cart);
  }

  @Post('items')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor(UPLOAD_FIELD_NAME))
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['productId'],
      properties: {
        productId: { type: 'string', example: 'tee-42' },
        quantity: { type: 'integer', minimum: 1, example: 1 },
        [UPLOAD_TOKEN_FIELD_NAME]: { type: 'string' },
        [UPLOAD_FIELD_NAME]: { type: 'string', format: 'binary' },
      },
    },
  })
  @ApiOperation({
    summary: 'Add a product to the cart, optionally with an uploaded image.',
    description:
      'A rejected upload does not fail the request: the line is added without the image and the reason is returned in `notices`.',
  })
  @ApiOkResponse({ type: AddCartItemResponseDto })
  async addItem(
    @Body() dto: AddCartItemDto,
    @UploadedFile() file: Express.Multer.File | undefined,
    @CartSession() sessionId: string,
  ): Promise<AddCartItemResponseDto> {
    const result = await this.cartService.addItem(sessionId, {
      productId: dto.productId,
      quantity: dto.quantity ?? 1,
      file: toDescriptor(file),
      token: dto.addon_upload_token,
    });
    return this.toAddItemResponse(result);
  }

  @Delete('items/:key')
  @ApiOperation({ summary: 'Remove a cart line and its uploaded image.' })
  @ApiParam({ name: 'key' })
  @ApiOkResponse({ type: CartResponseDto })
  @ApiNotFoundResponse({ description: 'Cart item not found.' })
  async removeItem(
    @Param('key') key: string,
    @CartSession() sessionId: string,
  ): Promise<CartResponseDto> {
    const cart = await this.cartService.removeItem(sessionId, key);
    return this.toCartResponse(cart);
  }

  @Post('checkout')
  @ApiOperation({ summary: 'Place an order from the current cart.' })
  @ApiOkResponse({ type: CartCheckoutResponseDto })
  @ApiBadRequestResponse({ description: 'Cart is empty.' })
  async checkout(@CartSession() sessionId: string): Promise<CartCheckoutResponseDto> {
    const result = await this.cartService.checkout(sessionId);
    return this.toCheckoutResponse(result);
  }

  private toCartResponse(cart: CartView): CartResponseDto {
    return {
      items: cart.items.map((item) => ({
        key: item.key,
        productId: item.productId,
        quantity: item.quantity,
        itemData: item.itemData,
      })),
      itemsCount: cart.itemsCount,
    };
  }

  private toAddItemResponse(result: AddItemResult): AddCartItemResponseDto {
    return {
      cart: this.toCartResponse(result.cart),
      notices: result.notices,
    };
  }

  private toCheckoutResponse(result: CheckoutResult): CartCheckoutResponseDto {
    return {
      orderId: result.order.id,
      itemsCount: result.itemsCount,
    };
  }
}
