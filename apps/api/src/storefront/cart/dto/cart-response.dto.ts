import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CartItemDataDto {
  @ApiProperty({ example: 'Uploaded File' })
  name!: string;

  @ApiProperty({ example: '&#9989;' })
  display!: string;
}

export class CartItemDto {
  @ApiProperty({ example: '0b8f3f7e-2b6a-4a1d-9d55-1d2c3b4a5f60' })
  key!: string;

  @ApiProperty({ example: 'tee-42' })
  productId!: string;

  @ApiProperty({ example: 1 })
  quantity!: number;

  @ApiProperty({ type: [CartItemDataDto] })
  itemData!: CartItemDataDto[];
}

export class CartResponseDto {
  @ApiProperty({ type: [CartItemDto] })
  items!: CartItemDto[];

  @ApiProperty({ example: 1 })
  itemsCount!: number;
}

export class CartNoticeDto {
  @ApiProperty({ example: 'error' })
  level!: 'error';

  @ApiProperty({ example: 'INVALID_FILE_TYPE' })
  code!: string;

  @ApiProperty({ example: 'Invalid file type. Allowed types: jpg, jpeg, png, gif, webp.' })
  message!: string;
}

export class AddCartItemResponseDto {
  @ApiProperty({ type: CartResponseDto })
  cart!: CartResponseDto;

  @ApiPropertyOptional({ type: [CartNoticeDto] })
  notices!: CartNoticeDto[];
}

export class CartCheckoutResponseDto {
  @ApiProperty({ example: 'b6c9a54d-0df7-4b7e-86d6-fd4c4f1a9b2a' })
  orderId!: string;

  @ApiProperty({ example: 1 })
  itemsCount!: number;
}
