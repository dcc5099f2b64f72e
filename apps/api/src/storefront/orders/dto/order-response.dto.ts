import { ApiProperty } from '@nestjs/swagger';

export class OrderMetaDto {
  @ApiProperty({ example: 'Uploaded Media' })
  key!: string;

  @ApiProperty({
    example:
      '<a href="http://localhost:4000/api/admin-post?action=addon_secure_download&amp;file=1700000000-photo.png" target="_blank">1700000000-photo.png</a>',
  })
  value!: string;
}

export class OrderLineDto {
  @ApiProperty({ example: 'tee-42' })
  productId!: string;

  @ApiProperty({ example: 1 })
  quantity!: number;

  @ApiProperty({ type: [OrderMetaDto] })
  meta!: OrderMetaDto[];
}

export class OrderResponseDto {
  @ApiProperty({ example: 'b6c9a54d-0df7-4b7e-86d6-fd4c4f1a9b2a' })
  id!: string;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  createdAt!: string;

  @ApiProperty({ type: [OrderLineDto] })
  lines!: OrderLineDto[];
}
