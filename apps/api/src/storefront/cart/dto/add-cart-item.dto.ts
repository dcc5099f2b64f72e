import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, MaxLength, Min, MinLength } from 'class-validator';

/** Multipart body of the add-to-cart form. */
export class AddCartItemDto {
  @ApiProperty({ example: 'tee-42' })
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  productId!: string;

  @ApiPropertyOptional({ example: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  quantity?: number;

  @ApiPropertyOptional({ description: 'Anti-forgery token from GET /addon-uploads/field' })
  @IsOptional()
  @IsString()
  @MaxLength(2048)
  addon_upload_token?: string;
}
