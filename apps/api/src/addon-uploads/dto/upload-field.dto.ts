import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, type TransformFnParams } from 'class-transformer';
import { IsArray, IsOptional, IsString, MaxLength } from 'class-validator';

const toIdList = ({ value }: TransformFnParams): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => String(item).trim()).filter(Boolean);
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return value;
};

export class UploadFieldQueryDto {
  @ApiProperty({ example: '1024' })
  @IsString()
  @MaxLength(32)
  productId!: string;

  @ApiPropertyOptional({
    description: 'CSV of the product category ids',
    example: '12,15',
    type: String,
  })
  @IsOptional()
  @Transform(toIdList)
  @IsArray()
  @IsString({ each: true })
  categoryIds?: string[];
}

export class UploadFieldDto {
  @ApiProperty({ example: 'addon_file' })
  name!: string;

  @ApiProperty({ example: 'image/*' })
  accept!: string;

  @ApiProperty({ example: 'Upload an image: ' })
  label!: string;

  @ApiProperty({ example: 'addon_upload_token' })
  tokenField!: string;

  @ApiProperty({ description: 'Anti-forgery token bound to the cart session' })
  token!: string;
}

export class UploadFieldResponseDto {
  @ApiProperty({ example: true })
  enabled!: boolean;

  @ApiPropertyOptional({ type: UploadFieldDto })
  field?: UploadFieldDto;
}
