import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

export class CartQueryDto {
  @ApiPropertyOptional({
    description: 'Compact item data for block-based cart and checkout views',
    example: false,
  })
  @IsOptional()
  // read the raw query value; implicit conversion turns 'false' into true
  @Transform(({ obj, key }) => {
    const raw: unknown = obj[key];
    return raw === true || raw === 'true' || raw === '1';
  })
  @IsBoolean()
  compact?: boolean;
}
