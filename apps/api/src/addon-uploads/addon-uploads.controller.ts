import { Controller, Get, Query } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import {
  UPLOAD_FIELD_NAME,
  UPLOAD_TOKEN_ACTION,
  UPLOAD_TOKEN_FIELD_NAME,
} from '@app/addon-uploads/addon-uploads.tokens';
import { AddonEligibilityService } from '@app/addon-uploads/addon-eligibility.service';
import { FormTokenService } from '@app/addon-uploads/form-token.service';
import {
  UploadFieldQueryDto,
  UploadFieldResponseDto,
} from '@app/addon-uploads/dto/upload-field.dto';
import { CartSession } from '@app/common/decorators/cart-session.decorator';

@ApiTags('Add-on Uploads')
@Controller('addon-uploads')
export class AddonUploadsController {
  constructor(
    private readonly eligibility: AddonEligibilityService,
    private readonly formTokens: FormTokenService,
  ) {}

  @Get('field')
  @ApiOperation({
    summary: 'Upload field for a product page.',
    description:
      'Tells the product page whether to render the upload field and hands out the anti-forgery token for it.',
  })
  @ApiOkResponse({ type: UploadFieldResponseDto })
  getField(
    @Query() query: UploadFieldQueryDto,
    @CartSession() sessionId: string,
  ): UploadFieldResponseDto {
    const offered = this.eligibility.isOfferedFor({
      productId: query.productId,
      categoryIds: query.categoryIds ?? [],
    });
    if (!offered) {
      return { enabled: false };
    }

    return {
      enabled: true,
      field: {
        name: UPLOAD_FIELD_NAME,
        accept: 'image/*',
        label: 'Upload an image: ',
        tokenField: UPLOAD_TOKEN_FIELD_NAME,
        token: this.formTokens.issue(UPLOAD_TOKEN_ACTION, sessionId),
      },
    };
  }
}
