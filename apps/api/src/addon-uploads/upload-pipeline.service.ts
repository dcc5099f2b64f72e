import { Inject, Injectable, Logger } from '@nestjs/common';
import { ATTACHMENT_STORAGE } from '@app/addon-uploads/addon-uploads.tokens';
import type {
  AttachmentStorage,
  CartLineAttachments,
  UploadOutcome,
  UploadSubmission,
} from '@app/addon-uploads/addon-uploads.types';
import { isUploadRejection } from '@app/addon-uploads/addon-uploads.errors';
import { AddonEligibilityService } from '@app/addon-uploads/addon-eligibility.service';
import { UploadValidatorService } from '@app/addon-uploads/upload-validator.service';
import { AttachmentStoreService } from '@app/addon-uploads/attachment-store.service';
import { AttachmentPropagationService } from '@app/addon-uploads/attachment-propagation.service';

/**
 * One add-to-cart upload: validate → store → attach to the cart line.
 * Rejections come back as a notice; the cart line itself is never blocked.
 */
@Injectable()
export class UploadPipelineService {
  private readonly logger = new Logger(UploadPipelineService.name);

  constructor(
    private readonly eligibility: AddonEligibilityService,
    private readonly validator: UploadValidatorService,
    private readonly store: AttachmentStoreService,
    private readonly propagation: AttachmentPropagationService,
    @Inject(ATTACHMENT_STORAGE) private readonly storage: AttachmentStorage,
  ) {}

  async attachUpload(
    line: CartLineAttachments,
    submission: UploadSubmission,
  ): Promise<UploadOutcome> {
    const tempPath = submission.file?.tempPath;
    let moved = false;

    try {
      if (!this.eligibility.enabled) {
        return {};
      }

      const admitted = await this.validator.validate(submission);
      if (!admitted) {
        return {};
      }

      const record = await this.store.store(admitted);
      moved = true;
      this.propagation.augmentCartItem(line, record);
      this.logger.log(`attachment stored file=${record.fileName}`);
      return { record };
    } catch (error) {
      if (isUploadRejection(error)) {
        this.logger.warn(`upload rejected code=${error.code} message=${error.message}`);
        return {
          notice: { level: 'error', code: error.code, message: error.message },
        };
      }
      throw error;
    } finally {
      if (tempPath && !moved) {
        await this.discardTemp(tempPath);
      }
    }
  }

  private async discardTemp(tempPath: string): Promise<void> {
    try {
      await this.storage.remove(tempPath);
    } catch (error) {
      this.logger.warn(
        `failed to discard temp upload: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
