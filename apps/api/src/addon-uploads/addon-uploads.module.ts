import { Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ADDON_UPLOADS_CONFIG,
  ATTACHMENT_STORAGE,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import { LocalAttachmentStorage } from '@app/addon-uploads/storage/local-attachment-storage';
import { FormTokenService } from '@app/addon-uploads/form-token.service';
import { UploadValidatorService } from '@app/addon-uploads/upload-validator.service';
import { AttachmentStoreService } from '@app/addon-uploads/attachment-store.service';
import { AttachmentPropagationService } from '@app/addon-uploads/attachment-propagation.service';
import { CartCleanupService } from '@app/addon-uploads/cart-cleanup.service';
import { AddonEligibilityService } from '@app/addon-uploads/addon-eligibility.service';
import { UploadPipelineService } from '@app/addon-uploads/upload-pipeline.service';
import { SecureDownloadService } from '@app/addon-uploads/secure-download.service';
import { SecureDownloadController } from '@app/addon-uploads/secure-download.controller';
import { AddonUploadsController } from '@app/addon-uploads/addon-uploads.controller';

const addonUploadsConfigProvider: Provider = {
  provide: ADDON_UPLOADS_CONFIG,
  inject: [ConfigService],
  useFactory: (config: ConfigService): AddonUploadsConfig => {
    const cfg = config.get<AddonUploadsConfig>('addonUploads');
    if (!cfg) {
      throw new Error('[AddonUploadsModule] addonUploads configuration is not loaded');
    }
    return Object.freeze({
      ...cfg,
      productIds: [...cfg.productIds],
      categoryIds: [...cfg.categoryIds],
      allowedExts: [...cfg.allowedExts],
    });
  },
};

const attachmentStorageProvider: Provider = {
  provide: ATTACHMENT_STORAGE,
  useClass: LocalAttachmentStorage,
};

@Module({
  controllers: [AddonUploadsController, SecureDownloadController],
  providers: [
    addonUploadsConfigProvider,
    attachmentStorageProvider,
    FormTokenService,
    UploadValidatorService,
    AttachmentStoreService,
    AttachmentPropagationService,
    CartCleanupService,
    AddonEligibilityService,
    UploadPipelineService,
    SecureDownloadService,
  ],
  exports: [
    ADDON_UPLOADS_CONFIG,
    AttachmentPropagationService,
    CartCleanupService,
    UploadPipelineService,
  ],
})
export class AddonUploadsModule {}
