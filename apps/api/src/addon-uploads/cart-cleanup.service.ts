import { Injectable, Logger } from '@nestjs/common';
import type {
  CartLineAttachments,
  CleanupOutcome,
} from '@app/addon-uploads/addon-uploads.types';
import { DeletionError, NotFoundError } from '@app/addon-uploads/addon-uploads.errors';
import { AttachmentStoreService } from '@app/addon-uploads/attachment-store.service';

@Injectable()
export class CartCleanupService {
  private readonly logger = new Logger(CartCleanupService.name);

  constructor(private readonly store: AttachmentStoreService) {}

  /**
   * Delete the stored file of a cart line removed before checkout.
   * Never throws: a failed deletion must not block the cart removal.
   */
  async onCartLineRemoved(line: CartLineAttachments): Promise<CleanupOutcome> {
    const filePath = line.getLineAttachments()[0]?.filePath;
    if (!filePath) {
      return 'none';
    }

    try {
      await this.store.deleteStoredFile(filePath);
      return 'deleted';
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn(`cleanup skipped, file already gone: ${filePath}`);
        return 'missing';
      }
      if (error instanceof DeletionError) {
        this.logger.error(`cleanup failed for ${filePath}: ${error.message}`);
        return 'failed';
      }
      this.logger.error(
        `unexpected cleanup failure for ${filePath}`,
        error instanceof Error ? error.stack : String(error),
      );
      return 'failed';
    }
  }
}
