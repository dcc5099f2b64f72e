import { join } from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ACCESS_STUB_NAME,
  ADDON_UPLOADS_CONFIG,
  ATTACHMENT_STORAGE,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import type {
  AdmittedFile,
  AttachmentRecord,
  AttachmentStorage,
} from '@app/addon-uploads/addon-uploads.types';
import {
  DeletionError,
  NotFoundError,
  StorageError,
} from '@app/addon-uploads/addon-uploads.errors';
import { buildAccessStub } from '@app/addon-uploads/access-policy';
import { timestampedFileName } from '@app/addon-uploads/utils/file-name.util';
import { errorCode, errorMessage } from '@app/common/utils/error.util';

@Injectable()
export class AttachmentStoreService {
  private readonly logger = new Logger(AttachmentStoreService.name);

  constructor(
    @Inject(ADDON_UPLOADS_CONFIG) private readonly cfg: AddonUploadsConfig,
    @Inject(ATTACHMENT_STORAGE) private readonly storage: AttachmentStorage,
  ) {}

  /** Persist an admitted upload under the storage root. */
  async store(file: AdmittedFile): Promise<AttachmentRecord> {
    const root = this.cfg.storageRoot;

    try {
      await this.storage.ensureDir(root);
    } catch (error) {
      this.logger.error(`failed to create storage root: ${errorMessage(error)}`);
      throw new StorageError('Failed to create upload directory.');
    }

    await this.ensureAccessStub(root);

    const fileName = timestampedFileName(file.originalName);
    const filePath = join(root, fileName);

    // a same-second, same-name upload may already own this path
    let occupied = true;
    try {
      occupied = await this.storage.exists(filePath);
      await this.storage.move(file.tempPath, filePath);
    } catch (error) {
      this.logger.error(`failed to move upload to ${fileName}: ${errorMessage(error)}`);
      if (!occupied) {
        await this.storage.remove(filePath).catch((cleanupError: unknown) => {
          this.logger.warn(
            `failed to remove partial file ${fileName}: ${errorMessage(cleanupError)}`,
          );
        });
      }
      throw new StorageError('Failed to move file to the upload folder.');
    }

    return {
      filePath,
      fileUrl: `${this.cfg.storageBaseUrl}/${encodeURIComponent(fileName)}`,
      fileName,
    };
  }

  /**
   * Delete a stored attachment by the absolute path recorded at upload time.
   * The path is trusted (it came from store()); callers passing external
   * input must re-validate it first.
   */
  async deleteStoredFile(filePath: string): Promise<void> {
    if (!(await this.storage.exists(filePath))) {
      throw new NotFoundError('Invalid file or file does not exist.');
    }

    let removed: boolean;
    try {
      removed = await this.storage.remove(filePath);
    } catch (error) {
      this.logger.error(`failed to delete ${filePath}: ${errorMessage(error)}`);
      throw new DeletionError();
    }
    if (!removed) {
      // deleted by someone else between the two calls
      throw new NotFoundError('Invalid file or file does not exist.');
    }
  }

  /** Create-if-absent; never rewrites an existing stub. */
  private async ensureAccessStub(root: string): Promise<void> {
    const stubPath = join(root, ACCESS_STUB_NAME);
    if (await this.storage.exists(stubPath)) {
      return;
    }
    try {
      await this.storage.write(stubPath, buildAccessStub(this.cfg.allowedExts), {
        exclusive: true,
      });
      this.logger.log(`access stub created at ${stubPath}`);
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return;
      }
      this.logger.warn(`failed to write access stub: ${errorMessage(error)}`);
    }
  }
}
