import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { Inject, Injectable } from '@nestjs/common';
import {
  ADDON_UPLOADS_CONFIG,
  ATTACHMENT_STORAGE,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import type { AttachmentStorage } from '@app/addon-uploads/addon-uploads.types';
import { NotFoundError } from '@app/addon-uploads/addon-uploads.errors';
import { bareFileName } from '@app/addon-uploads/utils/file-name.util';

export interface SecureDownload {
  fileName: string;
  size: number;
  stream: Readable;
}

@Injectable()
export class SecureDownloadService {
  constructor(
    @Inject(ADDON_UPLOADS_CONFIG) private readonly cfg: AddonUploadsConfig,
    @Inject(ATTACHMENT_STORAGE) private readonly storage: AttachmentStorage,
  ) {}

  /**
   * Map a requested name onto the storage root.
   * The input is reduced to its base name first, so `../x` or `/etc/x` can only
   * ever name a file directly inside the root. Hidden files (the access stub)
   * and names with NUL bytes never resolve.
   */
  resolvePath(requested: string): string | null {
    const name = bareFileName(requested);
    if (!name || name.startsWith('.') || name.includes('\0')) {
      return null;
    }
    return join(this.cfg.storageRoot, name);
  }

  async open(requested: string): Promise<SecureDownload> {
    const filePath = this.resolvePath(requested);
    if (!filePath) {
      throw new NotFoundError();
    }

    const info = await this.storage.stat(filePath);
    if (!info || !info.isFile) {
      throw new NotFoundError();
    }

    return {
      fileName: bareFileName(filePath),
      size: info.size,
      stream: this.storage.openRead(filePath),
    };
  }
}
