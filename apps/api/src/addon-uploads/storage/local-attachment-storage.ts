import { createReadStream } from 'node:fs';
import {
  copyFile,
  mkdir,
  rename,
  stat,
  unlink,
  writeFile,
} from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { Injectable } from '@nestjs/common';
import type {
  AttachmentStorage,
  StoredFileStat,
  WriteOptions,
} from '@app/addon-uploads/addon-uploads.types';
import { errorCode } from '@app/common/utils/error.util';

/** Local filesystem implementation of the attachment storage seam. */
@Injectable()
export class LocalAttachmentStorage implements AttachmentStorage {
  async ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
  }

  async exists(path: string): Promise<boolean> {
    return (await this.stat(path)) !== null;
  }

  async write(
    path: string,
    contents: string | Buffer,
    opts: WriteOptions = {},
  ): Promise<void> {
    await writeFile(path, contents, {
      flag: opts.exclusive ? 'wx' : 'w',
      mode: 0o644,
    });
  }

  async move(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch (error) {
      // tmp dir on another device
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
      await copyFile(from, to);
      await unlink(from);
    }
  }

  async remove(path: string): Promise<boolean> {
    try {
      await unlink(path);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async stat(path: string): Promise<StoredFileStat | null> {
    try {
      const info = await stat(path);
      return { size: info.size, isFile: info.isFile() };
    } catch (error) {
      if (errorCode(error) === 'ENOENT' || errorCode(error) === 'ENOTDIR') {
        return null;
      }
      throw error;
    }
  }

  openRead(path: string): Readable {
    return createReadStream(path);
  }
}
