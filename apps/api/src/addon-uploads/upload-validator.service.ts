import { Inject, Injectable, Logger } from '@nestjs/common';
import { fromFile } from 'file-type';
import {
  ADDON_UPLOADS_CONFIG,
  UPLOAD_TOKEN_ACTION,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import type {
  AdmittedFile,
  UploadSubmission,
} from '@app/addon-uploads/addon-uploads.types';
import { InvalidTypeError, SecurityError } from '@app/addon-uploads/addon-uploads.errors';
import { FormTokenService } from '@app/addon-uploads/form-token.service';
import { extensionOf } from '@app/addon-uploads/utils/file-name.util';

const EXTENSION_NORMALIZATION_MAP: Record<string, string> = {
  jpeg: 'jpg',
  jpe: 'jpg',
  tif: 'tiff',
};

const normalizeExt = (ext: string): string => {
  const lower = ext.toLowerCase();
  return EXTENSION_NORMALIZATION_MAP[lower] ?? lower;
};

@Injectable()
export class UploadValidatorService {
  private readonly logger = new Logger(UploadValidatorService.name);
  private readonly allowedExts: ReadonlySet<string>;

  constructor(
    @Inject(ADDON_UPLOADS_CONFIG) private readonly cfg: AddonUploadsConfig,
    private readonly formTokens: FormTokenService,
  ) {
    this.allowedExts = new Set(cfg.allowedExts.map((ext) => ext.toLowerCase()));
  }

  /**
   * Admit an uploaded file or explain why not.
   * Resolves null when the submission carries no file at all.
   */
  async validate(submission: UploadSubmission): Promise<AdmittedFile | null> {
    const file = submission.file;
    if (!file || !file.originalName) {
      return null;
    }

    if (
      !this.formTokens.verify(
        submission.token,
        UPLOAD_TOKEN_ACTION,
        submission.sessionId,
      )
    ) {
      throw new SecurityError();
    }

    const extension = extensionOf(file.originalName);
    if (!extension || !this.allowedExts.has(extension)) {
      throw new InvalidTypeError(this.cfg.allowedExts);
    }

    const detected = await fromFile(file.tempPath).catch((error: unknown) => {
      this.logger.warn(
        `content sniff failed for ${extension} upload: ${error instanceof Error ? error.message : String(error)}`,
      );
      return undefined;
    });
    if (!detected || normalizeExt(detected.ext) !== normalizeExt(extension)) {
      this.logger.warn(
        `content mismatch: claimed=${extension} detected=${detected?.ext ?? 'unknown'}`,
      );
      throw new InvalidTypeError(this.cfg.allowedExts);
    }

    return {
      originalName: file.originalName,
      tempPath: file.tempPath,
      size: file.size,
      extension,
      mimeType: detected.mime,
    };
  }
}
