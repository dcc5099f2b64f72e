import { Controller, Get, Logger, Query, Res, StreamableFile } from '@nestjs/common';
import {
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiProduces,
  ApiQuery,
  ApiTags,
} from '@nestjs/swagger';
import type { Response } from 'express';
import {
  DOWNLOAD_ACTION,
  DOWNLOAD_ROUTE,
} from '@app/addon-uploads/addon-uploads.tokens';
import { UnauthorizedAccessError } from '@app/addon-uploads/addon-uploads.errors';
import { SecureDownloadService } from '@app/addon-uploads/secure-download.service';

function sanitizeHeaderFilename(value: string): string {
  return value.replace(/[\r\n"]/gu, '').trim() || 'download';
}

@ApiTags('Add-on Uploads')
@Controller()
export class SecureDownloadController {
  private readonly logger = new Logger(SecureDownloadController.name);

  constructor(private readonly downloads: SecureDownloadService) {}

  // Public on purpose: links live in guest order history. Knowing the file
  // name is enough to fetch it.
  @Get(DOWNLOAD_ROUTE)
  @ApiOperation({ summary: 'Download an uploaded add-on file by name.' })
  @ApiQuery({ name: 'action', required: true, enum: [DOWNLOAD_ACTION] })
  @ApiQuery({ name: 'file', required: true, type: String })
  @ApiProduces('application/octet-stream')
  @ApiOkResponse({ description: 'File download stream.' })
  @ApiForbiddenResponse({ description: 'Missing or unknown parameters.' })
  @ApiNotFoundResponse({ description: 'File not found.' })
  async download(
    @Query('action') action: string | undefined,
    @Query('file') file: string | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    if (action !== DOWNLOAD_ACTION || typeof file !== 'string' || file.length === 0) {
      throw new UnauthorizedAccessError();
    }

    const download = await this.downloads.open(file);

    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${sanitizeHeaderFilename(download.fileName)}"`,
    );
    res.setHeader('Content-Length', String(download.size));

    return new StreamableFile(download.stream).setErrorHandler((err, response) => {
      this.logger.error(`download stream failed for ${download.fileName}: ${err.message}`);
      if (response.destroyed) {
        return;
      }
      if (response.headersSent) {
        response.end();
        return;
      }
      response.statusCode = 500;
      response.send('Download failed.');
    });
  }
}
