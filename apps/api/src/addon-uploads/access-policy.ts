import type { NextFunction, Request, Response } from 'express';
import { DOWNLOAD_ROUTE } from '@app/addon-uploads/addon-uploads.tokens';
import { extensionOf } from '@app/addon-uploads/utils/file-name.util';

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Directory-level access file written once at the storage root.
 * Only honoured by hosts that read such files; addonMediaGuard applies the
 * same policy inside this process.
 */
export function buildAccessStub(allowedExts: readonly string[]): string {
  const exts = allowedExts.map(escapeRegex).join('|');
  return [
    '# Deny direct access to everything in this directory',
    'Require all denied',
    '',
    '# Images may still be embedded (e.g. <img> tags)',
    `<FilesMatch "(?i)\\.(${exts})$">`,
    '  Require all granted',
    '</FilesMatch>',
    '',
    '# Secure download entry point',
    `<FilesMatch "^${escapeRegex(DOWNLOAD_ROUTE)}$">`,
    '  Require all granted',
    '</FilesMatch>',
    '',
  ].join('\n');
}

/** Whether a file under the storage root may be fetched directly. */
export function isDirectlyServable(
  fileName: string,
  allowedExts: readonly string[],
): boolean {
  if (fileName.startsWith('.')) {
    return false;
  }
  const ext = extensionOf(fileName);
  return ext.length > 0 && allowedExts.includes(ext);
}

/**
 * Express middleware mounted on the static route of the storage root.
 * Everything that is not an allowed image is answered with 403.
 */
export function addonMediaGuard(allowedExts: readonly string[]) {
  const exts = allowedExts.map((ext) => ext.toLowerCase());
  return (req: Request, res: Response, next: NextFunction): void => {
    let requested: string;
    try {
      requested = decodeURIComponent(req.path);
    } catch {
      res.status(400).end();
      return;
    }
    const segments = requested.split('/').filter((s) => s.length > 0);
    const last = segments[segments.length - 1] ?? '';
    if (segments.length !== 1 || !isDirectlyServable(last, exts)) {
      res.status(403).json({
        success: false,
        error: { code: 'FORBIDDEN', message: 'Direct access is not allowed.' },
      });
      return;
    }
    next();
  };
}
