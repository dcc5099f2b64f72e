import { posix } from 'node:path';

/** Lowercase extension without the dot ("" when none). */
export function extensionOf(fileName: string): string {
  return posix.extname(fileName).replace(/^\./, '').toLowerCase();
}

/** Base name of a client-supplied name; `\` counts as a separator too. */
export function bareFileName(input: string): string {
  const base = posix.basename(input.replace(/\\/g, '/'));
  return base === '.' || base === '..' ? '' : base;
}

/**
 * Sanitize an uploaded file name for storage.
 * Keeps the (lowercased) extension; everything outside [A-Za-z0-9._-] collapses to "-".
 */
export function sanitizeFileName(input: string): string {
  const base = bareFileName(input)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '');

  const ext = posix.extname(base);
  const stem = base.slice(0, base.length - ext.length);

  const safeStem = stem
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '');
  const safeExt = ext.toLowerCase().replace(/[^a-z0-9.]/g, '');

  return `${safeStem || 'file'}${safeExt}`;
}

/**
 * `<unix-seconds>-<sanitized-name>`.
 * Unique only at second granularity plus name entropy; two uploads of the same
 * name within one second collide.
 */
export function timestampedFileName(originalName: string, nowMs = Date.now()): string {
  return `${Math.floor(nowMs / 1000)}-${sanitizeFileName(originalName)}`;
}
