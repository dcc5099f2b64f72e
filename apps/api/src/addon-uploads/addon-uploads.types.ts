import type { Readable } from 'node:stream';

/** Durable reference to one stored upload; travels cart → session → order. */
export interface AttachmentRecord {
  /** Absolute path under the storage root */
  filePath: string;
  /** Public URL of the file (informational; downloads go through the gate) */
  fileUrl: string;
  /** `<unix-seconds>-<sanitized-original-name>` */
  fileName: string;
}

/** Raw multipart file as handed over by the HTTP layer. */
export interface UploadDescriptor {
  originalName: string;
  /** Temporary location written by the multipart parser */
  tempPath: string;
  /** Declared size in bytes */
  size: number;
}

/** A file that passed the token and type checks but is not persisted yet. */
export interface AdmittedFile extends UploadDescriptor {
  /** Lowercase, without dot */
  extension: string;
  /** Sniffed from content */
  mimeType: string;
}

export interface UploadNotice {
  level: 'error';
  code: string;
  message: string;
}

export interface UploadSubmission {
  file?: UploadDescriptor | null;
  token?: string | null;
  /** Cart session the form token was issued for */
  sessionId: string;
}

export interface UploadOutcome {
  record?: AttachmentRecord;
  notice?: UploadNotice;
}

/** Display row for a cart line (cart page / mini-cart). */
export interface CartItemDisplay {
  name: string;
  display: string;
}

export type CleanupOutcome = 'none' | 'deleted' | 'missing' | 'failed';

// ==============================
// Host seams
// ==============================

/** Narrow view of a host cart line. */
export interface CartLineAttachments {
  getLineAttachments(): AttachmentRecord[];
  setLineAttachments(records: AttachmentRecord[]): void;
}

/** Persisted cart line values as read back from the session. */
export interface PersistedLineValues {
  addonUploads?: AttachmentRecord[];
}

/** Narrow view of a host order line being created at checkout. */
export interface OrderLineMetadata {
  addOrderMetadata(key: string, value: string): void;
}

// ==============================
// Filesystem seam
// ==============================

export interface StoredFileStat {
  size: number;
  isFile: boolean;
}

export interface WriteOptions {
  /** Fail with EEXIST instead of overwriting */
  exclusive?: boolean;
}

export interface AttachmentStorage {
  ensureDir(dir: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  write(path: string, contents: string | Buffer, opts?: WriteOptions): Promise<void>;
  /** Move bytes from `from` to `to`, replacing `to` */
  move(from: string, to: string): Promise<void>;
  /** Remove a file; resolves false when it was already gone */
  remove(path: string): Promise<boolean>;
  /** null when nothing exists at `path` */
  stat(path: string): Promise<StoredFileStat | null>;
  openRead(path: string): Readable;
}
