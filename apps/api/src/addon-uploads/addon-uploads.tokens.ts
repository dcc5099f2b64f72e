// ==============================
// Injection tokens
// ==============================
export const ADDON_UPLOADS_CONFIG = Symbol('ADDON_UPLOADS_CONFIG');
export const ATTACHMENT_STORAGE = Symbol('ATTACHMENT_STORAGE');

// ==============================
// Fixed names shared by the form, the pipeline and the download gate
// ==============================
export const UPLOAD_FIELD_NAME = 'addon_file';
export const UPLOAD_TOKEN_FIELD_NAME = 'addon_upload_token';
export const UPLOAD_TOKEN_ACTION = 'addon_file_upload';

export const DOWNLOAD_ROUTE = 'admin-post';
export const DOWNLOAD_ACTION = 'addon_secure_download';

/** Name of the access-control stub at the storage root */
export const ACCESS_STUB_NAME = '.htaccess';

export const DEFAULT_ALLOWED_EXTS: readonly string[] = [
  'jpg',
  'jpeg',
  'png',
  'gif',
  'webp',
];

// ==============================
// Config
// ==============================
export interface FormTokenConfig {
  secret: string;
  /** Window in which a token verifies (not single-use) */
  ttlSeconds: number;
}

export interface AddonUploadsConfig {
  /** Master switch for the upload field and the upload pipeline */
  enabled: boolean;

  /** Product ids that get the field; empty = every product */
  productIds: string[];

  /** Category ids that get the field; empty or containing "all" = every category */
  categoryIds: string[];

  /** Allowed file extensions (lowercase, WITHOUT dot) */
  allowedExts: string[];

  /** Host public media area (absolute) */
  mediaRoot: string;

  /** Storage root directory name under the media area */
  storageDir: string;

  /** Absolute storage root (mediaRoot + storageDir) */
  storageRoot: string;

  /** Public URL of the storage root (no trailing slash); informational only */
  storageBaseUrl: string;

  /** Where multer writes uploads before validation */
  tmpDir: string;

  /** Absolute base for generated links (no trailing slash) */
  appBaseUrl: string;

  /** Global route prefix, without slashes ("" when none) */
  routePrefix: string;

  formToken: FormTokenConfig;
}
