/** `code` of a Node system error (ENOENT, EXDEV, ...), if the value carries one. */
export const errorCode = (error: unknown): unknown =>
  error && typeof error === 'object' && 'code' in error ? error.code : undefined;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
