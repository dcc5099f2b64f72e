import { Inject, Injectable, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { REDIS } from '@app/redis/redis.module';
import type { AttachmentRecord } from '@app/addon-uploads/addon-uploads.types';
import type {
  CartLine,
  CartSessionStore,
  PersistedCartLine,
} from '@app/storefront/cart/cart.types';

export const CART_SESSION_TTL_SECONDS = Symbol('CART_SESSION_TTL_SECONDS');

const cartKey = (sessionId: string) => `cart:${sessionId}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttachment(value: unknown): AttachmentRecord | null {
  if (
    isRecord(value) &&
    typeof value.filePath === 'string' &&
    typeof value.fileUrl === 'string' &&
    typeof value.fileName === 'string'
  ) {
    return {
      filePath: value.filePath,
      fileUrl: value.fileUrl,
      fileName: value.fileName,
    };
  }
  return null;
}

function toPersistedLine(value: unknown): PersistedCartLine | null {
  if (
    !isRecord(value) ||
    typeof value.key !== 'string' ||
    typeof value.productId !== 'string' ||
    typeof value.quantity !== 'number'
  ) {
    return null;
  }
  const line: PersistedCartLine = {
    key: value.key,
    productId: value.productId,
    quantity: value.quantity,
  };
  if (Array.isArray(value.addonUploads)) {
    line.addonUploads = value.addonUploads
      .map(toAttachment)
      .filter((record): record is AttachmentRecord => record !== null);
  }
  return line;
}

/** Decode a stored cart payload; unreadable entries are dropped. */
export function parseCartPayload(raw: string | null): PersistedCartLine[] {
  if (!raw) {
    return [];
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(decoded)) {
    return [];
  }
  return decoded
    .map(toPersistedLine)
    .filter((line): line is PersistedCartLine => line !== null);
}

@Injectable()
export class RedisCartSessionStore implements CartSessionStore {
  private readonly logger = new Logger(RedisCartSessionStore.name);

  constructor(
    @Inject(REDIS) private readonly redis: Redis,
    @Inject(CART_SESSION_TTL_SECONDS) private readonly ttlSeconds: number,
  ) {}

  async load(sessionId: string): Promise<PersistedCartLine[]> {
    const raw = await this.redis.get(cartKey(sessionId));
    const lines = parseCartPayload(raw);
    if (raw && lines.length === 0 && raw !== '[]') {
      this.logger.warn(`discarding unreadable cart session=${sessionId}`);
    }
    return lines;
  }

  async save(sessionId: string, lines: readonly CartLine[]): Promise<void> {
    if (lines.length === 0) {
      await this.clear(sessionId);
      return;
    }
    const payload: PersistedCartLine[] = lines.map((line) => ({
      key: line.key,
      productId: line.productId,
      quantity: line.quantity,
      ...(line.addonUploads.length > 0 ? { addonUploads: line.addonUploads } : {}),
    }));
    await this.redis.set(
      cartKey(sessionId),
      JSON.stringify(payload),
      'EX',
      this.ttlSeconds,
    );
  }

  async clear(sessionId: string): Promise<void> {
    await this.redis.del(cartKey(sessionId));
  }
}
