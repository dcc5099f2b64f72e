import { Inject, Injectable } from '@nestjs/common';
import type Redis from 'ioredis';
import { REDIS } from '@app/redis/redis.module';
import type {
  OrderLine,
  OrderMeta,
  OrderRecord,
  OrderStore,
} from '@app/storefront/orders/order.types';

const orderKey = (id: string) => `order:${id}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMeta(value: unknown): OrderMeta[] {
  if (!isRecord(value) || typeof value.key !== 'string' || typeof value.value !== 'string') {
    return [];
  }
  return [{ key: value.key, value: value.value }];
}

function toLine(value: unknown): OrderLine[] {
  if (
    !isRecord(value) ||
    typeof value.productId !== 'string' ||
    typeof value.quantity !== 'number'
  ) {
    return [];
  }
  return [
    {
      productId: value.productId,
      quantity: value.quantity,
      meta: Array.isArray(value.meta) ? value.meta.flatMap(toMeta) : [],
    },
  ];
}

export function parseOrderPayload(raw: string | null): OrderRecord | null {
  if (!raw) {
    return null;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    !isRecord(decoded) ||
    typeof decoded.id !== 'string' ||
    typeof decoded.sessionId !== 'string' ||
    typeof decoded.createdAt !== 'string'
  ) {
    return null;
  }
  return {
    id: decoded.id,
    sessionId: decoded.sessionId,
    createdAt: decoded.createdAt,
    lines: Array.isArray(decoded.lines) ? decoded.lines.flatMap(toLine) : [],
  };
}

@Injectable()
export class RedisOrderStore implements OrderStore {
  constructor(@Inject(REDIS) private readonly redis: Redis) {}

  async create(order: OrderRecord): Promise<void> {
    await this.redis.set(orderKey(order.id), JSON.stringify(order));
  }

  async get(id: string): Promise<OrderRecord | null> {
    return parseOrderPayload(await this.redis.get(orderKey(id)));
  }
}
