import type { OrderLineMetadata } from '@app/addon-uploads/addon-uploads.types';

export const ORDER_STORE = Symbol('ORDER_STORE');

export interface OrderMeta {
  key: string;
  value: string;
}

export interface OrderLine {
  productId: string;
  quantity: number;
  meta: OrderMeta[];
}

export interface OrderRecord {
  id: string;
  sessionId: string;
  createdAt: string;
  lines: OrderLine[];
}

export interface OrderStore {
  create(order: OrderRecord): Promise<void>;
  get(id: string): Promise<OrderRecord | null>;
}

export function orderLineMetadata(line: OrderLine): OrderLineMetadata {
  return {
    addOrderMetadata: (key, value) => {
      line.meta.push({ key, value });
    },
  };
}
