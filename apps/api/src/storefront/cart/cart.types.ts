import type {
  AttachmentRecord,
  CartItemDisplay,
  CartLineAttachments,
  PersistedLineValues,
  UploadNotice,
} from '@app/addon-uploads/addon-uploads.types';

export const CART_SESSION_STORE = Symbol('CART_SESSION_STORE');

export interface CartLine {
  key: string;
  productId: string;
  quantity: number;
  addonUploads: AttachmentRecord[];
}

/** Shape written to the session store. */
export interface PersistedCartLine extends PersistedLineValues {
  key: string;
  productId: string;
  quantity: number;
}

export interface CartSessionStore {
  load(sessionId: string): Promise<PersistedCartLine[]>;
  save(sessionId: string, lines: readonly CartLine[]): Promise<void>;
  clear(sessionId: string): Promise<void>;
}

export interface CartLineView {
  key: string;
  productId: string;
  quantity: number;
  itemData: CartItemDisplay[];
}

export interface CartView {
  sessionId: string;
  items: CartLineView[];
  itemsCount: number;
}

export interface AddItemResult {
  cart: CartView;
  notices: UploadNotice[];
}

/** Exposes a cart line's attachment list to the add-on seams. */
export function lineAttachments(line: CartLine): CartLineAttachments {
  return {
    getLineAttachments: () => line.addonUploads,
    setLineAttachments: (records) => {
      line.addonUploads = [...records];
    },
  };
}
