import { Inject, Injectable } from '@nestjs/common';
import {
  ADDON_UPLOADS_CONFIG,
  DOWNLOAD_ACTION,
  DOWNLOAD_ROUTE,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import type {
  AttachmentRecord,
  CartItemDisplay,
  CartLineAttachments,
  OrderLineMetadata,
  PersistedLineValues,
} from '@app/addon-uploads/addon-uploads.types';
import { escapeHtml } from '@app/common/utils/html.util';

export const ORDER_META_KEY = 'Uploaded Media';
export const CART_ITEM_LABEL = 'Uploaded File';
export const COMPACT_MARKER = '&#9989;';

/**
 * Carries attachment records along the life of a cart line:
 * add-to-cart → session restore → order line.
 */
@Injectable()
export class AttachmentPropagationService {
  constructor(
    @Inject(ADDON_UPLOADS_CONFIG) private readonly cfg: AddonUploadsConfig,
  ) {}

  augmentCartItem(line: CartLineAttachments, record: AttachmentRecord): void {
    line.setLineAttachments([...line.getLineAttachments(), record]);
  }

  /** Pass-through; the records were checked when they were uploaded. */
  restoreFromSession(line: CartLineAttachments, values: PersistedLineValues): void {
    if (values.addonUploads !== undefined) {
      line.setLineAttachments(values.addonUploads);
    }
  }

  materializeOrderLine(
    orderLine: OrderLineMetadata,
    records: readonly AttachmentRecord[],
  ): void {
    for (const record of records) {
      if (!record.fileUrl) {
        continue;
      }
      const href = escapeHtml(this.downloadUrl(record.fileName));
      orderLine.addOrderMetadata(
        ORDER_META_KEY,
        `<a href="${href}" target="_blank">${escapeHtml(record.fileName)}</a>`,
      );
    }
  }

  /**
   * Rows shown under a cart line. Compact views (block cart/checkout) only get
   * a check mark; the classic cart gets a thumbnail served by the gate.
   */
  describeCartItem(
    records: readonly AttachmentRecord[],
    opts: { compact?: boolean } = {},
  ): CartItemDisplay[] {
    return records.map((record) => {
      if (opts.compact) {
        return { name: CART_ITEM_LABEL, display: COMPACT_MARKER };
      }
      const src = escapeHtml(this.downloadUrl(record.fileName));
      return {
        name: CART_ITEM_LABEL,
        display: `<img src="${src}" alt="${escapeHtml(CART_ITEM_LABEL)}" class="addon-upload-img" style="width:150px;height:150px;" />`,
      };
    });
  }

  /** Absolute URL of the download gate for one stored file. */
  downloadUrl(fileName: string): string {
    const path = [this.cfg.routePrefix, DOWNLOAD_ROUTE]
      .filter((segment) => segment.length > 0)
      .join('/');
    const url = new URL(`${this.cfg.appBaseUrl}/${path}`);
    url.searchParams.set('action', DOWNLOAD_ACTION);
    url.searchParams.set('file', fileName);
    return url.toString();
  }
}
