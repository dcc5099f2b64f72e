import { Inject, Injectable } from '@nestjs/common';
import {
  ADDON_UPLOADS_CONFIG,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';

export const ALL_CATEGORIES = 'all';

export interface ProductContext {
  productId: string;
  categoryIds: string[];
}

/** Decides whether a product page offers the upload field. */
@Injectable()
export class AddonEligibilityService {
  constructor(
    @Inject(ADDON_UPLOADS_CONFIG) private readonly cfg: AddonUploadsConfig,
  ) {}

  get enabled(): boolean {
    return this.cfg.enabled;
  }

  isOfferedFor(product: ProductContext): boolean {
    return (
      this.cfg.enabled &&
      this.productAllowed(product.productId) &&
      this.categoryAllowed(product.categoryIds)
    );
  }

  productAllowed(productId: string): boolean {
    const ids = this.cfg.productIds;
    return ids.length === 0 || ids.includes(productId);
  }

  /** Empty allow-list or the "all" sentinel lets every category pass. */
  categoryAllowed(categoryIds: readonly string[]): boolean {
    const allowed = this.cfg.categoryIds;
    if (allowed.length === 0 || allowed.includes(ALL_CATEGORIES)) {
      return true;
    }
    return categoryIds.some((id) => allowed.includes(id));
  }
}
