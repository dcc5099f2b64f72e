import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { UploadDescriptor, UploadNotice } from '@app/addon-uploads/addon-uploads.types';
import { AttachmentPropagationService } from '@app/addon-uploads/attachment-propagation.service';
import { CartCleanupService } from '@app/addon-uploads/cart-cleanup.service';
import { UploadPipelineService } from '@app/addon-uploads/upload-pipeline.service';
import {
  CART_SESSION_STORE,
  lineAttachments,
  type AddItemResult,
  type CartLine,
  type CartSessionStore,
  type CartView,
} from '@app/storefront/cart/cart.types';
import {
  ORDER_STORE,
  orderLineMetadata,
  type OrderLine,
  type OrderRecord,
  type OrderStore,
} from '@app/storefront/orders/order.types';

export interface AddItemInput {
  productId: string;
  quantity: number;
  file?: UploadDescriptor | null;
  token?: string | null;
}

export interface CheckoutResult {
  order: OrderRecord;
  itemsCount: number;
}

@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    @Inject(CART_SESSION_STORE) private readonly carts: CartSessionStore,
    @Inject(ORDER_STORE) private readonly orders: OrderStore,
    private readonly pipeline: UploadPipelineService,
    private readonly propagation: AttachmentPropagationService,
    private readonly cleanup: CartCleanupService,
  ) {}

  async getCart(sessionId: string, opts: { compact?: boolean } = {}): Promise<CartView> {
    const lines = await this.loadLines(sessionId);
    return this.toView(sessionId, lines, opts.compact);
  }

  async addItem(sessionId: string, input: AddItemInput): Promise<AddItemResult> {
    const lines = await this.loadLines(sessionId);
    const line: CartLine = {
      key: randomUUID(),
      productId: input.productId,
      quantity: input.quantity,
      addonUploads: [],
    };

    const outcome = await this.pipeline.attachUpload(lineAttachments(line), {
      file: input.file,
      token: input.token,
      sessionId,
    });
    const notices: UploadNotice[] = outcome.notice ? [outcome.notice] : [];

    // an attachment makes the line unique; plain lines of one product merge
    const mergeTarget =
      line.addonUploads.length === 0
        ? lines.find(
            (existing) =>
              existing.productId === line.productId &&
              existing.addonUploads.length === 0,
          )
        : undefined;

    if (mergeTarget) {
      mergeTarget.quantity += line.quantity;
    } else {
      lines.push(line);
    }

    await this.carts.save(sessionId, lines);
    return { cart: this.toView(sessionId, lines), notices };
  }

  async removeItem(sessionId: string, key: string): Promise<CartView> {
    const lines = await this.loadLines(sessionId);
    const index = lines.findIndex((line) => line.key === key);
    if (index === -1) {
      throw new NotFoundException('Cart item not found.');
    }

    const [removed] = lines.splice(index, 1);
    await this.carts.save(sessionId, lines);

    const outcome = await this.cleanup.onCartLineRemoved(lineAttachments(removed));
    if (outcome !== 'none') {
      this.logger.log(`cart line removed key=${key} cleanup=${outcome}`);
    }
    return this.toView(sessionId, lines);
  }

  /** Place an order from the cart. Stored files now belong to the order. */
  async checkout(sessionId: string): Promise<CheckoutResult> {
    const lines = await this.loadLines(sessionId);
    if (lines.length === 0) {
      throw new BadRequestException('Cart is empty.');
    }

    const orderLines = lines.map((line) => {
      const orderLine: OrderLine = {
        productId: line.productId,
        quantity: line.quantity,
        meta: [],
      };
      this.propagation.materializeOrderLine(
        orderLineMetadata(orderLine),
        line.addonUploads,
      );
      return orderLine;
    });

    const order: OrderRecord = {
      id: randomUUID(),
      sessionId,
      createdAt: new Date().toISOString(),
      lines: orderLines,
    };
    await this.orders.create(order);
    await this.carts.clear(sessionId);

    this.logger.log(`order placed id=${order.id} lines=${orderLines.length}`);
    return {
      order,
      itemsCount: orderLines.reduce((sum, line) => sum + line.quantity, 0),
    };
  }

  private async loadLines(sessionId: string): Promise<CartLine[]> {
    const persisted = await this.carts.load(sessionId);
    return persisted.map((values) => {
      const line: CartLine = {
        key: values.key,
        productId: values.productId,
        quantity: values.quantity,
        addonUploads: [],
      };
      this.propagation.restoreFromSession(lineAttachments(line), values);
      return line;
    });
  }

  private toView(sessionId: string, lines: readonly CartLine[], compact = false): CartView {
    return {
      sessionId,
      items: lines.map((line) => ({
        key: line.key,
        productId: line.productId,
        quantity: line.quantity,
        itemData: this.propagation.describeCartItem(line.addonUploads, { compact }),
      })),
      itemsCount: lines.reduce((sum, line) => sum + line.quantity, 0),
    };
  }
}
