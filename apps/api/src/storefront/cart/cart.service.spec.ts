import { BadRequestException, NotFoundException } from '@nestjs/common';
import { CartService } from '@app/storefront/cart/cart.service';
import { AttachmentPropagationService } from '@app/addon-uploads/attachment-propagation.service';
import type { CartCleanupService } from '@app/addon-uploads/cart-cleanup.service';
import type { UploadPipelineService } from '@app/addon-uploads/upload-pipeline.service';
import type {
  AttachmentRecord,
  CartLineAttachments,
  UploadOutcome,
  UploadSubmission,
} from '@app/addon-uploads/addon-uploads.types';
import {
  buildTestConfig,
  InMemoryCartSessionStore,
  InMemoryOrderStore,
} from '@test/utils/addon-fakes';

const record: AttachmentRecord = {
  filePath: '/srv/media/addon-uploads/1700000000-photo.png',
  fileUrl: 'http://localhost:4000/media/addon-uploads/1700000000-photo.png',
  fileName: '1700000000-photo.png',
};

const GATE_LINK =
  '<a href="http://localhost:4000/api/admin-post?action=addon_secure_download&amp;file=1700000000-photo.png" target="_blank">1700000000-photo.png</a>';

describe('CartService', () => {
  let carts: InMemoryCartSessionStore;
  let orders: InMemoryOrderStore;
  let attachUpload: jest.Mock<Promise<UploadOutcome>, [CartLineAttachments, UploadSubmission]>;
  let onCartLineRemoved: jest.Mock;
  let service: CartService;

  const attachRecord = async (line: CartLineAttachments): Promise<UploadOutcome> => {
    line.setLineAttachments([record]);
    return { record };
  };

  beforeEach(() => {
    carts = new InMemoryCartSessionStore();
    orders = new InMemoryOrderStore();
    attachUpload = jest.fn<Promise<UploadOutcome>, [CartLineAttachments, UploadSubmission]>(
      async () => ({}),
    );
    onCartLineRemoved = jest.fn(async () => 'deleted');
    service = new CartService(
      carts,
      orders,
      { attachUpload } as unknown as UploadPipelineService,
      new AttachmentPropagationService(buildTestConfig('/srv/media')),
      { onCartLineRemoved } as unknown as CartCleanupService,
    );
  });

  it('merges plain lines of the same product', async () => {
    await service.addItem('session-1', { productId: 'tee-42', quantity: 1 });
    const { cart } = await service.addItem('session-1', { productId: 'tee-42', quantity: 2 });

    expect(cart.items).toHaveLength(1);
    expect(cart.items[0].quantity).toBe(3);
    expect(cart.itemsCount).toBe(3);
  });

  it('keeps a line with an attachment separate', async () => {
    await service.addItem('session-1', { productId: 'tee-42', quantity: 1 });
    attachUpload.mockImplementationOnce(attachRecord);

    const { cart } = await service.addItem('session-1', {
      productId: 'tee-42',
      quantity: 1,
      file: { originalName: 'photo.png', tempPath: '/tmp/upload-1', size: 9 },
      token: 'form-token',
    });

    expect(cart.items).toHaveLength(2);
    expect(cart.items[1].itemData).toHaveLength(1);
    expect(attachUpload).toHaveBeenLastCalledWith(expect.anything(), {
      file: { originalName: 'photo.png', tempPath: '/tmp/upload-1', size: 9 },
      token: 'form-token',
      sessionId: 'session-1',
    });
  });

  it('adds the line and returns the notice of a rejected upload', async () => {
    const notice = {
      level: 'error' as const,
      code: 'INVALID_FILE_TYPE',
      message: 'Invalid file type. Allowed types: jpg, jpeg, png, gif, webp.',
    };
    attachUpload.mockResolvedValueOnce({ notice });

    const result = await service.addItem('session-1', { productId: 'tee-42', quantity: 1 });

    expect(result.notices).toEqual([notice]);
    expect(result.cart.items).toHaveLength(1);
    expect(result.cart.items[0].itemData).toEqual([]);
  });

  it('restores attachments when the cart is loaded from the session', async () => {
    carts.seed('session-1', [
      { key: 'line-1', productId: 'tee-42', quantity: 1, addonUploads: [record] },
    ]);

    const cart = await service.getCart('session-1', { compact: true });

    expect(cart.items).toEqual([
      {
        key: 'line-1',
        productId: 'tee-42',
        quantity: 1,
        itemData: [{ name: 'Uploaded File', display: '&#9989;' }],
      },
    ]);
  });

  it('removes a line and cleans up its file', async () => {
    carts.seed('session-1', [
      { key: 'line-1', productId: 'tee-42', quantity: 1, addonUploads: [record] },
    ]);

    const cart = await service.removeItem('session-1', 'line-1');

    expect(cart.items).toEqual([]);
    expect(onCartLineRemoved).toHaveBeenCalledTimes(1);
    const [line] = onCartLineRemoved.mock.calls[0];
    expect(line.getLineAttachments()).toEqual([record]);
    await expect(carts.load('session-1')).resolves.toEqual([]);
  });

  it('rejects removing an unknown line', async () => {
    await expect(service.removeItem('session-1', 'nope')).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(onCartLineRemoved).not.toHaveBeenCalled();
  });

  it('checks out into an order carrying the download link', async () => {
    carts.seed('session-1', [
      { key: 'line-1', productId: 'tee-42', quantity: 2, addonUploads: [record] },
      { key: 'line-2', productId: 'mug-7', quantity: 1 },
    ]);

    const { order, itemsCount } = await service.checkout('session-1');

    expect(itemsCount).toBe(3);
    expect(order.lines).toEqual([
      {
        productId: 'tee-42',
        quantity: 2,
        meta: [{ key: 'Uploaded Media', value: GATE_LINK }],
      },
      { productId: 'mug-7', quantity: 1, meta: [] },
    ]);
    await expect(orders.get(order.id)).resolves.toEqual(order);
    await expect(carts.load('session-1')).resolves.toEqual([]);
    expect(onCartLineRemoved).not.toHaveBeenCalled();
  });

  it('refuses to check out an empty cart', async () => {
    await expect(service.checkout('session-1')).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });
});
