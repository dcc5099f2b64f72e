import type Redis from 'ioredis';
import {
  parseCartPayload,
  RedisCartSessionStore,
} from '@app/storefront/cart/cart-session.store';
import type { CartLine } from '@app/storefront/cart/cart.types';
import { FakeRedis } from '@test/utils/fake-redis';

describe('RedisCartSessionStore', () => {
  let redis: FakeRedis;
  let store: RedisCartSessionStore;

  const line = (overrides: Partial<CartLine> = {}): CartLine => ({
    key: 'line-1',
    productId: 'tee-42',
    quantity: 1,
    addonUploads: [],
    ...overrides,
  });

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisCartSessionStore(redis as unknown as Redis, 172800);
  });

  it('persists lines per session with a TTL', async () => {
    await store.save('session-1', [line()]);

    expect(redis.ttls.get('cart:session-1')).toBe(172800);
    await expect(redis.get('cart:session-1')).resolves.toBe(
      '[{"key":"line-1","productId":"tee-42","quantity":1}]',
    );
  });

  it('round-trips attachment records', async () => {
    const addonUploads = [
      {
        filePath: '/srv/media/addon-uploads/1700000000-photo.png',
        fileUrl: 'http://localhost:4000/media/addon-uploads/1700000000-photo.png',
        fileName: '1700000000-photo.png',
      },
    ];
    await store.save('session-1', [line({ addonUploads })]);

    await expect(store.load('session-1')).resolves.toEqual([
      { key: 'line-1', productId: 'tee-42', quantity: 1, addonUploads },
    ]);
  });

  it('drops the key when the cart becomes empty', async () => {
    await store.save('session-1', [line()]);
    await store.save('session-1', []);

    await expect(redis.get('cart:session-1')).resolves.toBeNull();
    await expect(store.load('session-1')).resolves.toEqual([]);
  });

  it('ignores unreadable payloads and entries', () => {
    expect(parseCartPayload('not json')).toEqual([]);
    expect(parseCartPayload('{"key":"x"}')).toEqual([]);
    expect(
      parseCartPayload(
        '[{"key":"a","productId":"p","quantity":1,"addonUploads":[{"filePath":1}]},{"key":"b"}]',
      ),
    ).toEqual([{ key: 'a', productId: 'p', quantity: 1, addonUploads: [] }]);
  });
});
