import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Test } from '@nestjs/testing';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { fromFile } from 'file-type';
import { configureApp } from '@app/app.setup';
import { RedisModule, REDIS } from '@app/redis/redis.module';
import { AddonUploadsModule } from '@app/addon-uploads/addon-uploads.module';
import {
  ADDON_UPLOADS_CONFIG,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';
import { StorefrontModule } from '@app/storefront/storefront.module';
import { buildTestConfig } from '@test/utils/addon-fakes';
import { FakeRedis } from '@test/utils/fake-redis';

jest.mock('file-type', () => ({
  fromFile: jest.fn(),
}));

const fromFileMock = jest.mocked(fromFile);

type Agent = ReturnType<typeof request.agent>;

const NOW_MS = 1_700_000_000_000;
const GATE = '/api/admin-post';
const DOWNLOAD_ACTION = 'addon_secure_download';

describe('Add-on uploads E2E', () => {
  let app: NestExpressApplication;
  let mediaRoot: string;
  let cfg: AddonUploadsConfig;

  beforeAll(async () => {
    mediaRoot = await fs.mkdtemp(join(tmpdir(), 'addon-e2e-'));
    cfg = buildTestConfig(mediaRoot, { productIds: ['tee-42', 'mug-7'] });

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ GLOBAL_PREFIX: 'api', CART_SESSION_TTL_SECONDS: 3600 })],
        }),
        RedisModule,
        AddonUploadsModule,
        StorefrontModule,
      ],
    })
      .overrideProvider(ADDON_UPLOADS_CONFIG)
      .useValue(cfg)
      .overrideProvider(REDIS)
      .useValue(new FakeRedis())
      .compile();

    app = moduleRef.createNestApplication<NestExpressApplication>();
    await configureApp(app, app.get(ConfigService), cfg);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    await fs.rm(mediaRoot, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW_MS);
    fromFileMock.mockReset();
    fromFileMock.mockImplementation(async (path: string) => {
      const content = await fs.readFile(path, 'utf8');
      return content.startsWith('PNG') ? { ext: 'png', mime: 'image/png' } : undefined;
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const fieldToken = async (agent: Agent, productId = 'tee-42') => {
    const res = await agent.get('/api/addon-uploads/field').query({ productId }).expect(200);
    return String(res.body.data.field.token);
  };

  const addWithUpload = (
    agent: Agent,
    token: string,
    fileName: string,
    content: string,
  ) =>
    agent
      .post('/api/cart/items')
      .field('productId', 'tee-42')
      .field('addon_upload_token', token)
      .attach('addon_file', Buffer.from(content), fileName);

  const tmpEntries = () => fs.readdir(cfg.tmpDir);

  it('describes the upload field for eligible products only', async () => {
    const agent = request.agent(app.getHttpServer());

    const offered = await agent
      .get('/api/addon-uploads/field')
      .query({ productId: 'tee-42' })
      .expect(200);
    expect(offered.body.data).toEqual({
      enabled: true,
      field: {
        name: 'addon_file',
        accept: 'image/*',
        label: 'Upload an image: ',
        tokenField: 'addon_upload_token',
        token: expect.any(String),
      },
    });

    const notOffered = await agent
      .get('/api/addon-uploads/field')
      .query({ productId: 'book-1' })
      .expect(200);
    expect(notOffered.body).toEqual({ success: true, data: { enabled: false } });
  });

  it('stores an upload, carries it into the order and serves it through the gate', async () => {
    const agent = request.agent(app.getHttpServer());
    const token = await fieldToken(agent);

    const added = await addWithUpload(agent, token, 'photo.PNG', 'PNG-bytes').expect(200);

    const fileName = '1700000000-photo.png';
    const gateUrl = `http://localhost:4000/api/admin-post?action=addon_secure_download&amp;file=${fileName}`;
    expect(added.body.data.notices).toEqual([]);
    expect(added.body.data.cart.items).toHaveLength(1);
    expect(added.body.data.cart.items[0].itemData).toEqual([
      {
        name: 'Uploaded File',
        display: `<img src="${gateUrl}" alt="Uploaded File" class="addon-upload-img" style="width:150px;height:150px;" />`,
      },
    ]);
    await expect(
      fs.readFile(join(cfg.storageRoot, fileName), 'utf8'),
    ).resolves.toBe('PNG-bytes');
    await expect(tmpEntries()).resolves.toEqual([]);

    const compact = await agent.get('/api/cart').query({ compact: 'true' }).expect(200);
    expect(compact.body.data.items[0].itemData).toEqual([
      { name: 'Uploaded File', display: '&#9989;' },
    ]);

    const checkout = await agent.post('/api/cart/checkout').expect(201);
    const orderId = String(checkout.body.data.orderId);

    const order = await agent.get(`/api/orders/${orderId}`).expect(200);
    expect(order.body.data.lines).toEqual([
      {
        productId: 'tee-42',
        quantity: 1,
        meta: [
          {
            key: 'Uploaded Media',
            value: `<a href="${gateUrl}" target="_blank">${fileName}</a>`,
          },
        ],
      },
    ]);

    const emptied = await agent.get('/api/cart').expect(200);
    expect(emptied.body.data.items).toEqual([]);

    const download = await request(app.getHttpServer())
      .get(GATE)
      .query({ action: DOWNLOAD_ACTION, file: fileName })
      .responseType('blob')
      .expect(200);
    expect(download.headers['content-type']).toBe('application/octet-stream');
    expect(download.headers['content-disposition']).toBe(
      `attachment; filename="${fileName}"`,
    );
    expect(download.headers['content-length']).toBe('9');
    expect(Buffer.from(download.body).toString('utf8')).toBe('PNG-bytes');
  });

  it('refuses to serve anything outside the storage root', async () => {
    await fs.writeFile(join(mediaRoot, 'secrets.txt'), 'do-not-serve');

    const res = await request(app.getHttpServer())
      .get(GATE)
      .query({ action: DOWNLOAD_ACTION, file: '../../secrets.txt' })
      .expect(404);

    expect(res.body).toEqual({
      success: false,
      error: { code: 'FILE_NOT_FOUND', message: 'File not found.' },
      traceId: expect.any(String),
    });
  });

  it('refuses gate calls with missing or unknown parameters', async () => {
    const server = app.getHttpServer();

    const noFile = await request(server).get(GATE).query({ action: DOWNLOAD_ACTION }).expect(403);
    expect(noFile.body.error).toEqual({
      code: 'UNAUTHORIZED_ACCESS',
      message: 'Unauthorized access.',
    });

    await request(server).get(GATE).query({ action: 'other', file: 'x.png' }).expect(403);
  });

  it('adds the line without the file when the type is rejected', async () => {
    const agent = request.agent(app.getHttpServer());
    const token = await fieldToken(agent);

    const res = await addWithUpload(agent, token, 'notes.txt', 'plain text').expect(200);

    expect(res.body.data.notices).toEqual([
      {
        level: 'error',
        code: 'INVALID_FILE_TYPE',
        message: 'Invalid file type. Allowed types: jpg, jpeg, png, gif, webp.',
      },
    ]);
    expect(res.body.data.cart.items).toHaveLength(1);
    expect(res.body.data.cart.items[0].itemData).toEqual([]);
    await expect(fs.readdir(cfg.storageRoot)).resolves.not.toContain(
      '1700000000-notes.txt',
    );
    await expect(tmpEntries()).resolves.toEqual([]);
  });

  it('rejects a disguised file and a forged token', async () => {
    const agent = request.agent(app.getHttpServer());
    const token = await fieldToken(agent);

    const disguised = await addWithUpload(agent, token, 'sneaky.png', 'MZ-binary').expect(200);
    expect(disguised.body.data.notices[0].code).toBe('INVALID_FILE_TYPE');

    const forged = await addWithUpload(agent, 'forged', 'photo.png', 'PNG-bytes').expect(200);
    expect(forged.body.data.notices).toEqual([
      {
        level: 'error',
        code: 'SECURITY_CHECK_FAILED',
        message: 'Security check failed. Please try again.',
      },
    ]);
    // plain lines of one product merge
    expect(forged.body.data.cart.items).toHaveLength(1);
    expect(forged.body.data.cart.items[0].quantity).toBe(2);
    await expect(tmpEntries()).resolves.toEqual([]);
  });

  it('deletes the stored file when its cart line is removed', async () => {
    const agent = request.agent(app.getHttpServer());
    const token = await fieldToken(agent);

    const added = await addWithUpload(agent, token, 'party.png', 'PNG-party').expect(200);
    const key = String(added.body.data.cart.items[0].key);
    const stored = join(cfg.storageRoot, '1700000000-party.png');
    await expect(fs.readFile(stored, 'utf8')).resolves.toBe('PNG-party');

    const removed = await agent.delete(`/api/cart/items/${key}`).expect(200);

    expect(removed.body.data.items).toEqual([]);
    await expect(fs.access(stored)).rejects.toThrow();
    await agent.delete(`/api/cart/items/${key}`).expect(404);
  });

  it('guards direct access to the storage directory', async () => {
    const agent = request.agent(app.getHttpServer());
    const token = await fieldToken(agent);
    await addWithUpload(agent, token, 'banner.png', 'PNG-banner').expect(200);

    await request(app.getHttpServer())
      .get('/media/addon-uploads/1700000000-banner.png')
      .expect(200);

    const stub = await request(app.getHttpServer())
      .get('/media/addon-uploads/.htaccess')
      .expect(403);
    expect(stub.body.error.code).toBe('FORBIDDEN');
  });
});
