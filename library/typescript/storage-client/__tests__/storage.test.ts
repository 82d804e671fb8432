import { describe, it, expect, beforeAll, afterAll, afterEach, beforeEach } from 'vitest';
import { setupServer } from 'msw/node';
import { StorageClient, StorageError, ListRequest, SortOrder, type ObjectApi } from '../src/index.js';
import { FakeStorage } from './helpers/fake-storage.js';

const STORAGE_URL = 'http://storage.test/storage/v1';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe('StorageClient (fake storage)', () => {
  let fake: FakeStorage;
  let objects: ObjectApi;

  beforeEach(() => {
    fake = new FakeStorage(STORAGE_URL, 'test-api-key');
    server.use(...fake.handlers());
    objects = new StorageClient({
      url: STORAGE_URL,
      apiKey: 'test-api-key',
      accessToken: 'test-access-token',
    }).object();
  });

  it('アップロードしたオブジェクトを同一バイト列で取得できる', async () => {
    const bytes = new Uint8Array([0, 1, 2, 127, 128, 254, 255]);

    const id = await objects.upload('docs', 'reports/2024/q1.bin', bytes);
    const got = await objects.get('docs', 'reports/2024/q1.bin');

    expect(id).toEqual({ id: 'obj-1', key: 'docs/reports/2024/q1.bin' });
    expect(got).toEqual(bytes);
  });

  it('Bearer トークンを付与して送信する', async () => {
    await objects.upload('docs', 'a.txt', 'hello');
    expect(fake.authorizations).toEqual(['Bearer test-access-token']);
  });

  it('update で内容を置き換える', async () => {
    await objects.upload('docs', 'note.txt', 'first', { contentType: 'text/plain' });
    const id = await objects.update('docs', 'note.txt', 'second', { contentType: 'text/plain' });

    const got = await objects.get('docs', 'note.txt');
    expect(id).toEqual({ id: 'obj-1', key: 'docs/note.txt' });
    expect(new TextDecoder().decode(got)).toBe('second');
  });

  it('存在しないオブジェクトの update は NOT_FOUND になる', async () => {
    await expect(objects.update('docs', 'missing.txt', 'x')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      statusCode: 400,
    });
  });

  it('既存オブジェクトへの upload は upsert なしでは失敗する', async () => {
    await objects.upload('docs', 'a.txt', 'one');

    await expect(objects.upload('docs', 'a.txt', 'two')).rejects.toMatchObject({
      code: 'HTTP',
      statusCode: 400,
      message: 'The resource already exists',
    });

    await objects.upload('docs', 'a.txt', 'two', { upsert: true });
    expect(new TextDecoder().decode(await objects.get('docs', 'a.txt'))).toBe('two');
  });

  it('オブジェクトを削除できる', async () => {
    await objects.upload('docs', 'a.txt', 'one');

    expect(await objects.delete('docs', 'a.txt')).toBe('Successfully deleted');
    await expect(objects.get('docs', 'a.txt')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('存在しないオブジェクトの削除は NOT_FOUND エラーになる', async () => {
    const err = await objects.delete('docs', 'missing.txt').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ code: 'NOT_FOUND', statusCode: 400, message: 'Object not found' });
  });

  it('limit=10 なら最大 10 件を指定順で返す', async () => {
    for (let i = 0; i < 15; i++) {
      await objects.upload('docs', `file-${String(i).padStart(2, '0')}.txt`, `content ${i}`);
    }

    const listed = await objects.list(
      'docs',
      new ListRequest('').limit(10).sortBy('name', SortOrder.Descending),
    );

    expect(listed.map((o) => o.name)).toEqual([
      'file-14.txt',
      'file-13.txt',
      'file-12.txt',
      'file-11.txt',
      'file-10.txt',
      'file-09.txt',
      'file-08.txt',
      'file-07.txt',
      'file-06.txt',
      'file-05.txt',
    ]);
  });

  it('created_at で昇順に並べられる', async () => {
    await objects.upload('docs', 'c.txt', 'c');
    await objects.upload('docs', 'a.txt', 'a');
    await objects.upload('docs', 'b.txt', 'b');

    const listed = await objects.list('docs', new ListRequest().sortBy('created_at', SortOrder.Ascending));

    expect(listed.map((o) => o.name)).toEqual(['c.txt', 'a.txt', 'b.txt']);
    expect(listed[0].createdAt).toEqual(new Date('2024-01-01T00:00:01.000Z'));
  });

  it('prefix 配下のオブジェクトだけを返す', async () => {
    await objects.upload('images', 'avatars/two.png', 'b', { contentType: 'image/png' });
    await objects.upload('images', 'avatars/one.png', 'a', { contentType: 'image/png' });
    await objects.upload('images', 'other/x.png', 'x');
    await objects.upload('images', 'root.txt', 'r');

    const listed = await objects.list('images', new ListRequest('avatars'));

    expect(listed.map((o) => o.name)).toEqual(['one.png', 'two.png']);
    expect(listed[0].metadata).toEqual({ size: 1, mimetype: 'image/png' });
  });

  it('offset と search を解釈する', async () => {
    for (const name of ['report-a.csv', 'report-b.csv', 'notes.md', 'report-c.csv']) {
      await objects.upload('docs', name, name);
    }

    const listed = await objects.list('docs', new ListRequest().search('report').offset(1).limit(5));

    expect(listed.map((o) => o.name)).toEqual(['report-b.csv', 'report-c.csv']);
  });

  it('API キーが不正なら UNAUTHORIZED になる', async () => {
    const anonymous = new StorageClient({ url: STORAGE_URL, apiKey: 'wrong-key' }).object();

    await expect(anonymous.get('docs', 'a.txt')).rejects.toMatchObject({
      code: 'UNAUTHORIZED',
      statusCode: 401,
      message: 'Invalid API key',
    });
    expect(fake.authorizations).toEqual([null]);
  });
});
