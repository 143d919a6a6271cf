import { StoreDirectory, maskSecret, storeKey } from '../../src/stores/storeDirectory';
import { logger } from '../../src/utils/logger';

const fakeRedis = () => {
  const hashes = new Map<string, Record<string, string>>();
  const redis = {
    hgetall: jest.fn().mockImplementation(async (key: string) => hashes.get(key) ?? {}),
    hset: jest.fn().mockImplementation(async (key: string, fields: Record<string, string>) => {
      hashes.set(key, { ...(hashes.get(key) ?? {}), ...fields });
      return Object.keys(fields).length;
    }),
    del: jest.fn().mockImplementation(async (key: string) => (hashes.delete(key) ? 1 : 0)),
    scan: jest.fn()
  };
  return { redis, hashes };
};

const profileHash = {
  store_name: 'Acme Outfitters',
  store_details: 'Outdoor gear since 1990',
  shopify_access_token: 'test-secret-token',
  shopify_base_url: 'acme.myshopify.com'
};

describe('StoreDirectory', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should key profiles by dialled number', () => {
    expect(storeKey('+15550001111')).toBe('store:+15550001111');
  });

  it('should mask secrets longer than ten characters', () => {
    expect(maskSecret('test-secret-token')).toBe('test-secre...');
    expect(maskSecret('short')).toBe('***');
  });

  it('should save and look up a profile', async () => {
    const { redis, hashes } = fakeRedis();
    const directory = new StoreDirectory(redis);

    await directory.save('+15550001111', { ...profileHash, transfer_number: '+15550009999' });

    expect(hashes.get('store:+15550001111')).toEqual({ ...profileHash, transfer_number: '+15550009999' });
    await expect(directory.lookup('+15550001111')).resolves.toEqual({
      phoneNumber: '+15550001111',
      storeName: 'Acme Outfitters',
      storeDetails: 'Outdoor gear since 1990',
      accessToken: 'test-secret-token',
      shopDomain: 'acme.myshopify.com',
      transferNumber: '+15550009999'
    });
  });

  it('should treat an empty transfer number as absent', async () => {
    const { redis } = fakeRedis();
    const directory = new StoreDirectory(redis);

    const saved = await directory.save('+15550001111', profileHash);

    expect(saved.transferNumber).toBeUndefined();
  });

  it('should return null for unknown numbers and incomplete profiles', async () => {
    const { redis, hashes } = fakeRedis();
    hashes.set('store:+15550002222', { store_name: 'Half Done' });
    const directory = new StoreDirectory(redis);

    await expect(directory.lookup('+15550003333')).resolves.toBeNull();
    await expect(directory.lookup('+15550002222')).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('should return null when redis fails', async () => {
    const { redis } = fakeRedis();
    redis.hgetall.mockRejectedValueOnce(new Error('connection refused'));

    await expect(new StoreDirectory(redis).lookup('+15550001111')).resolves.toBeNull();
    expect(logger.error).toHaveBeenCalled();
  });

  it('should report missing fields and mask tokens when verifying', async () => {
    const { redis, hashes } = fakeRedis();
    hashes.set('store:+15550001111', { store_name: 'Acme', shopify_access_token: 'test-secret-token' });

    await expect(new StoreDirectory(redis).verify('+15550001111')).resolves.toEqual({
      phoneNumber: '+15550001111',
      found: true,
      missingFields: ['shopify_base_url'],
      fields: { store_name: 'Acme', shopify_access_token: 'test-secre...' }
    });
  });

  it('should list every store across scan pages', async () => {
    const { redis, hashes } = fakeRedis();
    hashes.set('store:+2', { store_name: 'Beta' });
    hashes.set('store:+1', {});
    redis.scan.mockResolvedValueOnce(['17', ['store:+2']]).mockResolvedValueOnce(['0', ['store:+1', 'store:+2']]);

    await expect(new StoreDirectory(redis).list()).resolves.toEqual([
      { phoneNumber: '+1', storeName: 'Unknown' },
      { phoneNumber: '+2', storeName: 'Beta' }
    ]);
    expect(redis.scan).toHaveBeenNthCalledWith(2, '17', 'MATCH', 'store:*', 'COUNT', 100);
  });

  it('should report whether a profile was removed', async () => {
    const { redis, hashes } = fakeRedis();
    hashes.set('store:+1', profileHash);
    const directory = new StoreDirectory(redis);

    await expect(directory.remove('+1')).resolves.toBe(true);
    await expect(directory.remove('+1')).resolves.toBe(false);
  });
});
