import Redis from 'ioredis';
import { z } from 'zod';
import { logger } from '../utils/logger';

export interface StoreProfile {
  phoneNumber: string;
  storeName: string;
  storeDetails: string;
  accessToken: string;
  shopDomain: string;
  transferNumber?: string;
}

export const REQUIRED_FIELDS = ['store_name', 'shopify_access_token', 'shopify_base_url'] as const;

const storeHashSchema = z.object({
  store_name: z.string().min(1),
  store_details: z.string().default(''),
  shopify_access_token: z.string().min(1),
  shopify_base_url: z.string().min(1),
  transfer_number: z.string().optional()
});

export type StoreHash = z.input<typeof storeHashSchema>;

export interface StoreVerification {
  phoneNumber: string;
  found: boolean;
  missingFields: string[];
  fields: Record<string, string>;
}

export type StoreRedis = Pick<Redis, 'hgetall' | 'hset' | 'del' | 'scan'>;

export const storeKey = (phoneNumber: string): string => `store:${phoneNumber}`;

/**
 * Shows the first ten characters of a secret.
 */
export const maskSecret = (value: string): string => (value.length > 10 ? `${value.slice(0, 10)}...` : '***');

const toProfile = (phoneNumber: string, hash: z.output<typeof storeHashSchema>): StoreProfile => ({
  phoneNumber,
  storeName: hash.store_name,
  storeDetails: hash.store_details,
  accessToken: hash.shopify_access_token,
  shopDomain: hash.shopify_base_url,
  transferNumber: hash.transfer_number || undefined
});

/**
 * Store profiles keyed by the phone number callers dial, kept as Redis hashes
 * under `store:{phone}`.
 */
export class StoreDirectory {
  constructor(private readonly redis: StoreRedis) {}

  async lookup(phoneNumber: string): Promise<StoreProfile | null> {
    try {
      const hash = await this.redis.hgetall(storeKey(phoneNumber));
      if (Object.keys(hash).length === 0) {
        logger.warn('No store profile for number', { operation: 'store_lookup' }, { phoneNumber });
        return null;
      }

      const parsed = storeHashSchema.safeParse(hash);
      if (!parsed.success) {
        logger.warn('Incomplete store profile', { operation: 'store_lookup' }, {
          phoneNumber,
          issues: parsed.error.issues.map((issue) => issue.path.join('.'))
        });
        return null;
      }

      return toProfile(phoneNumber, parsed.data);
    } catch (error) {
      logger.error('Store profile lookup failed', error as Error, { operation: 'store_lookup' }, { phoneNumber });
      return null;
    }
  }

  async save(phoneNumber: string, hash: StoreHash): Promise<StoreProfile> {
    const parsed = storeHashSchema.parse(hash);
    const fields: Record<string, string> = {
      store_name: parsed.store_name,
      store_details: parsed.store_details,
      shopify_access_token: parsed.shopify_access_token,
      shopify_base_url: parsed.shopify_base_url,
      transfer_number: parsed.transfer_number ?? ''
    };
    await this.redis.hset(storeKey(phoneNumber), fields);

    logger.info('Store profile saved', { operation: 'store_save', storeName: parsed.store_name }, { phoneNumber });
    return toProfile(phoneNumber, parsed);
  }

  async verify(phoneNumber: string): Promise<StoreVerification> {
    const hash = await this.redis.hgetall(storeKey(phoneNumber));
    const fields = Object.fromEntries(
      Object.entries(hash).map(([key, value]) => [key, key.toLowerCase().includes('token') ? maskSecret(value) : value])
    );
    return {
      phoneNumber,
      found: Object.keys(hash).length > 0,
      missingFields: REQUIRED_FIELDS.filter((field) => !hash[field]),
      fields
    };
  }

  async list(): Promise<Array<{ phoneNumber: string; storeName: string }>> {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', storeKey('*'), 'COUNT', 100);
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');

    const stores = [];
    for (const key of [...new Set(keys)].sort()) {
      const hash = await this.redis.hgetall(key);
      stores.push({ phoneNumber: key.replace(/^store:/, ''), storeName: hash.store_name || 'Unknown' });
    }
    return stores;
  }

  async remove(phoneNumber: string): Promise<boolean> {
    const removed = await this.redis.del(storeKey(phoneNumber));
    return removed > 0;
  }
}
