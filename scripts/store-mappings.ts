#!/usr/bin/env tsx

/**
 * Manages the phone number → store profile mappings read when a call comes in.
 *
 * Usage:
 *   npm run stores -- add --phone +15550000000 --name "Demo Store" --domain demo.myshopify.com --token test-token
 *                        [--details "Open 9-5, free returns"] [--transfer +15550000001]
 *   npm run stores -- verify --phone +15550000000
 *   npm run stores -- check --phone +15550000000   # calls the Shopify shop endpoint
 *   npm run stores -- list
 *   npm run stores -- delete --phone +15550000000
 */

import 'dotenv/config';
import Redis from 'ioredis';
import { ShopifyClient } from '../src/commerce/shopifyClient';
import { StoreDirectory } from '../src/stores/storeDirectory';
import { logger } from '../src/utils/logger';

type Command = 'add' | 'verify' | 'check' | 'list' | 'delete' | 'help';

interface StoreOptions {
  command: Command;
  phone?: string;
  name?: string;
  details?: string;
  domain?: string;
  token?: string;
  transfer?: string;
}

const COMMANDS: readonly Command[] = ['add', 'verify', 'check', 'list', 'delete', 'help'];

function parseArgs(): StoreOptions {
  const args = process.argv.slice(2);
  const options: StoreOptions = { command: COMMANDS.find((command) => command === args[0]) ?? 'help' };

  for (let i = 1; i < args.length; i++) {
    switch (args[i]) {
      case '--phone':
        options.phone = args[++i];
        break;
      case '--name':
        options.name = args[++i];
        break;
      case '--details':
        options.details = args[++i];
        break;
      case '--domain':
        options.domain = args[++i];
        break;
      case '--token':
        options.token = args[++i];
        break;
      case '--transfer':
        options.transfer = args[++i];
        break;
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Store Mapping Script

Commands:
  add     --phone <number> --name <store> --domain <shop domain> --token <access token>
          [--details <text>] [--transfer <number>]
  verify  --phone <number>     Show the stored fields (tokens masked) and missing required fields
  check   --phone <number>     Call the Shopify shop endpoint with the stored credentials
  list                         List every mapped number
  delete  --phone <number>     Remove a mapping
`);
}

function requirePhone(options: StoreOptions): string {
  if (!options.phone) {
    throw new Error('--phone is required');
  }
  return options.phone;
}

async function run(directory: StoreDirectory, options: StoreOptions): Promise<void> {
  switch (options.command) {
    case 'add': {
      const profile = await directory.save(requirePhone(options), {
        store_name: options.name ?? '',
        store_details: options.details,
        shopify_access_token: options.token ?? '',
        shopify_base_url: options.domain ?? '',
        transfer_number: options.transfer
      });
      console.log(`✅ ${profile.phoneNumber} → ${profile.storeName}`);
      break;
    }
    case 'verify': {
      const verification = await directory.verify(requirePhone(options));
      if (!verification.found) {
        console.log(`❌ No mapping for ${verification.phoneNumber}`);
        break;
      }
      for (const [field, value] of Object.entries(verification.fields)) {
        console.log(`  ${field}: ${value}`);
      }
      console.log(
        verification.missingFields.length === 0
          ? '✅ All required fields present'
          : `⚠️  Missing: ${verification.missingFields.join(', ')}`
      );
      break;
    }
    case 'check': {
      const profile = await directory.lookup(requirePhone(options));
      if (!profile) {
        console.log('❌ No complete mapping for this number');
        break;
      }
      const shop = await new ShopifyClient({ shopDomain: profile.shopDomain, accessToken: profile.accessToken }).getShopDetails();
      console.log(`✅ Connected to ${shop.name} (${shop.domain ?? profile.shopDomain})`);
      break;
    }
    case 'list': {
      const stores = await directory.list();
      if (stores.length === 0) {
        console.log('No store mappings found');
      }
      for (const store of stores) {
        console.log(`  ${store.phoneNumber}: ${store.storeName}`);
      }
      break;
    }
    case 'delete': {
      const phone = requirePhone(options);
      console.log((await directory.remove(phone)) ? `🗑️  Removed ${phone}` : `❌ No mapping for ${phone}`);
      break;
    }
    case 'help':
      showHelp();
      break;
  }
}

async function main(): Promise<void> {
  const options = parseArgs();
  const redis = new Redis(process.env.REDIS_URL || 'redis://localhost:6379/0');
  try {
    await run(new StoreDirectory(redis), options);
  } finally {
    await redis.quit();
  }
}

main().catch((error: Error) => {
  logger.error('Store mapping command failed', error, { operation: 'store_mappings' });
  console.error('💥', error.message);
  process.exit(1);
});
