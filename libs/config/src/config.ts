import * as fs from 'fs';
import * as path from 'path';

import { Logger } from '@nestjs/common';

import { NETWORKS, Network, isNetwork } from '@Bazaar/type';

export const isProd = process.env.NODE_ENV === 'production';

const logger = new Logger('Config');

/**
 * Deployment parameters of the marketplace. Accounts are given either as
 * addresses or as labels resolved to deterministic dev accounts.
 */
export type MarketplaceCfg = {
  owner: string;
  feeRecipient: string;
  // Out of 100000.
  feeRate: number;
  buyerWhitelistMaxBatchSize: number;
  version: string;
  // "native" or a token address.
  allowedCurrencies: string[];
};

export type SeedMintCfg = {
  to: string;
  tokenId: string;
  // ERC-1155 only.
  amount?: string;
};

export type SeedCollectionCfg = {
  name: string;
  standard: 'ERC721' | 'ERC1155';
  royalty?: { receiver: string; basisPoints: number };
  mints: SeedMintCfg[];
};

/**
 * Accounts and collections a local marketplace node starts with. Holders
 * of seeded tokens approve the marketplace for their collections.
 */
export type SeedCfg = {
  // Account label or address to base currency amount.
  balances: Record<string, string>;
  collections: SeedCollectionCfg[];
};

export type SettlementCycleCfg = {
  keepers: string[];
  sleep: number;
};

export const DEFAULT_MARKETPLACE: MarketplaceCfg = {
  owner: 'owner',
  feeRecipient: 'fee-recipient',
  feeRate: 2500,
  buyerWhitelistMaxBatchSize: 50,
  version: '1.0.0',
  allowedCurrencies: ['native'],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

export function getConfigByNetwork(file: string, network: Network): unknown {
  try {
    const parsed: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, `../../../${file}`), {
        encoding: 'utf-8',
      }),
    );
    return isRecord(parsed) ? parsed[network] : undefined;
  } catch (err) {
    logger.warn(`Failed to load config "${file}": ${err}`);
    return undefined;
  }
}

/** Overlays the fields of `raw` that have the right type onto the defaults. */
export function parseMarketplaceCfg(raw: unknown): MarketplaceCfg {
  const cfg = { ...DEFAULT_MARKETPLACE };
  if (!isRecord(raw)) {
    return cfg;
  }
  if (typeof raw.owner === 'string') cfg.owner = raw.owner;
  if (typeof raw.feeRecipient === 'string') cfg.feeRecipient = raw.feeRecipient;
  if (typeof raw.feeRate === 'number') cfg.feeRate = raw.feeRate;
  if (typeof raw.buyerWhitelistMaxBatchSize === 'number') {
    cfg.buyerWhitelistMaxBatchSize = raw.buyerWhitelistMaxBatchSize;
  }
  if (typeof raw.version === 'string') cfg.version = raw.version;
  if (isStringArray(raw.allowedCurrencies)) {
    cfg.allowedCurrencies = raw.allowedCurrencies;
  }
  return cfg;
}

const isDecimal = (value: unknown): value is string =>
  typeof value === 'string' && /^\d+$/.test(value);

function parseMint(raw: unknown): SeedMintCfg | undefined {
  if (!isRecord(raw) || typeof raw.to !== 'string' || !isDecimal(raw.tokenId)) {
    return undefined;
  }
  const mint: SeedMintCfg = { to: raw.to, tokenId: raw.tokenId };
  if (isDecimal(raw.amount)) mint.amount = raw.amount;
  return mint;
}

function parseCollection(raw: unknown): SeedCollectionCfg | undefined {
  if (
    !isRecord(raw) ||
    typeof raw.name !== 'string' ||
    (raw.standard !== 'ERC721' && raw.standard !== 'ERC1155')
  ) {
    return undefined;
  }
  const collection: SeedCollectionCfg = {
    name: raw.name,
    standard: raw.standard,
    mints: [],
  };
  const { royalty, mints } = raw;
  if (
    isRecord(royalty) &&
    typeof royalty.receiver === 'string' &&
    typeof royalty.basisPoints === 'number'
  ) {
    collection.royalty = {
      receiver: royalty.receiver,
      basisPoints: royalty.basisPoints,
    };
  }
  if (Array.isArray(mints)) {
    for (const item of mints) {
      const mint = parseMint(item);
      if (mint) collection.mints.push(mint);
    }
  }
  return collection;
}

/** Keeps the well-formed parts of a seed; anything else is dropped. */
export function parseSeedCfg(raw: unknown): SeedCfg {
  const seed: SeedCfg = { balances: {}, collections: [] };
  if (!isRecord(raw)) {
    return seed;
  }
  if (isRecord(raw.balances)) {
    for (const [account, amount] of Object.entries(raw.balances)) {
      if (isDecimal(amount)) seed.balances[account] = amount;
    }
  }
  if (Array.isArray(raw.collections)) {
    for (const item of raw.collections) {
      const collection = parseCollection(item);
      if (collection) seed.collections.push(collection);
    }
  }
  return seed;
}

export function getSeed(network: Network): SeedCfg {
  const raw = getConfigByNetwork('marketplace.json', network);
  return parseSeedCfg(isRecord(raw) ? raw.seed : undefined);
}

export function getMarketplace(network: Network): MarketplaceCfg {
  return parseMarketplaceCfg(getConfigByNetwork('marketplace.json', network));
}

export function getNetwork(value = process.env.NETWORK): Network {
  const network = (value || 'devnet').toLowerCase();
  if (!isNetwork(network)) {
    throw new Error(`Invalid network: ${network}`);
  }
  return network;
}

export function getSettlementCycle(): SettlementCycleCfg {
  return {
    keepers: (process.env.SETTLEMENT_KEEPERS || 'keeper').split(','),
    sleep: Number(process.env.SETTLEMENT_SLEEP || 15000),
  };
}

export default () => ({
  mongodb: process.env.MONGO_URI,
  prod: isProd,
  'web-api': {
    port: Number(process.env.WEB_APP_PORT || 6000),
  },
  'event-handler': {
    retryInterval: Number(process.env.EVENT_RETRY_INTERVAL || 5000),
  },
  'settlement-cycle': getSettlementCycle(),
  network: getNetwork(),
  ...Object.fromEntries(
    NETWORKS.map((network) => [
      network,
      { marketplace: getMarketplace(network), seed: getSeed(network) },
    ]),
  ),
});
