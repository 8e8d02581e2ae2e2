import { Address, Listing } from '@Bazaar/type';

import { IndexedSet } from './indexed-set';

/**
 * All marketplace state, shared by every facet. Facets must reach it
 * through the diamond on each access: a reverted sub-call restores the
 * nested collections by replacing them.
 */
export type MarketplaceStorage = {
  owner: Address;
  paused: boolean;
  version: string;

  feeRate: bigint;
  feeRecipient: Address;

  listingCounter: number;
  listings: Map<number, Listing>;
  // (collection, tokenId) -> the single active ERC-721 listing
  erc721Listings: Map<string, number>;
  // (collection, tokenId) -> every active listing of that token
  tokenListings: Map<string, number[]>;

  allowedCurrencies: IndexedSet;
  whitelistedCollections: IndexedSet;

  buyerWhitelists: Map<number, Set<Address>>;
  buyerWhitelistMaxBatchSize: number;

  reentrancyLocked: boolean;
};

export function tokenKey(tokenAddress: Address, tokenId: bigint) {
  return `${tokenAddress}:${tokenId}`;
}
