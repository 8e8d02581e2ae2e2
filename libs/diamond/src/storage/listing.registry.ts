import { Address, Listing } from '@Bazaar/type';

import { MarketplaceStorage, tokenKey } from './marketplace.storage';

/**
 * Listing records plus their secondary indexes. Holds no rules: the
 * listing facet decides what may be written.
 */
export class ListingRegistry {
  constructor(private readonly storage: () => MarketplaceStorage) {}

  nextListingId(): number {
    const s = this.storage();
    s.listingCounter += 1;
    return s.listingCounter;
  }

  get(listingId: number): Listing | undefined {
    const listing = this.storage().listings.get(listingId);
    return listing ? structuredClone(listing) : undefined;
  }

  put(listing: Listing) {
    const s = this.storage();
    const key = tokenKey(listing.tokenAddress, listing.tokenId);
    const ids = s.tokenListings.get(key) ?? [];
    if (!ids.includes(listing.listingId)) {
      s.tokenListings.set(key, [...ids, listing.listingId]);
    }
    s.listings.set(listing.listingId, structuredClone(listing));
  }

  delete(listingId: number) {
    const s = this.storage();
    const listing = s.listings.get(listingId);
    if (!listing) {
      return;
    }
    const key = tokenKey(listing.tokenAddress, listing.tokenId);
    const remaining = (s.tokenListings.get(key) ?? []).filter(
      (id) => id !== listingId,
    );
    if (remaining.length) {
      s.tokenListings.set(key, remaining);
    } else {
      s.tokenListings.delete(key);
    }
    s.listings.delete(listingId);
    s.buyerWhitelists.delete(listingId);
  }

  getUniqueErc721Listing(tokenAddress: Address, tokenId: bigint) {
    return this.storage().erc721Listings.get(tokenKey(tokenAddress, tokenId));
  }

  setUniqueErc721Listing(
    tokenAddress: Address,
    tokenId: bigint,
    listingId: number,
  ) {
    this.storage().erc721Listings.set(
      tokenKey(tokenAddress, tokenId),
      listingId,
    );
  }

  clearUniqueErc721Listing(tokenAddress: Address, tokenId: bigint) {
    this.storage().erc721Listings.delete(tokenKey(tokenAddress, tokenId));
  }

  listingIdsForToken(tokenAddress: Address, tokenId: bigint): number[] {
    return [
      ...(this.storage().tokenListings.get(tokenKey(tokenAddress, tokenId)) ??
        []),
    ];
  }

  activeListingIds(): number[] {
    return [...this.storage().listings.keys()].sort((a, b) => a - b);
  }

  get size() {
    return this.storage().listings.size;
  }
}
