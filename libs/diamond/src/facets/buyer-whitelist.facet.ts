import { Address, MarketplaceError, MarketplaceErrorCode } from '@Bazaar/type';

import type { MarketplaceDiamond } from '../diamond';
import { Facet } from './facet';

function enforceBatchSize(diamond: MarketplaceDiamond, buyers: Address[]) {
  const max = diamond.storage.buyerWhitelistMaxBatchSize;
  if (buyers.length > max) {
    throw new MarketplaceError(
      MarketplaceErrorCode.BuyerBatchTooLarge,
      `${buyers.length} buyers, at most ${max} per call`,
    );
  }
}

/** Adds buyers without any authorization; callers have done it. */
export function grantBuyers(
  diamond: MarketplaceDiamond,
  listingId: number,
  buyers: Address[],
) {
  enforceBatchSize(diamond, buyers);
  const whitelists = diamond.storage.buyerWhitelists;
  const members = whitelists.get(listingId) ?? new Set<Address>();
  for (const buyer of buyers) {
    members.add(buyer);
  }
  whitelists.set(listingId, members);
  diamond.chain.emitLog({
    name: 'BuyersWhitelisted',
    args: { listingId, buyers },
  });
}

export function revokeBuyers(
  diamond: MarketplaceDiamond,
  listingId: number,
  buyers: Address[],
) {
  enforceBatchSize(diamond, buyers);
  const members = diamond.storage.buyerWhitelists.get(listingId);
  for (const buyer of buyers) {
    members?.delete(buyer);
  }
  diamond.chain.emitLog({ name: 'BuyersRemoved', args: { listingId, buyers } });
}

export class BuyerWhitelistFacet extends Facet {
  isBuyerWhitelisted(listingId: number, buyer: Address): boolean {
    return this.storage.buyerWhitelists.get(listingId)?.has(buyer) ?? false;
  }

  getWhitelistedBuyers(listingId: number): Address[] {
    return [...(this.storage.buyerWhitelists.get(listingId) ?? [])];
  }

  getBuyerWhitelistMaxBatchSize(): number {
    return this.storage.buyerWhitelistMaxBatchSize;
  }

  setBuyerWhitelistMaxBatchSize(size: number) {
    this.enforceIsContractOwner();
    if (!Number.isInteger(size) || size < 1) {
      throw new MarketplaceError(
        MarketplaceErrorCode.InvalidAmount,
        `batch size ${size}`,
      );
    }
    this.storage.buyerWhitelistMaxBatchSize = size;
  }

  addBuyersToWhitelist(listingId: number, buyers: Address[]) {
    this.diamond.guard.run(() => {
      this.requireManagedWhitelist(listingId);
      grantBuyers(this.diamond, listingId, buyers);
    });
  }

  removeBuyersFromWhitelist(listingId: number, buyers: Address[]) {
    this.diamond.guard.run(() => {
      this.requireManagedWhitelist(listingId);
      revokeBuyers(this.diamond, listingId, buyers);
    });
  }

  private requireManagedWhitelist(listingId: number) {
    const listing = this.requireListing(listingId);
    this.diamond.checks.authorizeListingOperator(listing, this.sender);
    if (!listing.buyerWhitelistEnabled) {
      throw new MarketplaceError(
        MarketplaceErrorCode.BuyerWhitelistNotEnabled,
        `listing ${listingId}`,
      );
    }
  }
}
