import { CallOverrides, Chain, bindCaller } from '@Bazaar/chain';
import {
  Address,
  Listing,
  MarketplaceError,
  MarketplaceErrorCode,
} from '@Bazaar/type';

import type { MarketplaceDiamond } from '../diamond';
import { MarketplaceStorage } from '../storage/marketplace.storage';

/**
 * A slice of marketplace behavior. Facets share the diamond's address and
 * storage; calls bound with `connect` run as calls to the diamond.
 */
export abstract class Facet {
  constructor(protected readonly diamond: MarketplaceDiamond) {}

  get address(): Address {
    return this.diamond.address;
  }

  connect(sender: Address, overrides?: CallOverrides): this {
    return bindCaller(
      this,
      this.chain,
      this.diamond.address,
      sender,
      overrides,
    );
  }

  protected get chain(): Chain {
    return this.diamond.chain;
  }

  protected get storage(): MarketplaceStorage {
    return this.diamond.storage;
  }

  protected get sender(): Address {
    return this.chain.msg.sender;
  }

  protected enforceIsContractOwner() {
    if (this.sender !== this.storage.owner) {
      throw new MarketplaceError(
        MarketplaceErrorCode.NotContractOwner,
        `${this.sender} is not the contract owner`,
      );
    }
  }

  protected requireListing(listingId: number): Listing {
    const listing = this.diamond.registry.get(listingId);
    if (!listing) {
      throw new MarketplaceError(
        MarketplaceErrorCode.ListingNotFound,
        `listing ${listingId}`,
      );
    }
    return listing;
  }

  protected enforceNotPaused() {
    if (this.storage.paused) {
      throw new MarketplaceError(MarketplaceErrorCode.ContractPaused);
    }
  }
}
