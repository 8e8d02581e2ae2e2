import { Chain, Contract } from '@Bazaar/chain';
import {
  Address,
  FEE_DENOMINATOR,
  MarketplaceError,
  MarketplaceErrorCode,
  NATIVE_CURRENCY,
  ZERO_ADDRESS,
} from '@Bazaar/type';

import { AdminFacet } from './facets/admin.facet';
import { BuyerWhitelistFacet } from './facets/buyer-whitelist.facet';
import { CollectionWhitelistFacet } from './facets/collection-whitelist.facet';
import { CurrencyWhitelistFacet } from './facets/currency-whitelist.facet';
import { GetterFacet } from './facets/getter.facet';
import { ListingFacet } from './facets/listing.facet';
import { ReentrancyGuard } from './guard/reentrancy.guard';
import { ListingChecks } from './listing/listing.checks';
import { addToIndexedSet, createIndexedSet } from './storage/indexed-set';
import { ListingRegistry } from './storage/listing.registry';
import { MarketplaceStorage } from './storage/marketplace.storage';

export type DiamondInit = {
  owner: Address;
  feeRecipient: Address;
  feeRate: bigint;
  buyerWhitelistMaxBatchSize: number;
  version: string;
  // Defaults to the native currency only.
  allowedCurrencies?: Address[];
};

/**
 * The marketplace contract. One address and one storage, with behavior
 * split across facets that all read and write that storage.
 */
export class MarketplaceDiamond extends Contract<MarketplaceStorage> {
  protected readonly state: MarketplaceStorage;

  readonly registry = new ListingRegistry(() => this.state);
  readonly guard = new ReentrancyGuard(() => this.state);
  readonly checks = new ListingChecks(this);

  readonly admin = new AdminFacet(this);
  readonly currencies = new CurrencyWhitelistFacet(this);
  readonly collections = new CollectionWhitelistFacet(this);
  readonly buyers = new BuyerWhitelistFacet(this);
  readonly listings = new ListingFacet(this);
  readonly getters = new GetterFacet(this);

  constructor(chain: Chain, init: DiamondInit) {
    super(chain, 'marketplace');

    if (init.owner === ZERO_ADDRESS || init.feeRecipient === ZERO_ADDRESS) {
      throw new MarketplaceError(MarketplaceErrorCode.InvalidAddress);
    }
    if (init.feeRate < 0n || init.feeRate > FEE_DENOMINATOR) {
      throw new MarketplaceError(
        MarketplaceErrorCode.InvalidFeeRate,
        `${init.feeRate} is outside 0..${FEE_DENOMINATOR}`,
      );
    }
    if (
      !Number.isInteger(init.buyerWhitelistMaxBatchSize) ||
      init.buyerWhitelistMaxBatchSize < 1
    ) {
      throw new MarketplaceError(
        MarketplaceErrorCode.InvalidAmount,
        'buyer whitelist batch size',
      );
    }

    const allowedCurrencies = createIndexedSet();
    for (const currency of init.allowedCurrencies ?? [NATIVE_CURRENCY]) {
      addToIndexedSet(allowedCurrencies, currency);
    }

    this.state = {
      owner: init.owner,
      paused: false,
      version: init.version,
      feeRate: init.feeRate,
      feeRecipient: init.feeRecipient,
      listingCounter: 0,
      listings: new Map(),
      erc721Listings: new Map(),
      tokenListings: new Map(),
      allowedCurrencies,
      whitelistedCollections: createIndexedSet(),
      buyerWhitelists: new Map(),
      buyerWhitelistMaxBatchSize: init.buyerWhitelistMaxBatchSize,
      reentrancyLocked: false,
    };
  }

  get storage(): MarketplaceStorage {
    return this.state;
  }
}
