import { BadRequestException, Injectable } from '@nestjs/common';

import {
  ListingFilter,
  ListingStatus,
  MarketplaceStore,
} from '@Bazaar/db';
import { MarketplaceDiamond, MarketplaceService } from '@Bazaar/diamond';
import { Address, MarketplaceError, MarketplaceErrorCode } from '@Bazaar/type';

function isListingStatus(value: string): value is ListingStatus {
  return Object.values(ListingStatus).some((status) => status === value);
}

@Injectable()
export class WebApiService {
  constructor(
    private readonly market: MarketplaceDiamond,
    private readonly marketplaceService: MarketplaceService,
    private readonly store: MarketplaceStore,
  ) {}

  getMarketplace() {
    const { admin, currencies, collections, getters } = this.market;
    return {
      address: this.market.address,
      owner: admin.owner(),
      version: admin.getVersion(),
      paused: admin.isPaused(),
      feeRate: admin.getFeeRate(),
      feeRecipient: admin.getFeeRecipient(),
      allowedCurrencies: currencies.getAllowedCurrencies(),
      whitelistedCollections: collections.getWhitelistedCollections(),
      nextListingId: getters.getNextListingId(),
      activeListings: getters.getActiveListingIds().length,
    };
  }

  getListing(listingId: number) {
    const details = this.marketplaceService.getListingDetails(listingId);
    if (!details) {
      throw new MarketplaceError(
        MarketplaceErrorCode.ListingNotFound,
        `listing ${listingId}`,
      );
    }
    return details;
  }

  getListingIdsByToken(tokenAddress: Address, tokenId: bigint) {
    return this.market.getters.getListingIdsByToken(tokenAddress, tokenId);
  }

  getStaleListings() {
    return this.marketplaceService.findStaleListings();
  }

  async getListingHistory(
    filter: { status?: string; seller?: string; tokenAddress?: string },
    page: number,
    limit: number,
  ) {
    const query: ListingFilter = {
      seller: filter.seller,
      tokenAddress: filter.tokenAddress,
    };
    if (filter.status) {
      if (!isListingStatus(filter.status)) {
        throw new BadRequestException(
          `unknown listing status "${filter.status}"`,
        );
      }
      query.status = filter.status;
    }
    return this.store.findListings(query, page, limit);
  }

  async getPurchases(
    filter: { listingId?: number; buyer?: string; seller?: string },
    page: number,
    limit: number,
  ) {
    return this.store.findPurchases(filter, page, limit);
  }
}
