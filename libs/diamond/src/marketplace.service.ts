import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';

import { Chain, ChainLog } from '@Bazaar/chain';
import { toJson } from '@Bazaar/common';
import { ListingView, StaleReason } from '@Bazaar/type';

import { MarketplaceDiamond } from './diamond';

export type ListingDetails = {
  listing: ListingView;
  staleReason: StaleReason | null;
};

export function formatLog(log: ChainLog) {
  return `#${log.blockNumber}:${log.logIndex} ${log.event.name} ${toJson(
    log.event.args,
  )}`;
}

@Injectable()
export class MarketplaceService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MarketplaceService.name);
  private unsubscribe: (() => void) | null = null;

  constructor(
    readonly chain: Chain,
    readonly market: MarketplaceDiamond,
  ) {}

  onModuleInit() {
    this.logger.log(`Marketplace deployed at ${this.market.address}`);
    this.unsubscribe = this.chain.onLog((log) => {
      if (log.address === this.market.address) {
        this.logger.log(formatLog(log));
      }
    });
  }

  onModuleDestroy() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  getListingDetails(listingId: number): ListingDetails | undefined {
    const listing = this.market.getters.getListing(listingId);
    if (!listing) {
      return undefined;
    }
    return {
      listing,
      staleReason: this.market.getters.getListingStaleReason(listingId),
    };
  }

  /** Ids of active listings that `cleanListing` would remove right now. */
  findStaleListings(): number[] {
    return this.market.getters
      .getActiveListingIds()
      .filter((id) => this.market.getters.getListingStaleReason(id) !== null);
  }
}
