import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { Chain } from '@Bazaar/chain';
import { SettlementCycleCfg, getSettlementCycle } from '@Bazaar/config';
import { MarketplaceDiamond, MarketplaceService } from '@Bazaar/diamond';
import { Address, StaleReason } from '@Bazaar/type';

export async function sleep(duration: number) {
  await new Promise<void>((resolve) => setTimeout(resolve, duration));
}

export type CleanedListing = {
  listingId: number;
  reason: StaleReason;
  keeper: Address;
};

/**
 * Sweeps listings that can no longer settle, calling `cleanListing` from a
 * rotating set of keeper accounts. When a keeper's call fails the next
 * keeper retries the same listing.
 */
@Injectable()
export class HandlerService {
  private readonly logger = new Logger(HandlerService.name);

  readonly keepers: Address[];
  readonly sleepDuration: number;
  keepersIndex = 0;
  running = false;

  constructor(
    configService: ConfigService,
    chain: Chain,
    private readonly market: MarketplaceDiamond,
    private readonly marketplaceService: MarketplaceService,
  ) {
    const cfg =
      configService.get<SettlementCycleCfg>('settlement-cycle') ??
      getSettlementCycle();
    this.keepers = cfg.keepers.map((keeper) => chain.resolveAccount(keeper));
    if (this.keepers.length === 0) {
      throw new Error('Keepers not exists');
    }
    this.sleepDuration = cfg.sleep;
  }

  get keeper(): Address {
    return this.keepers[this.keepersIndex];
  }

  increaseIndex() {
    this.keepersIndex = (this.keepersIndex + 1) % this.keepers.length;
  }

  removeListings(): CleanedListing[] {
    const stale = this.marketplaceService.findStaleListings();
    this.logger.log(`${stale.length} removable listings found: [${stale}]`);

    const removed: CleanedListing[] = [];
    for (const listingId of stale) {
      const cleaned = this.cleanListing(listingId);
      if (cleaned) {
        removed.push(cleaned);
      }
    }
    return removed;
  }

  /** Tries each keeper once, starting from the current one. */
  cleanListing(listingId: number): CleanedListing | null {
    for (let attempt = 0; attempt < this.keepers.length; attempt++) {
      const keeper = this.keeper;
      try {
        const reason = this.market.listings
          .connect(keeper)
          .cleanListing(listingId);
        return { listingId, reason, keeper };
      } catch (err) {
        this.logger.warn(
          `Keeper ${keeper} failed to clean listing ${listingId}: ${err}`,
        );
        this.increaseIndex();
      }
    }
    this.logger.error(`No keeper could clean listing ${listingId}`);
    return null;
  }

  async handle() {
    try {
      const removed = this.removeListings();
      this.logger.log(
        `Removed ${removed.length} listings; sleeping for ${
          this.sleepDuration / 1000
        }s.`,
      );
    } catch (err) {
      this.increaseIndex();
      this.logger.error(`Sweep failed: ${err}`);
    }
    await sleep(this.sleepDuration);
  }

  async start() {
    if (this.running) {
      this.logger.warn('HandlerService already running');
      return;
    }
    this.running = true;
    while (this.running) {
      await this.handle();
    }
    this.logger.log('Sweeping stopped.');
  }

  stop() {
    this.running = false;
  }
}
