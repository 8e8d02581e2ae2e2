import { Injectable, Logger } from '@nestjs/common';

import { Chain, ChainLog } from '@Bazaar/chain';
import { ListingEntry, ListingStatus, MarketplaceStore } from '@Bazaar/db';
import { MarketplaceDiamond, formatLog } from '@Bazaar/diamond';
import {
  ListingView,
  MarketplaceEvent,
  TokenStandard,
  isMarketplaceEvent,
} from '@Bazaar/type';

const RETRY_INTERVAL = 5000;
const MAX_ATTEMPTS = 5;

export enum MessageHandleResult {
  Success,
  Fail,
  Skip,
}

export type DrainSummary = {
  success: number;
  failed: number;
  skipped: number;
};

const SUMMARY_KEYS: Record<MessageHandleResult, keyof DrainSummary> = {
  [MessageHandleResult.Success]: 'success',
  [MessageHandleResult.Fail]: 'failed',
  [MessageHandleResult.Skip]: 'skipped',
};

type QueuedLog = {
  log: ChainLog;
  attempts: number;
};

export function listingEntryFromView(
  view: ListingView,
  blockNumber: number,
): ListingEntry {
  return {
    listingId: view.listingId,
    status: ListingStatus.Active,
    seller: view.seller,
    tokenAddress: view.tokenAddress,
    tokenId: view.tokenId.toString(),
    standard:
      view.erc1155Quantity === 0n
        ? TokenStandard.ERC721
        : TokenStandard.ERC1155,
    erc1155Quantity: view.erc1155Quantity.toString(),
    price: view.price.toString(),
    currency: view.currency,
    desiredTokenAddress: view.desiredTokenAddress,
    desiredTokenId: view.desiredTokenId.toString(),
    desiredErc1155Quantity: view.desiredErc1155Quantity.toString(),
    feeRate: view.feeRate.toString(),
    buyerWhitelistEnabled: view.buyerWhitelistEnabled,
    partialBuyEnabled: view.partialBuyEnabled,
    createdBlock: blockNumber,
    updatedBlock: blockNumber,
  };
}

/**
 * Mirrors marketplace logs into the listing index. Logs are handled in
 * order; a log whose write fails is retried on an interval until it
 * succeeds or runs out of attempts.
 */
@Injectable()
export class HandlerService {
  private readonly logger = new Logger(HandlerService.name);

  private queue: QueuedLog[] = [];
  private retries: QueuedLog[] = [];
  private draining = false;
  private unsubscribe: (() => void) | null = null;
  private retryTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly chain: Chain,
    private readonly market: MarketplaceDiamond,
    private readonly store: MarketplaceStore,
  ) {}

  get running() {
    return this.unsubscribe !== null;
  }

  get pendingRetries() {
    return this.retries.length;
  }

  enqueue(log: ChainLog) {
    this.queue.push({ log, attempts: 0 });
  }

  private closed(indexed: boolean) {
    // Listings created before indexing began have nothing to close.
    return indexed ? MessageHandleResult.Success : MessageHandleResult.Skip;
  }

  async handleEvent(
    event: MarketplaceEvent,
    log: ChainLog,
  ): Promise<MessageHandleResult> {
    switch (event.name) {
      case 'ListingCreated':
      case 'ListingUpdated':
        await this.store.upsertListing(
          listingEntryFromView(event.args.listing, log.blockNumber),
        );
        return MessageHandleResult.Success;

      case 'ListingPurchased': {
        const receipt = event.args;
        await this.store.recordPurchase({
          listingId: receipt.listingId,
          blockNumber: log.blockNumber,
          logIndex: log.logIndex,
          buyer: receipt.buyer,
          seller: receipt.seller,
          tokenAddress: receipt.tokenAddress,
          tokenId: receipt.tokenId.toString(),
          erc1155Quantity: receipt.erc1155Quantity.toString(),
          currency: receipt.currency,
          price: receipt.price.toString(),
          fee: receipt.fee.toString(),
          royaltyReceiver: receipt.royaltyReceiver ?? undefined,
          royaltyAmount: receipt.royaltyAmount.toString(),
          sellerProceeds: receipt.sellerProceeds.toString(),
        });
        if (receipt.listingRemoved) {
          return this.closed(
            await this.store.closeListing(
              receipt.listingId,
              ListingStatus.Sold,
              log.blockNumber,
            ),
          );
        }
        const entry = await this.store.getListing(receipt.listingId);
        if (!entry) {
          return MessageHandleResult.Skip;
        }
        await this.store.upsertListing({
          ...entry,
          erc1155Quantity: receipt.remainingErc1155Quantity.toString(),
          price: receipt.remainingPrice.toString(),
          updatedBlock: log.blockNumber,
        });
        return MessageHandleResult.Success;
      }

      case 'ListingCancelled':
        return this.closed(
          await this.store.closeListing(
            event.args.listingId,
            ListingStatus.Cancelled,
            log.blockNumber,
          ),
        );

      case 'ListingCleaned':
        return this.closed(
          await this.store.closeListing(
            event.args.listingId,
            ListingStatus.Cleaned,
            log.blockNumber,
          ),
        );

      default:
        return MessageHandleResult.Skip;
    }
  }

  async handleMessage(log: ChainLog): Promise<MessageHandleResult> {
    if (log.address !== this.market.address || !isMarketplaceEvent(log.event)) {
      return MessageHandleResult.Skip;
    }
    try {
      return await this.handleEvent(log.event, log);
    } catch (err) {
      this.logger.error(`Failed to handle ${formatLog(log)}: ${err}`);
      return MessageHandleResult.Fail;
    }
  }

  /** Handles everything queued so far, in order. */
  async drain(): Promise<DrainSummary> {
    const summary: DrainSummary = { success: 0, failed: 0, skipped: 0 };
    if (this.draining) {
      return summary;
    }

    this.draining = true;
    try {
      while (this.queue.length > 0) {
        const [item] = this.queue.splice(0, 1);
        const result = await this.handleMessage(item.log);
        summary[SUMMARY_KEYS[result]]++;
        if (result === MessageHandleResult.Fail) {
          this.scheduleRetry(item);
        }
      }
    } finally {
      this.draining = false;
    }

    if (summary.success + summary.failed > 0) {
      this.logger.log(
        `Handled logs: success ${summary.success}, ` +
          `failed ${summary.failed}, skipped ${summary.skipped}`,
      );
    }
    return summary;
  }

  /** Moves failed logs back onto the queue and drains it. */
  async retryFailed(): Promise<DrainSummary> {
    this.queue.push(...this.retries);
    this.retries = [];
    return this.drain();
  }

  start(retryInterval = RETRY_INTERVAL) {
    if (this.running) {
      this.logger.warn('HandlerService already running');
      return;
    }

    this.unsubscribe = this.chain.onLog((log) => {
      this.enqueue(log);
      this.drain().catch((err) => this.logger.error(`Drain failed: ${err}`));
    });
    this.retryTimer = setInterval(() => {
      if (this.retries.length === 0) {
        return;
      }
      this.retryFailed().catch((err) =>
        this.logger.error(`Retry failed: ${err}`),
      );
    }, retryInterval);
    this.logger.log(`Indexing logs of ${this.market.address}`);
  }

  stop() {
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
    this.logger.log('Indexing stopped.');
  }

  private scheduleRetry(item: QueuedLog) {
    const attempts = item.attempts + 1;
    if (attempts >= MAX_ATTEMPTS) {
      this.logger.error(
        `Giving up on ${formatLog(item.log)} after ${attempts} attempts`,
      );
      return;
    }
    this.retries.push({ log: item.log, attempts });
  }
}
