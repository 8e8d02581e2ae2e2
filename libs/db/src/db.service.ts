import { Inject, Injectable } from '@nestjs/common';
import { ReturnModelType } from '@typegoose/typegoose';
import { FilterQuery, PaginateModel } from 'mongoose';
import { getModelToken } from 'nestjs-typegoose';

import { ListingRecord, ListingStatus } from './models/listing.record';
import { PurchaseRecord } from './models/purchase.record';
import { normalizePage, toPage } from './pagination';
import {
  ListingEntry,
  ListingFilter,
  MarketplaceStore,
  Page,
  PurchaseEntry,
  PurchaseFilter,
} from './store';

export function toListingEntry(record: ListingRecord): ListingEntry {
  return {
    listingId: record.listingId,
    status: record.status,
    seller: record.seller,
    tokenAddress: record.tokenAddress,
    tokenId: record.tokenId,
    standard: record.standard,
    erc1155Quantity: record.erc1155Quantity,
    price: record.price,
    currency: record.currency,
    desiredTokenAddress: record.desiredTokenAddress,
    desiredTokenId: record.desiredTokenId,
    desiredErc1155Quantity: record.desiredErc1155Quantity,
    feeRate: record.feeRate,
    buyerWhitelistEnabled: record.buyerWhitelistEnabled,
    partialBuyEnabled: record.partialBuyEnabled,
    createdBlock: record.createdBlock,
    updatedBlock: record.updatedBlock,
  };
}

export function toPurchaseEntry(record: PurchaseRecord): PurchaseEntry {
  return {
    listingId: record.listingId,
    blockNumber: record.blockNumber,
    logIndex: record.logIndex,
    buyer: record.buyer,
    seller: record.seller,
    tokenAddress: record.tokenAddress,
    tokenId: record.tokenId,
    erc1155Quantity: record.erc1155Quantity,
    currency: record.currency,
    price: record.price,
    fee: record.fee,
    royaltyReceiver: record.royaltyReceiver,
    royaltyAmount: record.royaltyAmount,
    sellerProceeds: record.sellerProceeds,
  };
}

// BaseModel carries the pagination plugin.
type ListingModel = ReturnModelType<typeof ListingRecord> &
  PaginateModel<ListingRecord>;
type PurchaseModel = ReturnModelType<typeof PurchaseRecord> &
  PaginateModel<PurchaseRecord>;

@Injectable()
export class DbService implements MarketplaceStore {
  @Inject(getModelToken(ListingRecord.name))
  private readonly listingRecord!: ListingModel;

  @Inject(getModelToken(PurchaseRecord.name))
  private readonly purchaseRecord!: PurchaseModel;

  async upsertListing(entry: ListingEntry) {
    const { listingId, createdBlock, ...rest } = entry;
    await this.listingRecord
      .updateOne(
        { listingId },
        { $set: rest, $setOnInsert: { listingId, createdBlock } },
        { upsert: true },
      )
      .exec();
  }

  async closeListing(
    listingId: number,
    status: ListingStatus,
    blockNumber: number,
  ) {
    const result = await this.listingRecord
      .updateOne({ listingId }, { $set: { status, updatedBlock: blockNumber } })
      .exec();
    return result.matchedCount > 0;
  }

  async recordPurchase(entry: PurchaseEntry) {
    // Replaying a log must not double count it.
    await this.purchaseRecord
      .updateOne(
        { blockNumber: entry.blockNumber, logIndex: entry.logIndex },
        { $setOnInsert: entry },
        { upsert: true },
      )
      .exec();
  }

  async getListing(listingId: number) {
    const record = await this.listingRecord.findOne({ listingId }).exec();
    return record ? toListingEntry(record) : null;
  }

  async findListings(
    filter: ListingFilter,
    page: number,
    limit: number,
  ): Promise<Page<ListingEntry>> {
    const query: FilterQuery<ListingRecord> = {};
    if (filter.status) query.status = filter.status;
    if (filter.seller) query.seller = filter.seller;
    if (filter.tokenAddress) query.tokenAddress = filter.tokenAddress;

    const window = normalizePage(page, limit);
    const result = await this.listingRecord.paginate(query, {
      ...window,
      sort: { listingId: -1 },
    });
    return toPage(
      result.docs.map((record) => toListingEntry(record)),
      result.totalDocs,
      result.page ?? window.page,
      result.limit,
    );
  }

  async findPurchases(
    filter: PurchaseFilter,
    page: number,
    limit: number,
  ): Promise<Page<PurchaseEntry>> {
    const query: FilterQuery<PurchaseRecord> = {};
    if (filter.listingId !== undefined) query.listingId = filter.listingId;
    if (filter.buyer) query.buyer = filter.buyer;
    if (filter.seller) query.seller = filter.seller;

    const window = normalizePage(page, limit);
    const result = await this.purchaseRecord.paginate(query, {
      ...window,
      sort: { blockNumber: -1, logIndex: -1 },
    });
    return toPage(
      result.docs.map((record) => toPurchaseEntry(record)),
      result.totalDocs,
      result.page ?? window.page,
      result.limit,
    );
  }
}
