import { ListingStatus } from './models/listing.record';

export type ListingEntry = {
  listingId: number;
  status: ListingStatus;
  seller: string;
  tokenAddress: string;
  tokenId: string;
  standard: string;
  erc1155Quantity: string;
  price: string;
  currency: string;
  desiredTokenAddress: string;
  desiredTokenId: string;
  desiredErc1155Quantity: string;
  feeRate: string;
  buyerWhitelistEnabled: boolean;
  partialBuyEnabled: boolean;
  createdBlock: number;
  updatedBlock: number;
};

export type PurchaseEntry = {
  listingId: number;
  blockNumber: number;
  logIndex: number;
  buyer: string;
  seller: string;
  tokenAddress: string;
  tokenId: string;
  erc1155Quantity: string;
  currency: string;
  price: string;
  fee: string;
  royaltyReceiver?: string;
  royaltyAmount: string;
  sellerProceeds: string;
};

export type ListingFilter = {
  status?: ListingStatus;
  seller?: string;
  tokenAddress?: string;
};

export type PurchaseFilter = {
  listingId?: number;
  buyer?: string;
  seller?: string;
};

export type Page<T> = {
  docs: T[];
  totalDocs: number;
  limit: number;
  page: number;
  totalPages: number;
  hasPrevPage: boolean;
  hasNextPage: boolean;
};

/**
 * Off-chain index of listings and purchases, fed from marketplace logs.
 * Also the injection token: DbModule binds it to {@link DbService}.
 */
export abstract class MarketplaceStore {
  abstract upsertListing(entry: ListingEntry): Promise<void>;
  // False when the listing was never indexed.
  abstract closeListing(
    listingId: number,
    status: ListingStatus,
    blockNumber: number,
  ): Promise<boolean>;
  abstract recordPurchase(entry: PurchaseEntry): Promise<void>;
  abstract getListing(listingId: number): Promise<ListingEntry | null>;
  abstract findListings(
    filter: ListingFilter,
    page: number,
    limit: number,
  ): Promise<Page<ListingEntry>>;
  abstract findPurchases(
    filter: PurchaseFilter,
    page: number,
    limit: number,
  ): Promise<Page<PurchaseEntry>>;
}
