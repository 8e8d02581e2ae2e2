import { ListingStatus } from './models/listing.record';
import { paginateArray } from './pagination';
import {
  ListingEntry,
  ListingFilter,
  MarketplaceStore,
  PurchaseEntry,
  PurchaseFilter,
} from './store';

/** {@link MarketplaceStore} kept in process memory, for tests and dev runs. */
export class InMemoryStore implements MarketplaceStore {
  readonly listings = new Map<number, ListingEntry>();
  readonly purchases: PurchaseEntry[] = [];

  async upsertListing(entry: ListingEntry) {
    const existing = this.listings.get(entry.listingId);
    this.listings.set(entry.listingId, {
      ...entry,
      createdBlock: existing?.createdBlock ?? entry.createdBlock,
    });
  }

  async closeListing(
    listingId: number,
    status: ListingStatus,
    blockNumber: number,
  ) {
    const existing = this.listings.get(listingId);
    if (!existing) {
      return false;
    }
    this.listings.set(listingId, {
      ...existing,
      status,
      updatedBlock: blockNumber,
    });
    return true;
  }

  async recordPurchase(entry: PurchaseEntry) {
    const duplicate = this.purchases.some(
      (p) =>
        p.blockNumber === entry.blockNumber && p.logIndex === entry.logIndex,
    );
    if (!duplicate) {
      this.purchases.push({ ...entry });
    }
  }

  async getListing(listingId: number) {
    const entry = this.listings.get(listingId);
    return entry ? { ...entry } : null;
  }

  async findListings(filter: ListingFilter, page: number, limit: number) {
    const matches = [...this.listings.values()]
      .filter(
        (l) =>
          (!filter.status || l.status === filter.status) &&
          (!filter.seller || l.seller === filter.seller) &&
          (!filter.tokenAddress || l.tokenAddress === filter.tokenAddress),
      )
      .sort((a, b) => b.listingId - a.listingId);
    return paginateArray(matches, page, limit);
  }

  async findPurchases(filter: PurchaseFilter, page: number, limit: number) {
    const matches = this.purchases
      .filter(
        (p) =>
          (filter.listingId === undefined ||
            p.listingId === filter.listingId) &&
          (!filter.buyer || p.buyer === filter.buyer) &&
          (!filter.seller || p.seller === filter.seller),
      )
      .sort((a, b) => b.blockNumber - a.blockNumber || b.logIndex - a.logIndex);
    return paginateArray(matches, page, limit);
  }
}
