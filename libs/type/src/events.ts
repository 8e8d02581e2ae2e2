import { Address } from './common.constant';
import { ListingView, PurchaseReceipt, StaleReason } from './listing.type';

export type MarketplaceEvent =
  | { name: 'ListingCreated'; args: { listing: ListingView } }
  | { name: 'ListingUpdated'; args: { listing: ListingView } }
  | { name: 'ListingPurchased'; args: PurchaseReceipt }
  | {
      name: 'ListingCancelled';
      args: { listingId: number; seller: Address; canceller: Address };
    }
  | {
      name: 'ListingCleaned';
      args: { listingId: number; seller: Address; reason: StaleReason };
    }
  | { name: 'CurrencyAllowed'; args: { currency: Address } }
  | { name: 'CurrencyRemoved'; args: { currency: Address } }
  | { name: 'CollectionWhitelisted'; args: { collection: Address } }
  | { name: 'CollectionRemoved'; args: { collection: Address } }
  | {
      name: 'BuyersWhitelisted';
      args: { listingId: number; buyers: Address[] };
    }
  | { name: 'BuyersRemoved'; args: { listingId: number; buyers: Address[] } }
  | { name: 'FeeRateUpdated'; args: { feeRate: bigint } }
  | { name: 'FeeRecipientUpdated'; args: { feeRecipient: Address } }
  | {
      name: 'OwnershipTransferred';
      args: { previousOwner: Address; newOwner: Address };
    }
  | { name: 'Paused'; args: { account: Address } }
  | { name: 'Unpaused'; args: { account: Address } };

export type TokenEvent =
  | { name: 'Transfer'; args: { from: Address; to: Address; value: bigint } }
  | {
      name: 'Approval';
      args: { owner: Address; spender: Address; value: bigint };
    }
  | {
      name: 'NftTransfer';
      args: { from: Address; to: Address; tokenId: bigint };
    }
  | {
      name: 'NftApproval';
      args: { owner: Address; approved: Address; tokenId: bigint };
    }
  | {
      name: 'TransferSingle';
      args: {
        operator: Address;
        from: Address;
        to: Address;
        id: bigint;
        value: bigint;
      };
    }
  | {
      name: 'ApprovalForAll';
      args: { owner: Address; operator: Address; approved: boolean };
    };

export type ChainEvent = MarketplaceEvent | TokenEvent;

export const MARKETPLACE_EVENT_NAMES: MarketplaceEvent['name'][] = [
  'ListingCreated',
  'ListingUpdated',
  'ListingPurchased',
  'ListingCancelled',
  'ListingCleaned',
  'CurrencyAllowed',
  'CurrencyRemoved',
  'CollectionWhitelisted',
  'CollectionRemoved',
  'BuyersWhitelisted',
  'BuyersRemoved',
  'FeeRateUpdated',
  'FeeRecipientUpdated',
  'OwnershipTransferred',
  'Paused',
  'Unpaused',
];

export function isMarketplaceEvent(
  event: ChainEvent,
): event is MarketplaceEvent {
  return MARKETPLACE_EVENT_NAMES.some((name) => name === event.name);
}
