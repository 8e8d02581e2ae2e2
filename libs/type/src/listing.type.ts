import { Address, TokenStandard } from './common.constant';

export type AssetKind =
  | { standard: TokenStandard.ERC721 }
  | { standard: TokenStandard.ERC1155; quantity: bigint };

export type DesiredAsset = {
  tokenAddress: Address;
  tokenId: bigint;
  kind: AssetKind;
};

/**
 * A seller's standing offer. `seller` is the holder at listing time; for
 * ERC-1155 listings created by an operator it differs from the caller.
 */
export type Listing = {
  listingId: number;
  feeRate: bigint;
  buyerWhitelistEnabled: boolean;
  partialBuyEnabled: boolean;
  tokenAddress: Address;
  tokenId: bigint;
  kind: AssetKind;
  price: bigint;
  seller: Address;
  currency: Address;
  desired: DesiredAsset | null;
};

/**
 * Flat projection of a listing. Zero values are sentinels: an
 * `erc1155Quantity` of 0 marks an ERC-721 listing and a zero
 * `desiredTokenAddress` marks a plain currency sale.
 */
export type ListingView = {
  listingId: number;
  feeRate: bigint;
  buyerWhitelistEnabled: boolean;
  partialBuyEnabled: boolean;
  tokenAddress: Address;
  tokenId: bigint;
  erc1155Quantity: bigint;
  price: bigint;
  seller: Address;
  currency: Address;
  desiredTokenAddress: Address;
  desiredTokenId: bigint;
  desiredErc1155Quantity: bigint;
};

export type CreateListingParams = {
  tokenAddress: Address;
  tokenId: bigint;
  // Holder an ERC-1155 operator is listing for; zero means the caller.
  erc1155Holder: Address;
  price: bigint;
  currency: Address;
  desiredTokenAddress: Address;
  desiredTokenId: bigint;
  desiredErc1155Quantity: bigint;
  erc1155Quantity: bigint;
  buyerWhitelistEnabled: boolean;
  partialBuyEnabled: boolean;
  allowedBuyers: Address[];
};

export type UpdateListingParams = Omit<
  CreateListingParams,
  'tokenAddress' | 'tokenId' | 'erc1155Holder'
> & {
  listingId: number;
};

export type PurchaseListingParams = {
  listingId: number;
  expectedPrice: bigint;
  expectedCurrency: Address;
  expectedErc1155Quantity: bigint;
  expectedDesiredTokenAddress: Address;
  expectedDesiredTokenId: bigint;
  expectedDesiredErc1155Quantity: bigint;
  // 0 buys an ERC-721 listing whole.
  erc1155PurchaseQuantity: bigint;
  // Holder of the desired ERC-1155 asset when the buyer is its operator.
  desiredErc1155Holder: Address;
};

export type PurchaseReceipt = {
  listingId: number;
  buyer: Address;
  seller: Address;
  tokenAddress: Address;
  tokenId: bigint;
  erc1155Quantity: bigint;
  currency: Address;
  price: bigint;
  fee: bigint;
  royaltyReceiver: Address | null;
  royaltyAmount: bigint;
  sellerProceeds: bigint;
  desiredTokenAddress: Address;
  desiredTokenId: bigint;
  desiredErc1155Quantity: bigint;
  listingRemoved: boolean;
  remainingErc1155Quantity: bigint;
  remainingPrice: bigint;
};

export type StaleReason =
  | 'seller-not-owner'
  | 'insufficient-balance'
  | 'marketplace-not-approved'
  | 'collection-not-whitelisted';
