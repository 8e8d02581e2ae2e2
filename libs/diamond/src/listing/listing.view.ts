import {
  AssetKind,
  Listing,
  ListingView,
  TokenStandard,
  ZERO_ADDRESS,
} from '@Bazaar/type';

export function erc1155QuantityOf(kind: AssetKind): bigint {
  return kind.standard === TokenStandard.ERC1155 ? kind.quantity : 0n;
}

export function toListingView(listing: Listing): ListingView {
  return {
    listingId: listing.listingId,
    feeRate: listing.feeRate,
    buyerWhitelistEnabled: listing.buyerWhitelistEnabled,
    partialBuyEnabled: listing.partialBuyEnabled,
    tokenAddress: listing.tokenAddress,
    tokenId: listing.tokenId,
    erc1155Quantity: erc1155QuantityOf(listing.kind),
    price: listing.price,
    seller: listing.seller,
    currency: listing.currency,
    desiredTokenAddress: listing.desired?.tokenAddress ?? ZERO_ADDRESS,
    desiredTokenId: listing.desired?.tokenId ?? 0n,
    desiredErc1155Quantity: listing.desired
      ? erc1155QuantityOf(listing.desired.kind)
      : 0n,
  };
}
