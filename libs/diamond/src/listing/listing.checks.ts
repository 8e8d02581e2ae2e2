import {
  Address,
  Listing,
  MarketplaceError,
  MarketplaceErrorCode,
  StaleReason,
  TokenStandard,
} from '@Bazaar/type';

import type { MarketplaceDiamond } from '../diamond';
import { indexedSetHas } from '../storage/indexed-set';
import {
  approvedOrZero,
  ownerOrNull,
  requireErc1155,
  requireErc721,
} from './token.access';

export type StaleCheckOptions = {
  // ERC-721 listings also go stale when their collection leaves the whitelist.
  includeCollection?: boolean;
};

/** Checks that depend on token state outside the marketplace. */
export class ListingChecks {
  constructor(private readonly diamond: MarketplaceDiamond) {}

  /** Seller, or an operator the seller approved on the token contract. */
  authorizeListingOperator(listing: Listing, account: Address) {
    if (account === listing.seller) {
      return;
    }

    const { chain } = this.diamond;
    let approved: boolean;
    if (listing.kind.standard === TokenStandard.ERC721) {
      const token = requireErc721(chain, listing.tokenAddress);
      approved =
        approvedOrZero(token, listing.tokenId) === account ||
        token.isApprovedForAll(listing.seller, account);
    } else {
      approved = requireErc1155(chain, listing.tokenAddress).isApprovedForAll(
        listing.seller,
        account,
      );
    }

    if (!approved) {
      throw new MarketplaceError(
        MarketplaceErrorCode.NotAuthorized,
        `${account} cannot manage listing ${listing.listingId}`,
      );
    }
  }

  /**
   * First reason the listing can no longer settle, or null while the seller
   * still holds `requiredQuantity` and the marketplace may move it.
   */
  staleReason(
    listing: Listing,
    requiredQuantity: bigint,
    options: StaleCheckOptions = {},
  ): StaleReason | null {
    const { chain, address: market } = this.diamond;

    if (listing.kind.standard === TokenStandard.ERC721) {
      const token = requireErc721(chain, listing.tokenAddress);
      if (ownerOrNull(token, listing.tokenId) !== listing.seller) {
        return 'seller-not-owner';
      }
      if (
        approvedOrZero(token, listing.tokenId) !== market &&
        !token.isApprovedForAll(listing.seller, market)
      ) {
        return 'marketplace-not-approved';
      }
      if (
        options.includeCollection &&
        !indexedSetHas(
          this.diamond.storage.whitelistedCollections,
          listing.tokenAddress,
        )
      ) {
        return 'collection-not-whitelisted';
      }
      return null;
    }

    const token = requireErc1155(chain, listing.tokenAddress);
    if (token.balanceOf(listing.seller, listing.tokenId) < requiredQuantity) {
      return 'insufficient-balance';
    }
    if (!token.isApprovedForAll(listing.seller, market)) {
      return 'marketplace-not-approved';
    }
    return null;
  }
}
