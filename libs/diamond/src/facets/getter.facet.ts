import { Address, ListingView, StaleReason } from '@Bazaar/type';

import { erc1155QuantityOf, toListingView } from '../listing/listing.view';
import { Facet } from './facet';

export class GetterFacet extends Facet {
  getListing(listingId: number): ListingView | undefined {
    const listing = this.diamond.registry.get(listingId);
    return listing && toListingView(listing);
  }

  /** One id for an ERC-721 token; any number for ERC-1155 ids. */
  getListingIdsByToken(tokenAddress: Address, tokenId: bigint): number[] {
    return this.diamond.registry.listingIdsForToken(tokenAddress, tokenId);
  }

  getErc721ListingId(
    tokenAddress: Address,
    tokenId: bigint,
  ): number | undefined {
    return this.diamond.registry.getUniqueErc721Listing(tokenAddress, tokenId);
  }

  getActiveListingIds(): number[] {
    return this.diamond.registry.activeListingIds();
  }

  getNextListingId(): number {
    return this.storage.listingCounter + 1;
  }

  /** Why `cleanListing` would remove the listing, or null if it would not. */
  getListingStaleReason(listingId: number): StaleReason | null {
    const listing = this.requireListing(listingId);
    return this.diamond.checks.staleReason(
      listing,
      erc1155QuantityOf(listing.kind),
      { includeCollection: true },
    );
  }
}
