import { detectStandard } from '@Bazaar/chain';
import { Address, MarketplaceError, MarketplaceErrorCode } from '@Bazaar/type';

import {
  addToIndexedSet,
  indexedSetHas,
  indexedSetValues,
  removeFromIndexedSet,
} from '../storage/indexed-set';
import { Facet } from './facet';

export class CollectionWhitelistFacet extends Facet {
  isCollectionWhitelisted(collection: Address): boolean {
    return indexedSetHas(this.storage.whitelistedCollections, collection);
  }

  getWhitelistedCollections(): Address[] {
    return indexedSetValues(this.storage.whitelistedCollections);
  }

  addWhitelistedCollection(collection: Address) {
    this.enforceIsContractOwner();
    if (!detectStandard(this.chain, collection)) {
      throw new MarketplaceError(
        MarketplaceErrorCode.UnsupportedTokenStandard,
        `${collection} is neither ERC-721 nor ERC-1155`,
      );
    }
    if (!addToIndexedSet(this.storage.whitelistedCollections, collection)) {
      throw new MarketplaceError(
        MarketplaceErrorCode.CollectionAlreadyWhitelisted,
        collection,
      );
    }
    this.chain.emitLog({ name: 'CollectionWhitelisted', args: { collection } });
  }

  removeWhitelistedCollection(collection: Address) {
    this.enforceIsContractOwner();
    if (
      !removeFromIndexedSet(this.storage.whitelistedCollections, collection)
    ) {
      throw new MarketplaceError(
        MarketplaceErrorCode.CollectionNotWhitelisted,
        collection,
      );
    }
    this.chain.emitLog({ name: 'CollectionRemoved', args: { collection } });
  }
}
