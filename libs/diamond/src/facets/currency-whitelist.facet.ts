import { Address, MarketplaceError, MarketplaceErrorCode } from '@Bazaar/type';

import {
  addToIndexedSet,
  indexedSetHas,
  indexedSetValues,
  removeFromIndexedSet,
} from '../storage/indexed-set';
import { Facet } from './facet';

/**
 * Currencies new listings may ask for. Only consulted when a listing is
 * created or updated; removing a currency leaves existing listings
 * purchasable.
 */
export class CurrencyWhitelistFacet extends Facet {
  isCurrencyAllowed(currency: Address): boolean {
    return indexedSetHas(this.storage.allowedCurrencies, currency);
  }

  getAllowedCurrencies(): Address[] {
    return indexedSetValues(this.storage.allowedCurrencies);
  }

  addAllowedCurrency(currency: Address) {
    this.enforceIsContractOwner();
    if (!addToIndexedSet(this.storage.allowedCurrencies, currency)) {
      throw new MarketplaceError(
        MarketplaceErrorCode.CurrencyAlreadyAllowed,
        currency,
      );
    }
    this.chain.emitLog({ name: 'CurrencyAllowed', args: { currency } });
  }

  removeAllowedCurrency(currency: Address) {
    this.enforceIsContractOwner();
    if (!removeFromIndexedSet(this.storage.allowedCurrencies, currency)) {
      throw new MarketplaceError(
        MarketplaceErrorCode.CurrencyNotAllowed,
        currency,
      );
    }
    this.chain.emitLog({ name: 'CurrencyRemoved', args: { currency } });
  }
}
