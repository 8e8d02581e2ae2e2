import {
  Address,
  FEE_DENOMINATOR,
  MarketplaceError,
  MarketplaceErrorCode,
  ZERO_ADDRESS,
} from '@Bazaar/type';

import { Facet } from './facet';

export class AdminFacet extends Facet {
  owner(): Address {
    return this.storage.owner;
  }

  transferOwnership(newOwner: Address) {
    this.enforceIsContractOwner();
    if (newOwner === ZERO_ADDRESS) {
      throw new MarketplaceError(MarketplaceErrorCode.InvalidAddress, 'owner');
    }
    const previousOwner = this.storage.owner;
    this.storage.owner = newOwner;
    this.chain.emitLog({
      name: 'OwnershipTransferred',
      args: { previousOwner, newOwner },
    });
  }

  getFeeRate(): bigint {
    return this.storage.feeRate;
  }

  /** Applies to listings created or updated from now on. */
  setFeeRate(feeRate: bigint) {
    this.enforceIsContractOwner();
    if (feeRate < 0n || feeRate > FEE_DENOMINATOR) {
      throw new MarketplaceError(
        MarketplaceErrorCode.InvalidFeeRate,
        `${feeRate} is outside 0..${FEE_DENOMINATOR}`,
      );
    }
    this.storage.feeRate = feeRate;
    this.chain.emitLog({ name: 'FeeRateUpdated', args: { feeRate } });
  }

  getFeeRecipient(): Address {
    return this.storage.feeRecipient;
  }

  setFeeRecipient(feeRecipient: Address) {
    this.enforceIsContractOwner();
    if (feeRecipient === ZERO_ADDRESS) {
      throw new MarketplaceError(
        MarketplaceErrorCode.InvalidAddress,
        'fee recipient',
      );
    }
    this.storage.feeRecipient = feeRecipient;
    this.chain.emitLog({ name: 'FeeRecipientUpdated', args: { feeRecipient } });
  }

  isPaused(): boolean {
    return this.storage.paused;
  }

  pause() {
    this.enforceIsContractOwner();
    this.storage.paused = true;
    this.chain.emitLog({ name: 'Paused', args: { account: this.sender } });
  }

  unpause() {
    this.enforceIsContractOwner();
    this.storage.paused = false;
    this.chain.emitLog({ name: 'Unpaused', args: { account: this.sender } });
  }

  getVersion(): string {
    return this.storage.version;
  }

  setVersion(version: string) {
    this.enforceIsContractOwner();
    this.storage.version = version;
  }
}
