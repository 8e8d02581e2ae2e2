import { MarketplaceError, MarketplaceErrorCode } from '@Bazaar/type';

import { MarketplaceStorage } from '../storage/marketplace.storage';

/** Single lock shared by every state-mutating entry point. */
export class ReentrancyGuard {
  constructor(private readonly storage: () => MarketplaceStorage) {}

  get locked() {
    return this.storage().reentrancyLocked;
  }

  run<T>(body: () => T): T {
    if (this.storage().reentrancyLocked) {
      throw new MarketplaceError(MarketplaceErrorCode.ReentrantCall);
    }
    this.storage().reentrancyLocked = true;
    try {
      return body();
    } finally {
      this.storage().reentrancyLocked = false;
    }
  }
}
