import { Address, ZERO_ADDRESS } from '@Bazaar/type';

import { RoyaltyInfo } from '../interfaces';

export const ROYALTY_DENOMINATOR = 10_000n;

export type RoyaltyConfig = {
  receiver: Address;
  basisPoints: bigint;
};

export function computeRoyalty(
  config: RoyaltyConfig | null,
  salePrice: bigint,
): RoyaltyInfo {
  if (!config) {
    return { receiver: ZERO_ADDRESS, royaltyAmount: 0n };
  }
  return {
    receiver: config.receiver,
    royaltyAmount: (salePrice * config.basisPoints) / ROYALTY_DENOMINATOR,
  };
}
