import {
  Address,
  FEE_DENOMINATOR,
  MarketplaceError,
  MarketplaceErrorCode,
  ZERO_ADDRESS,
} from '@Bazaar/type';

export type RoyaltyQuote = {
  receiver: Address;
  amount: bigint;
};

export type PaymentSplit = {
  price: bigint;
  fee: bigint;
  royaltyReceiver: Address | null;
  royaltyAmount: bigint;
  sellerProceeds: bigint;
};

/**
 * Splits `price` into marketplace fee, royalty and seller proceeds. The
 * three parts always sum to `price`. A royalty with a zero receiver or a
 * zero amount counts as no royalty.
 */
export function computePaymentSplit(
  price: bigint,
  feeRate: bigint,
  royalty: RoyaltyQuote | null,
): PaymentSplit {
  if (price < 0n) {
    throw new MarketplaceError(MarketplaceErrorCode.InvalidAmount, 'price');
  }
  if (feeRate < 0n || feeRate > FEE_DENOMINATOR) {
    throw new MarketplaceError(MarketplaceErrorCode.InvalidFeeRate);
  }

  const fee = (price * feeRate) / FEE_DENOMINATOR;
  let remaining = price - fee;
  let royaltyReceiver: Address | null = null;
  let royaltyAmount = 0n;

  if (royalty && royalty.receiver !== ZERO_ADDRESS && royalty.amount > 0n) {
    if (royalty.amount > remaining) {
      throw new MarketplaceError(
        MarketplaceErrorCode.RoyaltyExceedsProceeds,
        `royalty ${royalty.amount} exceeds ${remaining} left after fee`,
      );
    }
    royaltyReceiver = royalty.receiver;
    royaltyAmount = royalty.amount;
    remaining -= royalty.amount;
  }

  return {
    price,
    fee,
    royaltyReceiver,
    royaltyAmount,
    sellerProceeds: remaining,
  };
}
