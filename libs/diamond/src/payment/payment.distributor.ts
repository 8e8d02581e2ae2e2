import { erc2981At } from '@Bazaar/chain';
import {
  Address,
  MarketplaceError,
  MarketplaceErrorCode,
  NATIVE_CURRENCY,
} from '@Bazaar/type';

import type { MarketplaceDiamond } from '../diamond';
import { requireErc20 } from '../listing/token.access';
import {
  PaymentSplit,
  RoyaltyQuote,
  computePaymentSplit,
} from './payment.split';
import { safeTransferFrom } from './safe-transfer';

export type Settlement = {
  price: bigint;
  currency: Address;
  feeRate: bigint;
  buyer: Address;
  seller: Address;
  tokenAddress: Address;
  tokenId: bigint;
};

/**
 * Moves a purchase price straight from the buyer to the fee recipient,
 * the royalty receiver and the seller, in that order. Native payments
 * arrive with the call and leave within it; token payments are pulled
 * from the buyer's allowance. The marketplace never holds a balance.
 */
export class PaymentDistributor {
  constructor(private readonly diamond: MarketplaceDiamond) {}

  quoteRoyalty(
    tokenAddress: Address,
    tokenId: bigint,
    salePrice: bigint,
  ): RoyaltyQuote | null {
    if (salePrice === 0n) {
      return null;
    }
    const token = erc2981At(this.diamond.chain, tokenAddress);
    if (!token) {
      return null;
    }
    const { receiver, royaltyAmount } = token.royaltyInfo(tokenId, salePrice);
    return { receiver, amount: royaltyAmount };
  }

  distribute(settlement: Settlement): PaymentSplit {
    const split = computePaymentSplit(
      settlement.price,
      settlement.feeRate,
      this.quoteRoyalty(
        settlement.tokenAddress,
        settlement.tokenId,
        settlement.price,
      ),
    );

    const payees: [Address, bigint][] = [
      [this.diamond.storage.feeRecipient, split.fee],
    ];
    if (split.royaltyReceiver) {
      payees.push([split.royaltyReceiver, split.royaltyAmount]);
    }
    payees.push([settlement.seller, split.sellerProceeds]);

    for (const [to, amount] of payees) {
      if (amount > 0n) {
        this.pay(settlement.currency, settlement.buyer, to, amount);
      }
    }

    return split;
  }

  private pay(currency: Address, buyer: Address, to: Address, amount: bigint) {
    const { chain } = this.diamond;

    if (currency !== NATIVE_CURRENCY) {
      safeTransferFrom(
        requireErc20(chain, currency),
        this.diamond.address,
        buyer,
        to,
        amount,
      );
      return;
    }

    try {
      chain.sendValue(to, amount);
    } catch (err) {
      throw new MarketplaceError(
        MarketplaceErrorCode.NativeTransferFailed,
        `sending ${amount} to ${to} failed: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { cause: err },
      );
    }
  }
}
