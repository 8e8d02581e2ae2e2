import { IErc20 } from '@Bazaar/chain';
import { Address, MarketplaceError, MarketplaceErrorCode } from '@Bazaar/type';

/**
 * Pulls `amount` of `token` from `from` to `to` on behalf of `operator`.
 * A revert or an explicit `false` fails the transfer; a token that
 * returns nothing is taken at its word.
 */
export function safeTransferFrom(
  token: IErc20,
  operator: Address,
  from: Address,
  to: Address,
  amount: bigint,
) {
  let result: boolean | undefined;
  try {
    result = token.connect(operator).transferFrom(from, to, amount);
  } catch (err) {
    throw new MarketplaceError(
      MarketplaceErrorCode.TokenTransferFailed,
      `transferFrom ${from} -> ${to} reverted: ${
        err instanceof Error ? err.message : String(err)
      }`,
      { cause: err },
    );
  }
  if (result === false) {
    throw new MarketplaceError(
      MarketplaceErrorCode.TokenTransferFailed,
      `transferFrom ${from} -> ${to} returned false`,
    );
  }
}
