import { Chain } from '@Bazaar/chain';
import { MarketplaceCfg } from '@Bazaar/config';
import { NATIVE_CURRENCY } from '@Bazaar/type';

import { MarketplaceDiamond } from './diamond';

export function deployMarketplace(
  chain: Chain,
  cfg: MarketplaceCfg,
): MarketplaceDiamond {
  return new MarketplaceDiamond(chain, {
    owner: chain.resolveAccount(cfg.owner),
    feeRecipient: chain.resolveAccount(cfg.feeRecipient),
    feeRate: BigInt(cfg.feeRate),
    buyerWhitelistMaxBatchSize: cfg.buyerWhitelistMaxBatchSize,
    version: cfg.version,
    allowedCurrencies: cfg.allowedCurrencies.map((currency) =>
      currency === 'native' ? NATIVE_CURRENCY : chain.resolveAccount(currency),
    ),
  });
}
