import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { Chain } from '@Bazaar/chain';
import {
  ConfigModule,
  DEFAULT_MARKETPLACE,
  MarketplaceCfg,
} from '@Bazaar/config';
import { Network } from '@Bazaar/type';

import { deployMarketplace } from './deploy';
import { MarketplaceDiamond } from './diamond';
import { MarketplaceService } from './marketplace.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    { provide: Chain, useFactory: () => new Chain() },
    {
      provide: MarketplaceDiamond,
      useFactory: (chain: Chain, config: ConfigService) => {
        const network = config.get<Network>('network') ?? 'devnet';
        return deployMarketplace(
          chain,
          config.get<MarketplaceCfg>(`${network}.marketplace`) ??
            DEFAULT_MARKETPLACE,
        );
      },
      inject: [Chain, ConfigService],
    },
    MarketplaceService,
  ],
  exports: [Chain, MarketplaceDiamond, MarketplaceService],
})
export class MarketplaceModule {}
