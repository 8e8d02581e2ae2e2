import { Module } from '@nestjs/common';

import { ConfigModule } from '@Bazaar/config';
import { MarketplaceModule } from '@Bazaar/diamond';

import * as EventHandler from '../../event-handler/src/app.module';
import * as SettlementCycle from '../../settlement-cycle/src/app.module';
import { WebApiModule } from '../../web-api/src/web-api.module';
import { NodeService } from './node.service';
import { TransactionsController } from './transactions.controller';

/**
 * The API, the indexer and the sweeper around one chain. Nest builds each
 * imported module once, so they all share the global `MarketplaceModule`.
 */
@Module({
  imports: [
    ConfigModule,
    MarketplaceModule,
    WebApiModule,
    EventHandler.AppModule,
    SettlementCycle.AppModule,
  ],
  controllers: [TransactionsController],
  providers: [NodeService],
})
export class MarketplaceNodeModule {}
