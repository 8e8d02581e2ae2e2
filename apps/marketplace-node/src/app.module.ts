import { Module } from '@nestjs/common';

import { DbModule } from '@Bazaar/db';

import { MarketplaceNodeModule } from './node.module';

@Module({
  imports: [DbModule, MarketplaceNodeModule],
})
export class AppModule {}
