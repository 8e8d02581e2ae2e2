import { Module } from '@nestjs/common';

import { ConfigModule } from '@Bazaar/config';
import { MarketplaceModule } from '@Bazaar/diamond';

import { CONTROLLERS } from './web-api.controller';
import { WebApiService } from './web-api.service';

@Module({
  imports: [ConfigModule, MarketplaceModule],
  controllers: CONTROLLERS,
  providers: [WebApiService],
})
export class WebApiModule {}
