import { Module } from '@nestjs/common';

import { ConfigModule } from '@Bazaar/config';
import { MarketplaceModule } from '@Bazaar/diamond';

import { AppService } from './app.service';
import { HandlerModule } from './handler/handler.module';

@Module({
  imports: [ConfigModule, MarketplaceModule, HandlerModule],
  providers: [AppService],
})
export class AppModule {}
