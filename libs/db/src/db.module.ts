import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypegooseModule } from 'nestjs-typegoose';

import { ConfigModule } from '@Bazaar/config';

import { DbService } from './db.service';
import { ListingRecord } from './models/listing.record';
import { PurchaseRecord } from './models/purchase.record';
import { MarketplaceStore } from './store';

const Models = [ListingRecord, PurchaseRecord];

const models = TypegooseModule.forFeature(Models, 'bazaar');

@Global()
@Module({
  imports: [
    TypegooseModule.forRootAsync({
      connectionName: 'bazaar',
      imports: [ConfigModule],
      useFactory: (service: ConfigService) => ({
        uri:
          service.get<string>('mongodb') ?? 'mongodb://127.0.0.1:27017/bazaar',
      }),
      inject: [ConfigService],
    }),
    models,
  ],
  providers: [DbService, { provide: MarketplaceStore, useExisting: DbService }],
  exports: [DbService, MarketplaceStore, models],
})
export class DbModule {}
