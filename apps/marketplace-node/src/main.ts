import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { HttpExceptionFilter } from '@Bazaar/common';

import * as EventHandler from '../../event-handler/src/app.service';
import * as SettlementCycle from '../../settlement-cycle/src/app.service';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const prefix = '/api';
  app.setGlobalPrefix(prefix);
  const options = new DocumentBuilder()
    .setTitle('BAZAAR API')
    .setDescription(
      'Marketplace listings, purchases, stale listings and dev transactions',
    )
    .setVersion('1.0')
    .build();

  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(app, options);
  SwaggerModule.setup(prefix, app, document);

  app.get(EventHandler.AppService).init();
  app.get(SettlementCycle.AppService).init();

  const service = app.get(ConfigService);
  const port = service.get<number>('web-api.port') ?? 6000;
  await app.listen(port, '0.0.0.0');
  new Logger('MarketplaceNode').log(
    `Application is running on: ${await app.getUrl()}`,
  );
}

bootstrap().catch((err) => {
  new Logger('MarketplaceNode').error(err);
  process.exit(1);
});
