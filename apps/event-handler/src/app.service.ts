import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { HandlerService } from './handler/handler.service';

@Injectable()
export class AppService implements OnApplicationShutdown {
  constructor(
    private readonly configService: ConfigService,
    private readonly handlerService: HandlerService,
  ) {}

  init() {
    this.handlerService.start(
      this.configService.get<number>('event-handler.retryInterval'),
    );
  }

  onApplicationShutdown() {
    this.handlerService.stop();
  }
}
