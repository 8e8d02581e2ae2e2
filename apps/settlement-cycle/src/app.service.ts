import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';

import { HandlerService } from './handler/handler.service';

@Injectable()
export class AppService implements OnApplicationShutdown {
  private readonly logger = new Logger(AppService.name);

  constructor(private readonly handlerService: HandlerService) {}

  init() {
    this.handlerService
      .start()
      .catch((err) => this.logger.error(`Settlement cycle crashed: ${err}`));
  }

  onApplicationShutdown() {
    this.handlerService.stop();
  }
}
