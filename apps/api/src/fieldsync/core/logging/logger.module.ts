import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { LogService } from './log.service';

/**
 * Injection token for the core logger service, for consumers that prefer a
 * stable string id over the concrete class.
 */
export const LOGGER_SERVICE_TOKEN = 'logger_service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    LogService,
    {
      provide: LOGGER_SERVICE_TOKEN,
      useExisting: LogService,
    },
  ],
  exports: [LogService, LOGGER_SERVICE_TOKEN],
})
export class LoggerModule {}
