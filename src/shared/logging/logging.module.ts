import { Global, Module } from '@nestjs/common';
import { PinoLoggerService } from './pino-logger.service';

/**
 * One root logger for the application context. `ConfigService` comes from
 * the global config module.
 */
@Global()
@Module({
  providers: [PinoLoggerService],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
