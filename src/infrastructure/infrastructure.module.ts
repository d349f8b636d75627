import { Module } from '@nestjs/common';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';
import { SCAN_API_PORT } from '../application/ports/output/scan-api.port';

// Adapters (implementations)
import { ScanApiHttpAdapter } from './adapters/http/scan-api-http.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the output ports and exports them
 * by token so use cases can inject the port, not the adapter.
 */
@Module({
  imports: [HttpModule, LoggingModule],
  providers: [
    ScanApiHttpAdapter,
    {
      provide: SCAN_API_PORT,
      useExisting: ScanApiHttpAdapter,
    },
  ],
  exports: [SCAN_API_PORT],
})
export class InfrastructureModule {}
