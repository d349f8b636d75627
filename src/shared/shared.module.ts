import { Module } from '@nestjs/common';
import { HttpModule } from './http/http.module';
import { LoggingModule } from './logging/logging.module';
import { TimingModule } from './timing/timing.module';

@Module({
  imports: [HttpModule, LoggingModule, TimingModule],
  exports: [HttpModule, LoggingModule, TimingModule],
})
export class SharedModule {}
