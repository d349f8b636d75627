import { Module } from '@nestjs/common';
import { LoggingModule } from '../logging/logging.module';
import { HttpClientService } from './http-client.service';

@Module({
  imports: [LoggingModule],
  providers: [HttpClientService],
  exports: [HttpClientService],
})
export class HttpModule {}
