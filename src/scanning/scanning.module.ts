import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { ScanSessionService } from './scan-session.service';

@Module({
  imports: [ApplicationModule],
  providers: [ScanSessionService],
  exports: [ScanSessionService],
})
export class ScanningModule {}
