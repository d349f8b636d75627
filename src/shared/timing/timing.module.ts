import { Module } from '@nestjs/common';
import { DELAY_PORT } from '../../application/ports/output/delay.port';
import { DelayService } from './delay.service';

@Module({
  providers: [DelayService, { provide: DELAY_PORT, useExisting: DelayService }],
  exports: [DELAY_PORT],
})
export class TimingModule {}
