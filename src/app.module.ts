import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';
import { ScanningModule } from './scanning/scanning.module';

/**
 * Scan Client Module
 * Root module: importable as a library, or booted as an application context
 * by the CLI in main.ts.
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule, ScanningModule],
  exports: [ApplicationModule, ScanningModule],
})
export class ScanClientModule {}
