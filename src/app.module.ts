import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ReplayConfigModule } from './config/replay-config.module';
import { ReplayModule } from './replay/replay.module';
import { ReportingModule } from './reporting/reporting.module';
import { IngestionModule } from './ingestion/ingestion.module';

@Module({
  imports: [ReplayConfigModule, ReplayModule, ReportingModule, IngestionModule],
  controllers: [AppController],
})
export class AppModule {}
