import { Module } from '@nestjs/common';
import { TradeCsvReader } from './trade-csv.reader';

@Module({
  providers: [TradeCsvReader],
  exports: [TradeCsvReader],
})
export class IngestionModule {}
