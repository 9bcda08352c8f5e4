import { Type } from 'class-transformer';
import { IsArray, IsEnum, IsInt, IsNumber, IsOptional, IsString, Min, ValidateNested } from 'class-validator';
import { StockLimitPolicy } from '../../config/replay-config';

// One ledger row. Field contents are checked per record by the scheduler so a
// bad row is rejected on its own instead of failing the whole request.
export class TradeInputDto {
  @IsOptional()
  @IsString()
  ref?: string;

  @IsOptional()
  @IsString()
  stockName?: string;

  @IsOptional()
  entryPrice?: number | string;

  @IsOptional()
  exitPrice?: number | string;

  @IsOptional()
  @IsString()
  entryDate?: string;

  @IsOptional()
  @IsString()
  exitDate?: string;
}

// Overrides fall back to the service configuration.
export class ReplayRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TradeInputDto)
  trades!: TradeInputDto[];

  @IsOptional()
  @IsNumber()
  @Min(0)
  initialCapital?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxStocks?: number;

  @IsOptional()
  @IsEnum(StockLimitPolicy)
  stockLimitPolicy?: StockLimitPolicy;
}
