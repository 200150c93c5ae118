import { IsEnum, IsInt, Matches, Max, Min } from 'class-validator';
import Decimal from 'decimal.js';
import { TradeAction } from '../entities/trade-book.entity';
import { STOCK_CODE_PATTERN } from '../../stock-code/stock-code.service';

export const PRICE_PATTERN = /^\d+\.\d{2}$/;
export const MIN_PRICE = new Decimal('0.50');
export const MIN_ORDER_VOLUME = 1;
export const MAX_ORDER_VOLUME = 1_000_000;

// One parsed order line. Action is lowercased and stock code uppercased
// by the parser; price stays as typed so the digit count can be checked.
export class TradeOrderDto {
  @IsEnum(TradeAction)
  action!: string;

  @Matches(STOCK_CODE_PATTERN)
  stockCode!: string;

  @Matches(PRICE_PATTERN)
  price!: string;

  @IsInt()
  @Min(MIN_ORDER_VOLUME)
  @Max(MAX_ORDER_VOLUME)
  volume!: number;
}
