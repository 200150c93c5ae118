import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { MIN_PRICE, TradeOrderDto } from './dto/trade-order.dto';
import { TradeAction } from './entities/trade-book.entity';
import { IncomingOrder } from './entities/incoming-order.entity';
import { StockCodeService } from '../stock-code/stock-code.service';
import { OrderErrorKind } from '../common/errors';
import { toDecimal } from '../common/utils/decimal.util';

export type ValidationResult =
  | { ok: true; order: IncomingOrder }
  | { ok: false; error: OrderErrorKind };

/**
 * Gates orders before they reach the ledger. Checks run in a fixed order and
 * the first violation wins: action, stock code format, stock code membership,
 * price, volume. Pure apart from reading the loaded stock code set.
 */
@Injectable()
export class TradeValidatorService {
  constructor(private readonly stockCodeService: StockCodeService) {}

  validate(order: TradeOrderDto): ValidationResult {
    const dto = plainToInstance(TradeOrderDto, { ...order });
    const failed = new Set(validateSync(dto).map((error) => error.property));

    if (failed.has('action') || !isTradeAction(dto.action)) {
      return { ok: false, error: OrderErrorKind.INVALID_ACTION };
    }
    if (failed.has('stockCode')) {
      return { ok: false, error: OrderErrorKind.INVALID_STOCK_CODE_FORMAT };
    }
    if (!this.stockCodeService.isKnown(dto.stockCode)) {
      return { ok: false, error: OrderErrorKind.UNKNOWN_STOCK_CODE };
    }
    if (failed.has('price')) {
      return { ok: false, error: OrderErrorKind.INVALID_PRICE };
    }
    const price = toDecimal(dto.price);
    if (price.lessThan(MIN_PRICE)) {
      return { ok: false, error: OrderErrorKind.INVALID_PRICE };
    }
    if (failed.has('volume')) {
      return { ok: false, error: OrderErrorKind.INVALID_VOLUME };
    }

    return {
      ok: true,
      order: {
        action: dto.action,
        stockCode: dto.stockCode,
        price,
        volume: dto.volume,
      },
    };
  }
}

function isTradeAction(value: string): value is TradeAction {
  return value === TradeAction.BUY || value === TradeAction.SELL;
}
