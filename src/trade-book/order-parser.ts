import { TradeOrderDto } from './dto/trade-order.dto';
import { tryParseDecimal } from '../common/utils/decimal.util';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export type MalformedReason = 'field-count' | 'number-format';

export type ParseResult =
  | { ok: true; order: TradeOrderDto }
  | { ok: false; reason: MalformedReason };

/**
 * Splits "action code price volume" on whitespace and canonicalizes it:
 * action lowercased, stock code uppercased, volume read as an integer.
 * Price stays text so the validator can check its decimal places.
 */
export function parseOrderLine(line: string): ParseResult {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 4) {
    return { ok: false, reason: 'field-count' };
  }

  const [action, stockCode, price, volumeText] = fields;
  if (tryParseDecimal(price) === undefined || !INTEGER_PATTERN.test(volumeText)) {
    return { ok: false, reason: 'number-format' };
  }

  return {
    ok: true,
    order: {
      action: action.toLowerCase(),
      stockCode: stockCode.toUpperCase(),
      price,
      volume: Number(volumeText),
    },
  };
}
