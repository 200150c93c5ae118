import { OrderErrorKind } from '../common/errors';
import { MalformedReason } from './order-parser';

export const TRADE_BOOK_ADDED = 'Trade book added.';
export const TRADE_BOOK_UPDATED = 'Trade book updated.';

const MALFORMED_MESSAGES: Record<MalformedReason, string> = {
  'field-count': 'Invalid command. Format: [buy|sell] [STOCKCODE] [PRICE] [VOLUME]',
  'number-format': 'Invalid command. Price must be a decimal number and volume must be an integer.',
};

export function malformedOrderMessage(reason: MalformedReason): string {
  return MALFORMED_MESSAGES[reason];
}

export function rejectionMessage(error: OrderErrorKind, stockCode: string): string {
  switch (error) {
    case OrderErrorKind.MALFORMED_ORDER:
      return MALFORMED_MESSAGES['field-count'];
    case OrderErrorKind.INVALID_ACTION:
      return "Invalid action. Must be 'buy' or 'sell'.";
    case OrderErrorKind.INVALID_STOCK_CODE_FORMAT:
      return 'Invalid stock code. Must be 4 uppercase letters.';
    case OrderErrorKind.UNKNOWN_STOCK_CODE:
      return `Invalid stock code. ${stockCode} does not exist in the stock code list.`;
    case OrderErrorKind.INVALID_PRICE:
      return 'Invalid price. Must be a number with 2 decimal places and >= 0.50.';
    case OrderErrorKind.INVALID_VOLUME:
      return 'Invalid volume. Must be between 1 and 1,000,000.';
  }
}
