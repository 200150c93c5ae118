import { TradeBook } from '../entities/trade-book.entity';
import { IncomingOrder } from '../entities/incoming-order.entity';
import { BookKeyFields, NettingPolicy } from './netting-policy.interface';
import { toPriceString } from '../../common/utils/decimal.util';

// Default: buy and sell books at the same price are separate entities,
// so a match always adds volume.
export class SameActionNettingPolicy implements NettingPolicy {
  readonly name = 'same-action';

  bookKey({ action, stockCode, price }: BookKeyFields): string {
    return `${action}|${stockCode}|${toPriceString(price)}`;
  }

  apply(book: TradeBook, order: IncomingOrder): TradeBook {
    return { ...book, volume: book.volume + order.volume };
  }
}
