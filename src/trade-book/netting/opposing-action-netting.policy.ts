import { TradeAction, TradeBook } from '../entities/trade-book.entity';
import { IncomingOrder } from '../entities/incoming-order.entity';
import { BookKeyFields, NettingPolicy } from './netting-policy.interface';
import { toPriceString } from '../../common/utils/decimal.util';

// One book per stock code and price. Buys count positive, sells negative;
// the book carries the sign of the net position as its action.
// buy 100 then sell 30 -> buy 70; then sell 100 -> sell 30.
export class OpposingActionNettingPolicy implements NettingPolicy {
  readonly name = 'opposing-action';

  bookKey({ stockCode, price }: BookKeyFields): string {
    return `${stockCode}|${toPriceString(price)}`;
  }

  apply(book: TradeBook, order: IncomingOrder): TradeBook {
    const net = signedVolume(book.action, book.volume) + signedVolume(order.action, order.volume);

    if (net === 0) {
      // flat: keep the book and its last direction
      return { ...book, volume: 0 };
    }

    return {
      ...book,
      action: net > 0 ? TradeAction.BUY : TradeAction.SELL,
      volume: Math.abs(net),
    };
  }
}

function signedVolume(action: TradeAction, volume: number): number {
  return action === TradeAction.BUY ? volume : -volume;
}
