import Decimal from 'decimal.js';
import { TradeAction, TradeBook } from '../entities/trade-book.entity';
import { IncomingOrder } from '../entities/incoming-order.entity';
import { NettingPolicyName } from '../../config/app-config';

export const NETTING_POLICY = Symbol('NETTING_POLICY');

export interface BookKeyFields {
  action: TradeAction;
  stockCode: string;
  price: Decimal;
}

/**
 * Decides which books an order shares a key with and how a matched
 * book's volume changes. The ledger owns lookup and creation; policies own
 * only these two rules.
 */
export interface NettingPolicy {
  readonly name: NettingPolicyName;

  bookKey(fields: BookKeyFields): string;

  /** Returns the book after applying the order. Must not mutate its inputs. */
  apply(book: TradeBook, order: IncomingOrder): TradeBook;
}
