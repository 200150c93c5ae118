import Decimal from 'decimal.js';
import { TradeAction } from './trade-book.entity';

// Validated order ready for reconciliation. Never persisted directly.
export interface IncomingOrder {
  action: TradeAction;
  stockCode: string;
  price: Decimal;
  volume: number;
}
