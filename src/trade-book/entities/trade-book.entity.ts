import Decimal from 'decimal.js';

export enum TradeAction {
  BUY = 'buy',
  SELL = 'sell',
}

// Cumulative volume recorded for one book key.
// Price keeps Decimal precision; volume is a whole number of shares and may
// grow past the per-order limit as orders accumulate.
export interface TradeBook {
  action: TradeAction;
  stockCode: string;      // AAPL, MSFT, etc.
  price: Decimal;         // always 2 decimal places
  volume: number;
}
