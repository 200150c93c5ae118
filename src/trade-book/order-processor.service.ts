import { Injectable, Logger } from '@nestjs/common';
import { TradeBookService, ReconcileResult } from './trade-book.service';
import { TradeValidatorService } from './trade-validator.service';
import { parseOrderLine } from './order-parser';
import {
  TRADE_BOOK_ADDED,
  TRADE_BOOK_UPDATED,
  malformedOrderMessage,
  rejectionMessage,
} from './order-messages';
import { OrderErrorKind } from '../common/errors';

export type OrderProcessResult =
  | { accepted: true; result: ReconcileResult; message: string }
  | { accepted: false; error: OrderErrorKind; message: string };

/**
 * Runs one raw order line through parse, validate, reconcile and persist.
 * Rejected orders never touch the ledger; accepted ones are written to the
 * ledger file before the result is reported.
 */
@Injectable()
export class OrderProcessorService {
  private readonly logger = new Logger(OrderProcessorService.name);

  // Single serialization point: every ledger mutation finishes (and is
  // persisted) before the next order is looked at.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly validator: TradeValidatorService,
    private readonly tradeBookService: TradeBookService,
  ) {}

  /** Returns the human-readable status line for one order */
  async process(rawLine: string): Promise<string> {
    const outcome = await this.submit(rawLine);
    return outcome.message;
  }

  submit(rawLine: string): Promise<OrderProcessResult> {
    return this.withLock(() => this.handle(rawLine));
  }

  private async handle(rawLine: string): Promise<OrderProcessResult> {
    const parsed = parseOrderLine(rawLine);
    if (!parsed.ok) {
      this.logger.warn(`Rejected '${rawLine}': ${OrderErrorKind.MALFORMED_ORDER}`);
      return {
        accepted: false,
        error: OrderErrorKind.MALFORMED_ORDER,
        message: malformedOrderMessage(parsed.reason),
      };
    }

    const validation = this.validator.validate(parsed.order);
    if (!validation.ok) {
      this.logger.warn(`Rejected '${rawLine}': ${validation.error}`);
      return {
        accepted: false,
        error: validation.error,
        message: rejectionMessage(validation.error, parsed.order.stockCode),
      };
    }

    const result = this.tradeBookService.reconcile(validation.order);
    await this.tradeBookService.persist();

    return {
      accepted: true,
      result,
      message: result.outcome === 'created' ? TRADE_BOOK_ADDED : TRADE_BOOK_UPDATED,
    };
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
