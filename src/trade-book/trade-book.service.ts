import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeAction, TradeBook } from './entities/trade-book.entity';
import { IncomingOrder } from './entities/incoming-order.entity';
import { TradeBookStorageService } from './trade-book-storage.service';
import { TradeBookFileService } from './trade-book-file.service';
import { NETTING_POLICY, NettingPolicy } from './netting';
import { toPriceString } from '../common/utils/decimal.util';

export type ReconcileResult =
  | { outcome: 'created'; book: TradeBook }
  | { outcome: 'adjusted'; book: TradeBook; previousVolume: number };

// The ledger: book lookup, creation and volume adjustment.
// Which orders share a book, and how volume nets, is delegated to the
// injected NettingPolicy.
@Injectable()
export class TradeBookService implements OnModuleInit {
  private readonly logger = new Logger(TradeBookService.name);

  constructor(
    private readonly storage: TradeBookStorageService,
    private readonly fileService: TradeBookFileService,
    @Inject(NETTING_POLICY) private readonly nettingPolicy: NettingPolicy,
  ) {}

  async onModuleInit(): Promise<void> {
    const books = await this.fileService.load();
    this.seed(books);
    this.logger.log(
      `Seeded ${this.storage.getBookCount()} trade books from ${this.fileService.filePath} (${this.nettingPolicy.name} netting)`,
    );
  }

  /**
   * Loads persisted books into the working set.
   * Books that share a key under the active policy are netted in order.
   */
  seed(books: TradeBook[]): void {
    for (const book of books) {
      this.reconcile(book);
    }
  }

  /**
   * Creates a book for an unseen key, otherwise applies the netting policy
   * to the matched book. Resulting volume is not capped.
   */
  reconcile(order: IncomingOrder): ReconcileResult {
    const key = this.nettingPolicy.bookKey(order);
    const existing = this.storage.findBook(key);

    if (!existing) {
      const book = this.storage.saveBook(key, {
        action: order.action,
        stockCode: order.stockCode,
        price: order.price,
        volume: order.volume,
      });
      this.logger.debug(`Created ${describe(book)}`);
      return { outcome: 'created', book: { ...book } };
    }

    const book = this.storage.saveBook(key, this.nettingPolicy.apply(existing, order));
    this.logger.debug(`Adjusted ${describe(book)} (was ${existing.volume})`);
    return { outcome: 'adjusted', book: { ...book }, previousVolume: existing.volume };
  }

  findBook(action: TradeAction, stockCode: string, price: Decimal): TradeBook | undefined {
    const book = this.storage.findBook(this.nettingPolicy.bookKey({ action, stockCode, price }));
    return book ? { ...book } : undefined;
  }

  getAllBooks(): TradeBook[] {
    return this.storage.getAllBooks();
  }

  /** Writes the full working set to the ledger file */
  async persist(): Promise<void> {
    await this.fileService.save(this.storage.getAllBooks());
  }
}

function describe(book: TradeBook): string {
  return `${book.action} ${book.stockCode} @ ${toPriceString(book.price)} volume ${book.volume}`;
}
