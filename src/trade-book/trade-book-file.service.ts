import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { StorageUnavailableError } from '../common/errors';
import { TradeAction, TradeBook } from './entities/trade-book.entity';
import { toPriceString, tryParseDecimal } from '../common/utils/decimal.util';
import { MIN_PRICE, PRICE_PATTERN } from './dto/trade-order.dto';
import { STOCK_CODE_PATTERN } from '../stock-code/stock-code.service';

const VOLUME_PATTERN = /^\d+$/;

/**
 * Ledger persistence as CSV: `action,stockCode,price,volume` per line,
 * price always rendered with 2 decimals.
 */
@Injectable()
export class TradeBookFileService {
  private readonly logger = new Logger(TradeBookFileService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get filePath(): string {
    return this.config.ordersFile;
  }

  /**
   * Reads all persisted books in file order.
   * A missing file is a first run and yields no books.
   * @throws StorageUnavailableError if the file is unreadable or a line is malformed
   */
  async load(): Promise<TradeBook[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.log(`No ledger file at ${this.filePath}, starting empty`);
        return [];
      }
      this.logger.warn(`Cannot read ledger file ${this.filePath}`);
      throw new StorageUnavailableError(this.filePath, `Ledger file '${this.filePath}' cannot be read.`, {
        cause: err,
      });
    }

    const books: TradeBook[] = [];
    content.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (line) {
        books.push(this.parseLine(line, index + 1));
      }
    });

    return books;
  }

  /**
   * Rewrites the whole file with the given books.
   * Creates the parent directory when it does not exist yet.
   * @throws StorageUnavailableError on any write failure
   */
  async save(books: TradeBook[]): Promise<void> {
    const content = books.map((book) => `${toCsvLine(book)}\n`).join('');

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, content, 'utf8');
    } catch (err) {
      this.logger.warn(`Cannot write ledger file ${this.filePath}`);
      throw new StorageUnavailableError(this.filePath, `Ledger file '${this.filePath}' cannot be written.`, {
        cause: err,
      });
    }
  }

  // Accepts only lines in the exact form save() writes.
  private parseLine(line: string, lineNumber: number): TradeBook {
    const fields = line.split(',').map((field) => field.trim());
    const [action, stockCode, priceText, volumeText] = fields;
    const price = isPriceText(priceText) ? tryParseDecimal(priceText) : undefined;
    const volume = volumeText !== undefined && VOLUME_PATTERN.test(volumeText) ? Number(volumeText) : NaN;

    if (
      fields.length !== 4 ||
      !isTradeAction(action) ||
      !STOCK_CODE_PATTERN.test(stockCode) ||
      price === undefined ||
      price.lessThan(MIN_PRICE) ||
      !Number.isSafeInteger(volume)
    ) {
      throw new StorageUnavailableError(
        this.filePath,
        `Ledger file '${this.filePath}' line ${lineNumber} is malformed: '${line}'.`,
      );
    }

    return { action, stockCode, price, volume };
  }
}

export function toCsvLine(book: TradeBook): string {
  return `${book.action},${book.stockCode},${toPriceString(book.price)},${book.volume}`;
}

function isPriceText(value: string | undefined): value is string {
  return value !== undefined && PRICE_PATTERN.test(value);
}

function isTradeAction(value: string | undefined): value is TradeAction {
  return value === TradeAction.BUY || value === TradeAction.SELL;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
