import { Injectable } from '@nestjs/common';
import { TradeBook } from './entities/trade-book.entity';

// In-memory working set of the ledger with O(1) lookups by book key.
// Map insertion order is the order books were loaded or created in,
// which is also the order they are written back to the ledger file.
@Injectable()
export class TradeBookStorageService {
  private books: Map<string, TradeBook> = new Map();

  /** O(1) lookup by book key */
  findBook(key: string): TradeBook | undefined {
    return this.books.get(key);
  }

  /** Inserts a new book or replaces the one held under the same key */
  saveBook(key: string, book: TradeBook): TradeBook {
    this.books.set(key, book);
    return book;
  }

  /** Returns defensive copy to prevent external mutation */
  getAllBooks(): TradeBook[] {
    return Array.from(this.books.values(), (book) => ({ ...book }));
  }

  getBookCount(): number {
    return this.books.size;
  }

  /** Nukes all books - test harness only */
  clearAllBooks(): void {
    this.books.clear();
  }
}
