import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { StorageUnavailableError } from '../common/errors';

export const STOCK_CODE_PATTERN = /^[A-Z]{4}$/;

/**
 * Authoritative set of tradable stock codes.
 * Loaded once from the stock code file at startup, read-only afterwards.
 */
@Injectable()
export class StockCodeService implements OnModuleInit {
  private readonly logger = new Logger(StockCodeService.name);
  private stockCodes: ReadonlySet<string> = new Set();

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  /**
   * Reads one code per line. Blank lines are skipped; any other line that is
   * not 4 uppercase letters fails the whole load.
   * @throws StorageUnavailableError if the file is missing, unreadable or malformed
   */
  async load(): Promise<void> {
    const filePath = this.config.stockCodeFile;

    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (err) {
      this.logger.warn(`Cannot read stock code file ${filePath}`);
      throw new StorageUnavailableError(filePath, `Stock code file '${filePath}' cannot be read.`, {
        cause: err,
      });
    }

    const codes = new Set<string>();
    content.split(/\r?\n/).forEach((rawLine, index) => {
      const code = rawLine.trim();
      if (!code) {
        return;
      }
      if (!STOCK_CODE_PATTERN.test(code)) {
        throw new StorageUnavailableError(
          filePath,
          `Stock code file '${filePath}' line ${index + 1}: '${code}' is not 4 uppercase letters.`,
        );
      }
      codes.add(code);
    });

    this.stockCodes = codes;
    this.logger.log(`Loaded ${codes.size} stock codes from ${filePath}`);
  }

  /** O(1) membership check */
  isKnown(stockCode: string): boolean {
    return this.stockCodes.has(stockCode);
  }

  /** Returns all loaded codes in file order */
  getAllCodes(): string[] {
    return Array.from(this.stockCodes);
  }
}
