import { Injectable } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { OrderProcessorService } from './order-processor.service';
import { TradeBookService } from './trade-book.service';
import { TradeBookModule } from './trade-book.module';
import { ConfigModule } from '../config/config.module';
import { OrderErrorKind, StorageUnavailableError } from '../common/errors';
import { createTestDataDir, TestDataDir } from '../test-helpers/test-utils';
import { AppConfig } from '../config/app-config';

describe('OrderProcessorService', () => {
  let processor: OrderProcessorService;
  let ledger: TradeBookService;
  let data: TestDataDir;

  const buildProcessor = async (config: AppConfig): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [ConfigModule.register(config), TradeBookModule],
    }).compile();
    await module.init();

    processor = module.get<OrderProcessorService>(OrderProcessorService);
    ledger = module.get<TradeBookService>(TradeBookService);
  };

  const ledgerLines = () =>
    ledger.getAllBooks().map((b) => `${b.action},${b.stockCode},${b.price.toFixed(2)},${b.volume}`);

  beforeEach(async () => {
    data = await createTestDataDir();
    await buildProcessor(data.config);
  });

  afterEach(async () => {
    await data.cleanup();
  });

  it('should add, update and reject in the documented sequence', async () => {
    await expect(processor.process('buy AAPL 1000.00 100')).resolves.toBe('Trade book added.');
    await expect(processor.process('buy AAPL 1000.00 50')).resolves.toBe('Trade book updated.');
    await expect(processor.process('sell AAPL 1000.00 10')).resolves.toBe('Trade book added.');
    await expect(processor.process('buy AAPL 999.999 1')).resolves.toBe(
      'Invalid price. Must be a number with 2 decimal places and >= 0.50.',
    );

    expect(ledgerLines()).toEqual(['buy,AAPL,1000.00,150', 'sell,AAPL,1000.00,10']);
    expect(await data.readLedger()).toBe('buy,AAPL,1000.00,150\nsell,AAPL,1000.00,10\n');
  });

  it('should reject unknown stock codes and leave the ledger unchanged', async () => {
    const outcome = await processor.submit('buy WXYZ 5.00 10');

    expect(outcome).toEqual({
      accepted: false,
      error: OrderErrorKind.UNKNOWN_STOCK_CODE,
      message: 'Invalid stock code. WXYZ does not exist in the stock code list.',
    });
    expect(ledger.getAllBooks()).toHaveLength(0);
    expect(existsSync(data.config.ordersFile)).toBe(false);
  });

  it('should canonicalize case before validating', async () => {
    await expect(processor.process('BUY aapl 1.00 1')).resolves.toBe('Trade book added.');

    expect(ledgerLines()).toEqual(['buy,AAPL,1.00,1']);
  });

  it.each([
    ['buy AAPL 1.00', OrderErrorKind.MALFORMED_ORDER, 'Invalid command. Format: [buy|sell] [STOCKCODE] [PRICE] [VOLUME]'],
    [
      'buy AAPL 1.00 ten',
      OrderErrorKind.MALFORMED_ORDER,
      'Invalid command. Price must be a decimal number and volume must be an integer.',
    ],
    ['hold AAPL 1.00 1', OrderErrorKind.INVALID_ACTION, "Invalid action. Must be 'buy' or 'sell'."],
    ['buy AAP1 1.00 1', OrderErrorKind.INVALID_STOCK_CODE_FORMAT, 'Invalid stock code. Must be 4 uppercase letters.'],
    ['buy AAPL 0.49 1', OrderErrorKind.INVALID_PRICE, 'Invalid price. Must be a number with 2 decimal places and >= 0.50.'],
    ['buy AAPL 1.00 0', OrderErrorKind.INVALID_VOLUME, 'Invalid volume. Must be between 1 and 1,000,000.'],
    ['buy AAPL 1.00 1000001', OrderErrorKind.INVALID_VOLUME, 'Invalid volume. Must be between 1 and 1,000,000.'],
  ])('should reject %p as %s', async (line, error, message) => {
    await expect(processor.submit(line)).resolves.toEqual({ accepted: false, error, message });
    expect(ledger.getAllBooks()).toHaveLength(0);
  });

  it('should accept volumes at both bounds verbatim', async () => {
    await processor.process('buy AAPL 1.00 1');
    await processor.process('sell AAPL 1.00 1000000');

    expect(ledgerLines()).toEqual(['buy,AAPL,1.00,1', 'sell,AAPL,1.00,1000000']);
  });

  it('should report the reconcile result for accepted orders', async () => {
    await processor.submit('buy MSFT 20.00 5');
    const outcome = await processor.submit('buy MSFT 20.00 5');

    expect(outcome.accepted).toBe(true);
    if (!outcome.accepted) return;
    expect(outcome.result.outcome).toBe('adjusted');
    expect(outcome.result.book.volume).toBe(10);
  });

  it('should serialize orders submitted without awaiting', async () => {
    const messages = await Promise.all([
      processor.process('buy GOOG 10.00 1'),
      processor.process('buy GOOG 10.00 2'),
      processor.process('buy GOOG 10.00 3'),
    ]);

    expect(messages).toEqual(['Trade book added.', 'Trade book updated.', 'Trade book updated.']);
    expect(await data.readLedger()).toBe('buy,GOOG,10.00,6\n');
  });

  it('should resume from the persisted ledger on the next start', async () => {
    await processor.process('buy AAPL 1000.00 100');
    await buildProcessor(data.config);

    await expect(processor.process('buy AAPL 1000.00 50')).resolves.toBe('Trade book updated.');
    expect(ledgerLines()).toEqual(['buy,AAPL,1000.00,150']);
  });

  it('should fail the order when the ledger file cannot be written', async () => {
    await mkdir(data.config.ordersFile);

    await expect(processor.submit('buy AAPL 1.00 1')).rejects.toBeInstanceOf(StorageUnavailableError);
    // The queue keeps running after a failed order.
    await expect(processor.process('buy MSFT 1.00 1')).rejects.toThrow(
      `Ledger file '${data.config.ordersFile}' cannot be written.`,
    );
  });

  it('should keep the ledger private to the module', async () => {
    @Injectable()
    class LedgerConsumer {
      constructor(readonly ledger: TradeBookService) {}
    }

    await expect(
      Test.createTestingModule({
        imports: [ConfigModule.register(data.config), TradeBookModule],
        providers: [LedgerConsumer],
      }).compile(),
    ).rejects.toThrow(/TradeBookService/);
  });

  it('should net opposing actions when configured to', async () => {
    await buildProcessor({ ...data.config, nettingPolicy: 'opposing-action' });

    await processor.process('buy AAPL 1000.00 100');
    await expect(processor.process('sell AAPL 1000.00 30')).resolves.toBe('Trade book updated.');

    expect(ledgerLines()).toEqual(['buy,AAPL,1000.00,70']);
  });
});
