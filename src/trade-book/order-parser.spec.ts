import { parseOrderLine } from './order-parser';

describe('parseOrderLine', () => {
  it('should canonicalize action and stock code', () => {
    expect(parseOrderLine('BUY aapl 150.00 100')).toEqual({
      ok: true,
      order: { action: 'buy', stockCode: 'AAPL', price: '150.00', volume: 100 },
    });
  });

  it('should split on any run of whitespace', () => {
    const result = parseOrderLine('  sell\tMSFT   20.50  7 ');

    expect(result).toEqual({
      ok: true,
      order: { action: 'sell', stockCode: 'MSFT', price: '20.50', volume: 7 },
    });
  });

  it('should keep the price text as typed', () => {
    const result = parseOrderLine('buy AAPL 999.999 1');

    expect(result.ok && result.order.price).toBe('999.999');
  });

  it('should read signed integer volumes', () => {
    const result = parseOrderLine('buy AAPL 1.00 -5');

    expect(result.ok && result.order.volume).toBe(-5);
  });

  it.each(['buy AAPL 1.00', 'buy AAPL 1.00 10 extra', '', 'exit'])(
    'should reject wrong field count in %p',
    (line) => {
      expect(parseOrderLine(line)).toEqual({ ok: false, reason: 'field-count' });
    },
  );

  it.each(['buy AAPL abc 10', 'buy AAPL 1.00 ten', 'buy AAPL 1.00 10.5', 'buy AAPL 1.2.3 10'])(
    'should reject unparsable numbers in %p',
    (line) => {
      expect(parseOrderLine(line)).toEqual({ ok: false, reason: 'number-format' });
    },
  );
});
