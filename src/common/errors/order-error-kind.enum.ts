// Reasons a single order is rejected. Recovered locally: the order is
// skipped and processing continues with the next line.
export enum OrderErrorKind {
  MALFORMED_ORDER = 'MalformedOrder',
  INVALID_ACTION = 'InvalidAction',
  INVALID_STOCK_CODE_FORMAT = 'InvalidStockCodeFormat',
  UNKNOWN_STOCK_CODE = 'UnknownStockCode',
  INVALID_PRICE = 'InvalidPrice',
  INVALID_VOLUME = 'InvalidVolume',
}
