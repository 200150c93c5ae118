/**
 * Stock code list or ledger file cannot be read, parsed or written.
 * Fatal: the process reports it and exits without processing orders.
 */
export class StorageUnavailableError extends Error {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}
