// Batch order file could not be opened.
export class OrderFileUnavailableError extends Error {
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`File '${filePath}' not found.`, options);
    this.name = 'OrderFileUnavailableError';
  }
}
