export { OrderErrorKind } from './order-error-kind.enum';
export { StorageUnavailableError } from './storage-unavailable.error';
export { OrderFileUnavailableError } from './order-file-unavailable.error';
