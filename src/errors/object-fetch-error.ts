import { IngestionError } from './ingestion-error';

export type ObjectFetchFailure =
  | 'not-found'
  | 'access-denied'
  | 'empty-body'
  | 'unavailable';

export class ObjectFetchError extends IngestionError {
  readonly kind = 'fetch';

  constructor(
    readonly reason: ObjectFetchFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}
