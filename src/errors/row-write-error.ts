import { IngestionError } from './ingestion-error';

export type RowWriteFailure = 'throttled' | 'unavailable';

export class RowWriteError extends IngestionError {
  readonly kind = 'write';

  constructor(
    readonly reason: RowWriteFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}
