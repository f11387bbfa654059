import { IngestionError } from './ingestion-error';

// raised for invalid utf-8 and for csv the parser cannot read
export class DecodeError extends IngestionError {
  readonly kind = 'decode';
}
