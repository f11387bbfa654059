import { IngestionError } from './ingestion-error';

export class MalformedEventError extends IngestionError {
  readonly kind = 'malformed-event';
}
