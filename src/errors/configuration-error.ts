import { IngestionError } from './ingestion-error';

export class ConfigurationError extends IngestionError {
  readonly kind = 'configuration';
}
