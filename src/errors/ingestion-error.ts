export type IngestionErrorKind =
  | 'malformed-event'
  | 'fetch'
  | 'decode'
  | 'row-validation'
  | 'write'
  | 'configuration'
  | 'row-ingestion';

export abstract class IngestionError extends Error {
  abstract readonly kind: IngestionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}
