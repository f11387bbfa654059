import { IngestionError } from './ingestion-error';

export class RowValidationError extends IngestionError {
  readonly kind = 'row-validation';

  constructor(
    readonly rowNumber: number,
    readonly missingColumns: string[]
  ) {
    super(
      `row ${rowNumber} is missing a value for: ${missingColumns.join(', ')}`
    );
  }
}
