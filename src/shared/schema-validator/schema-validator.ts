import Ajv, { Schema } from 'ajv';

import { ValidationError } from '@errors/validation-error';

const ajv = new Ajv({ allErrors: true });

export function schemaValidator<T>(
  schema: Schema,
  body: unknown
): asserts body is T {
  const validate = ajv.compile<T>(schema);

  if (!validate(body)) {
    throw new ValidationError(JSON.stringify(validate.errors));
  }
}
