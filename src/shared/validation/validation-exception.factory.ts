import { BadRequestException } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { flattenValidationErrors } from '../../email';

/**
 * `ValidationPipe` exception factory producing the same `{ field, constraints }`
 * details as the document codec, so request bodies and decoded documents
 * report failures in one shape.
 */
export function validationExceptionFactory(
  errors: ValidationError[],
): BadRequestException {
  return new BadRequestException({
    message: 'Validation failed',
    details: flattenValidationErrors(errors),
  });
}
