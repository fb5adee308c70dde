import { Column, ColumnOptions, ValueTransformer } from 'typeorm';
import { Email } from '../../domain/value-objects/email.vo';

/**
 * Stores an {@link Email} as plain text. Rows are read back through
 * `Email.create`, so a stored value that no longer passes validation raises
 * `InvalidEmailException` instead of producing an unchecked instance.
 */
export class EmailColumnTransformer implements ValueTransformer {
  to(value: Email | null | undefined): string | null | undefined {
    if (value === null || value === undefined) {
      return value;
    }
    return value.value;
  }

  from(value: string | null | undefined): Email | null | undefined {
    if (value === null || value === undefined) {
      return value;
    }
    return Email.create(value);
  }
}

export const emailColumnTransformer = new EmailColumnTransformer();

export function EmailColumn(
  options: Omit<ColumnOptions, 'type' | 'transformer'> = {},
): PropertyDecorator {
  return Column({ ...options, type: 'text', transformer: emailColumnTransformer });
}
