import { Transform } from 'class-transformer';
import {
  ValidationArguments,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
  registerDecorator,
} from 'class-validator';
import { Email } from '../../domain/value-objects/email.vo';

@ValidatorConstraint({ name: 'isEmailValue', async: false })
export class IsEmailValueConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return value instanceof Email;
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a structurally valid email address`;
  }
}

/**
 * The property must hold an {@link Email} instance. Pair it with a transform
 * that produces one, or use {@link EmailProperty}.
 */
export function IsEmailValue(options?: ValidationOptions) {
  return (target: object, propertyName: string): void => {
    registerDecorator({
      name: 'isEmailValue',
      target: target.constructor,
      propertyName,
      options,
      validator: IsEmailValueConstraint,
    });
  };
}

function toEmail(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const result = Email.tryCreate(value);
  // Invalid input stays raw so IsEmailValue reports it against the field
  return result instanceof Email ? result : value;
}

function toText(value: unknown): unknown {
  return value instanceof Email ? value.value : value;
}

function mapValue(
  value: unknown,
  each: boolean,
  fn: (item: unknown) => unknown,
): unknown {
  if (each && Array.isArray(value)) {
    return value.map(fn);
  }
  return fn(value);
}

/**
 * Declares a class-transformer / class-validator field holding an {@link Email}.
 *
 * Decoding routes strings through `Email.tryCreate`; encoding writes the
 * address back out as plain text. With `{ each: true }` the field is an
 * array of addresses.
 */
export function EmailProperty(options: ValidationOptions = {}) {
  const each = options.each === true;

  return (target: object, propertyName: string): void => {
    Transform(({ value }) => mapValue(value, each, toEmail), {
      toClassOnly: true,
    })(target, propertyName);
    Transform(({ value }) => mapValue(value, each, toText), {
      toPlainOnly: true,
    })(target, propertyName);
    IsEmailValue(options)(target, propertyName);
  };
}
