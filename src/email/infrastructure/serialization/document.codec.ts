import {
  ClassConstructor,
  instanceToPlain,
  plainToInstance,
} from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

export interface FieldErrorDetail {
  field: string;
  constraints: Record<string, string>;
}

export class DocumentDecodeException extends Error {
  constructor(
    message: string,
    readonly details: FieldErrorDetail[] = [],
  ) {
    super(message);
    this.name = 'DocumentDecodeException';
  }
}

/**
 * Flattens class-validator's error tree into one entry per failing field,
 * using dotted paths for nested objects (`owner.email`, `contacts.0.email`).
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): FieldErrorDetail[] {
  const details: FieldErrorDetail[] = [];

  for (const error of errors) {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints && Object.keys(error.constraints).length > 0) {
      details.push({ field, constraints: { ...error.constraints } });
    }
    if (error.children && error.children.length > 0) {
      details.push(...flattenValidationErrors(error.children, field));
    }
  }

  return details;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDocument(input: string | object): Record<string, unknown> {
  let parsed: unknown = input;

  if (typeof input === 'string') {
    try {
      parsed = JSON.parse(input);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentDecodeException(`Malformed document: ${message}`);
    }
  }

  if (!isRecord(parsed)) {
    throw new DocumentDecodeException(
      'Malformed document: expected a JSON object at the root',
    );
  }
  return parsed;
}

/**
 * Decodes a JSON document (text or already-parsed object) into `target`,
 * running every class-validator rule declared on it. Email fields declared
 * with `@EmailProperty()` are re-validated here, so an instance is only
 * returned when every address in it is structurally valid.
 */
export function decodeDocument<T extends object>(
  target: ClassConstructor<T>,
  input: string | object,
): T {
  const instance = plainToInstance(target, parseDocument(input));
  const details = flattenValidationErrors(validateSync(instance));

  if (details.length > 0) {
    const summary = details
      .flatMap((detail) => Object.values(detail.constraints))
      .join('; ');
    throw new DocumentDecodeException(
      `Document failed validation: ${summary}`,
      details,
    );
  }

  return instance;
}

export function encodeDocument(instance: object): string {
  return JSON.stringify(instanceToPlain(instance));
}
