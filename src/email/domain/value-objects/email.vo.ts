import { InvalidEmailException } from '../exceptions/invalid-email.exception';
import {
  findEmailViolation,
  isValidEmail,
} from '../validation/is-valid-email';

export type EmailCandidate = string | Email;

/**
 * A structurally valid email address.
 *
 * The only way to obtain an instance is {@link Email.tryCreate} (or
 * {@link Email.create}, which throws instead of returning the error). The
 * text is kept verbatim: no trimming, no lowercasing.
 *
 * Instances read as plain strings wherever JavaScript converts to a
 * primitive: template literals, `String(email)`, `JSON.stringify` and
 * loose `==` against a string.
 *
 * class-transformer does not call `toJSON`: a field holding an `Email` must
 * be declared with `@EmailProperty()`, otherwise `instanceToPlain` (and
 * Nest's `ClassSerializerInterceptor`) emits `{ address: '...' }`.
 */
export class Email {
  private constructor(private readonly address: string) {
    Object.freeze(this);
  }

  static tryCreate(candidate: EmailCandidate): Email | InvalidEmailException {
    const text = String(candidate);
    const violation = findEmailViolation(text);
    if (violation !== undefined) {
      return new InvalidEmailException(text, violation);
    }
    return new Email(text);
  }

  static create(candidate: EmailCandidate): Email {
    const result = Email.tryCreate(candidate);
    if (result instanceof InvalidEmailException) {
      throw result;
    }
    return result;
  }

  static isValid(candidate: string): boolean {
    return isValidEmail(candidate);
  }

  /** Comparator for `Array.prototype.sort`; plain string ordering. */
  static compare(a: EmailCandidate, b: EmailCandidate): number {
    const left = String(a);
    const right = String(b);
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  get value(): string {
    return this.address;
  }

  get localPart(): string {
    return this.address.slice(0, this.address.indexOf('@'));
  }

  get domain(): string {
    return this.address.slice(this.address.indexOf('@') + 1);
  }

  get length(): number {
    return this.address.length;
  }

  equals(other: EmailCandidate): boolean {
    return this.address === String(other);
  }

  compareTo(other: EmailCandidate): number {
    return Email.compare(this, other);
  }

  toString(): string {
    return this.address;
  }

  valueOf(): string {
    return this.address;
  }

  toJSON(): string {
    return this.address;
  }

  [Symbol.toPrimitive](): string {
    return this.address;
  }
}
