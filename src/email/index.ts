export { Email } from './domain/value-objects/email.vo';
export type { EmailCandidate } from './domain/value-objects/email.vo';
export { InvalidEmailException } from './domain/exceptions/invalid-email.exception';
export {
  EMAIL_LIMITS,
  findEmailViolation,
  isValidEmail,
} from './domain/validation/is-valid-email';
export type { EmailRuleViolation } from './domain/validation/is-valid-email';
export {
  EmailProperty,
  IsEmailValue,
} from './infrastructure/serialization/email-property.decorator';
export {
  DocumentDecodeException,
  decodeDocument,
  encodeDocument,
  flattenValidationErrors,
} from './infrastructure/serialization/document.codec';
export type { FieldErrorDetail } from './infrastructure/serialization/document.codec';
export {
  EmailColumn,
  EmailColumnTransformer,
  emailColumnTransformer,
} from './infrastructure/persistence/email.column-transformer';
