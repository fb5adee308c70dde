import type { EmailRuleViolation } from '../validation/is-valid-email';

export class InvalidEmailException extends Error {
  readonly code = 'EMAIL_STRUCTURALLY_INVALID';

  constructor(
    readonly candidate: string,
    readonly violation: EmailRuleViolation,
  ) {
    super(`Invalid email format: ${candidate}`);
    this.name = 'InvalidEmailException';
  }
}
