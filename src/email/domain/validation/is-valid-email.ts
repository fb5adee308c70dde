/**
 * Structural email grammar. Changing any limit or character class here is a
 * breaking change for data that was validated and persisted under the old rules.
 */
export const EMAIL_LIMITS = {
  total: 320,
  localPart: 64,
  domain: 255,
  domainLabel: 63,
} as const;

export type EmailRuleViolation =
  | 'too_long'
  | 'whitespace_or_control'
  | 'separator_count'
  | 'local_part_empty'
  | 'local_part_too_long'
  | 'local_part_characters'
  | 'local_part_dots'
  | 'domain_empty'
  | 'domain_too_long'
  | 'domain_single_label'
  | 'domain_label'
  | 'top_level_label';

// eslint-disable-next-line no-control-regex
const WHITESPACE_OR_CONTROL = /[\s\u0000-\u001f\u007f]/;
const LOCAL_PART_CHARACTERS = /^[A-Za-z0-9._%+-]+$/;
const DOMAIN_LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;
const TOP_LEVEL_LABEL = /^[A-Za-z]{2,}$/;

function checkLocalPart(localPart: string): EmailRuleViolation | undefined {
  if (localPart.length === 0) return 'local_part_empty';
  if (localPart.length > EMAIL_LIMITS.localPart) return 'local_part_too_long';
  if (!LOCAL_PART_CHARACTERS.test(localPart)) return 'local_part_characters';
  if (
    localPart.startsWith('.') ||
    localPart.endsWith('.') ||
    localPart.includes('..')
  ) {
    return 'local_part_dots';
  }
  return undefined;
}

function checkDomain(domain: string): EmailRuleViolation | undefined {
  if (domain.length === 0) return 'domain_empty';
  if (domain.length > EMAIL_LIMITS.domain) return 'domain_too_long';

  const labels = domain.split('.');
  if (labels.length < 2) return 'domain_single_label';

  for (const label of labels) {
    if (label.length > EMAIL_LIMITS.domainLabel || !DOMAIN_LABEL.test(label)) {
      return 'domain_label';
    }
  }

  const topLevel = labels[labels.length - 1];
  if (!TOP_LEVEL_LABEL.test(topLevel)) return 'top_level_label';

  return undefined;
}

/**
 * Returns the first grammar rule the candidate breaks, or `undefined` when
 * the candidate is a structurally valid address.
 */
export function findEmailViolation(
  candidate: string,
): EmailRuleViolation | undefined {
  if (candidate.length > EMAIL_LIMITS.total) return 'too_long';
  if (WHITESPACE_OR_CONTROL.test(candidate)) return 'whitespace_or_control';

  const parts = candidate.split('@');
  if (parts.length !== 2) return 'separator_count';

  const [localPart, domain] = parts;
  return checkLocalPart(localPart) ?? checkDomain(domain);
}

export function isValidEmail(candidate: string): boolean {
  return findEmailViolation(candidate) === undefined;
}
