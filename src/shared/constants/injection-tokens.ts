export const INJECTION_TOKENS = {
  CONTACT_REPOSITORY: Symbol('CONTACT_REPOSITORY'),
} as const;
