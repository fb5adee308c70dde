import {
  EMAIL_LIMITS,
  findEmailViolation,
  isValidEmail,
} from '../../src/email/domain/validation/is-valid-email';

const label = (length: number): string => 'a'.repeat(length);

describe('isValidEmail', () => {
  it('should accept common addresses', () => {
    expect(isValidEmail('test@example.com')).toBe(true);
    expect(isValidEmail('john.doe+tag@sub.example.co')).toBe(true);
    expect(isValidEmail('first_last%dept@mail-server.example.org')).toBe(true);
    expect(isValidEmail('a@b.co')).toBe(true);
  });

  it('should accept any letter casing', () => {
    expect(isValidEmail('TEST@EXAMPLE.COM')).toBe(true);
    expect(isValidEmail('Mixed.Case@Example.Org')).toBe(true);
  });

  it('should reject addresses without a dotted domain', () => {
    expect(isValidEmail('user@localhost')).toBe(false);
    expect(findEmailViolation('user@localhost')).toBe('domain_single_label');
  });

  it('should reject an empty local part', () => {
    expect(isValidEmail('@example.com')).toBe(false);
    expect(findEmailViolation('@example.com')).toBe('local_part_empty');
  });

  it('should reject zero or more than one separator', () => {
    expect(findEmailViolation('plainaddress')).toBe('separator_count');
    expect(findEmailViolation('test@@example.com')).toBe('separator_count');
    expect(findEmailViolation('a@b@example.com')).toBe('separator_count');
    expect(isValidEmail('')).toBe(false);
  });

  it('should reject empty domain labels', () => {
    expect(isValidEmail('test@example..com')).toBe(false);
    expect(findEmailViolation('test@example..com')).toBe('domain_label');
    expect(findEmailViolation('test@.example.com')).toBe('domain_label');
    expect(findEmailViolation('test@example.com.')).toBe('domain_label');
  });

  it('should reject an empty domain', () => {
    expect(findEmailViolation('test@')).toBe('domain_empty');
  });

  it('should reject whitespace and control characters anywhere', () => {
    expect(findEmailViolation('a b@example.com')).toBe('whitespace_or_control');
    expect(findEmailViolation(' test@example.com')).toBe('whitespace_or_control');
    expect(findEmailViolation('test@example.com\n')).toBe('whitespace_or_control');
    expect(findEmailViolation('te\tst@example.com')).toBe('whitespace_or_control');
    expect(findEmailViolation('te\u0000st@example.com')).toBe('whitespace_or_control');
    expect(findEmailViolation('test@exa\u007fmple.com')).toBe('whitespace_or_control');
  });

  it('should reject leading, trailing and consecutive dots in the local part', () => {
    expect(findEmailViolation('.test@example.com')).toBe('local_part_dots');
    expect(findEmailViolation('test.@example.com')).toBe('local_part_dots');
    expect(findEmailViolation('te..st@example.com')).toBe('local_part_dots');
  });

  it('should reject characters outside the local part allow-list', () => {
    expect(findEmailViolation('"quoted"@example.com')).toBe('local_part_characters');
    expect(findEmailViolation('user(comment)@example.com')).toBe('local_part_characters');
    expect(findEmailViolation('josé@example.com')).toBe('local_part_characters');
    expect(findEmailViolation('a!b@example.com')).toBe('local_part_characters');
  });

  it('should reject domain labels with bad hyphens or characters', () => {
    expect(findEmailViolation('test@-example.com')).toBe('domain_label');
    expect(findEmailViolation('test@example-.com')).toBe('domain_label');
    expect(findEmailViolation('test@exa_mple.com')).toBe('domain_label');
    expect(findEmailViolation('test@[127.0.0.1]')).toBe('domain_label');
    expect(isValidEmail('test@my-host.example.com')).toBe(true);
  });

  it('should require an alphabetic top-level label of at least two characters', () => {
    expect(findEmailViolation('test@example.c')).toBe('top_level_label');
    expect(findEmailViolation('test@example.123')).toBe('top_level_label');
    expect(findEmailViolation('test@example.c0m')).toBe('top_level_label');
    expect(findEmailViolation('test@example.co-m')).toBe('top_level_label');
  });

  describe('length bounds', () => {
    it('should accept a local part at the limit and reject one past it', () => {
      expect(isValidEmail(`${label(EMAIL_LIMITS.localPart)}@example.com`)).toBe(true);
      expect(
        findEmailViolation(`${label(EMAIL_LIMITS.localPart + 1)}@example.com`),
      ).toBe('local_part_too_long');
    });

    it('should accept a domain label at the limit and reject one past it', () => {
      expect(isValidEmail(`user@${label(63)}.com`)).toBe(true);
      expect(findEmailViolation(`user@${label(64)}.com`)).toBe('domain_label');
    });

    it('should reject a domain longer than the limit', () => {
      // 4 x (63 + '.') + 'com' = 259 characters
      const domain = `${label(63)}.`.repeat(4) + 'com';
      expect(findEmailViolation(`user@${domain}`)).toBe('domain_too_long');
    });

    it('should accept an address of exactly the total limit', () => {
      const domain = [label(63), label(63), label(63), label(63)].join('.');
      const address = `${label(64)}@${domain}`;
      expect(address).toHaveLength(EMAIL_LIMITS.total);
      expect(isValidEmail(address)).toBe(true);
    });

    it('should reject an overlong address before anything else', () => {
      expect(findEmailViolation(`${label(400)}@example.com`)).toBe('too_long');
      expect(findEmailViolation(`${label(321)}`)).toBe('too_long');
    });
  });

  it('should return undefined for a valid address', () => {
    expect(findEmailViolation('test@example.com')).toBeUndefined();
  });
});
