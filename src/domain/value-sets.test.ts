import { describe, it, expect } from 'vitest';
import {
  VALUE_SETS,
  assertAllInDomain,
  assertInDomain,
  isInDomain,
} from './value-sets';
import { DomainViolationError } from './types';

describe('isInDomain', () => {
  it('accepts members of the named set', () => {
    expect(isInDomain('gender', 'non_binary')).toBe(true);
    expect(isInDomain('clientSize', '500+')).toBe(true);
    expect(isInDomain('jobStatus', 'cancelled')).toBe(true);
  });

  it('rejects values from another set and non-strings', () => {
    expect(isInDomain('gender', 'ally')).toBe(false);
    expect(isInDomain('ageRange', 25)).toBe(false);
    expect(isInDomain('jobStatus', undefined)).toBe(false);
  });

  it('is case sensitive', () => {
    expect(isInDomain('ethnicity', 'Asian')).toBe(false);
  });
});

describe('assertInDomain', () => {
  it('returns the narrowed value', () => {
    expect(assertInDomain('size', 'clientSize', '21-50')).toBe('21-50');
  });

  it('throws DomainViolationError naming field, domain and value', () => {
    try {
      assertInDomain('ethnicity', 'ethnicity', 'martian');
      expect.unreachable('assertInDomain should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(DomainViolationError);
      if (error instanceof DomainViolationError) {
        expect(error.code).toBe('DOMAIN_VIOLATION');
        expect(error.message).toBe('Invalid value for ethnicity: "martian" is not a valid ethnicity');
        expect(error.details).toEqual({ field: 'ethnicity', domain: 'ethnicity', value: 'martian' });
      }
    }
  });
});

describe('assertAllInDomain', () => {
  it('drops repeats and keeps first-seen order', () => {
    expect(assertAllInDomain('fli', 'fliStatus', ['low_income', 'first_generation', 'low_income']))
      .toEqual(['low_income', 'first_generation']);
  });

  it('fails on the first bad member', () => {
    expect(() => assertAllInDomain('hearAbout', 'hearAbout', ['linkedin', 'carrier_pigeon']))
      .toThrow('Invalid value for hearAbout: "carrier_pigeon" is not a valid hearAbout');
  });

  it('accepts an empty set', () => {
    expect(assertAllInDomain('impactCauses', 'impactCause', [])).toEqual([]);
  });
});

describe('value sets', () => {
  it('has four job statuses', () => {
    expect(VALUE_SETS.jobStatus).toEqual(['pending', 'complete', 'cancelled', 'error']);
  });

  it('includes program_member as a referral source', () => {
    expect(isInDomain('hearAbout', 'program_member')).toBe(true);
  });

  it('has no duplicate members in any set', () => {
    for (const members of Object.values(VALUE_SETS)) {
      expect(new Set(members).size).toBe(members.length);
    }
  });
});
