import { describe, expect, it } from 'vitest';
import { createEmptyProfile } from './profile-defaults';
import { isFieldRequired, isShareReady, validateProfile } from './validation';

describe('validateProfile', () => {
  it('reports missing required fields for a personal profile', () => {
    const result = validateProfile(createEmptyProfile('personal'));
    expect(result).toEqual({
      isValid: false,
      missingFields: ['name', 'phone'],
      warnings: ['Email recommended for better contact options'],
      canShare: false,
    });
  });

  it('requires a company on professional profiles', () => {
    const profile = { ...createEmptyProfile('professional'), name: 'Alice', phone: '555-0100' };
    expect(validateProfile(profile).missingFields).toEqual(['company']);
    expect(isShareReady(profile)).toBe(false);
    expect(isShareReady({ ...profile, company: 'Initech' })).toBe(true);
  });

  it('treats blank values as missing', () => {
    const profile = { ...createEmptyProfile('custom'), name: '  ', phone: '555-0100', email: 'a@example.com' };
    const result = validateProfile(profile);
    expect(result.missingFields).toEqual(['name']);
    expect(result.warnings).toEqual([]);
  });
});

describe('isFieldRequired', () => {
  it('follows the profile type', () => {
    expect(isFieldRequired(createEmptyProfile('professional'), 'company')).toBe(true);
    expect(isFieldRequired(createEmptyProfile('personal'), 'company')).toBe(false);
  });
});
