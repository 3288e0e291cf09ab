import { REQUIRED_FIELDS } from './profile-defaults';
import type { ProfileRecord, ValidationResult } from './types';

function hasValue(value: string | null): boolean {
  return value !== null && value.trim() !== '';
}

function isFilled(profile: ProfileRecord, field: string): boolean {
  switch (field) {
    case 'name':
      return hasValue(profile.name);
    case 'phone':
      return hasValue(profile.phone);
    case 'company':
      return hasValue(profile.company);
    default:
      return true;
  }
}

export function isFieldRequired(profile: ProfileRecord, field: string): boolean {
  return REQUIRED_FIELDS[profile.type].includes(field);
}

/** A profile can be shared once every required field for its type is filled. */
export function isShareReady(profile: ProfileRecord): boolean {
  return REQUIRED_FIELDS[profile.type].every(field => isFilled(profile, field));
}

export function validateProfile(profile: ProfileRecord): ValidationResult {
  const missingFields = REQUIRED_FIELDS[profile.type].filter(field => !isFilled(profile, field));
  const warnings: string[] = [];

  if (!hasValue(profile.email)) {
    warnings.push('Email recommended for better contact options');
  }

  return {
    isValid: missingFields.length === 0,
    missingFields,
    warnings,
    canShare: isShareReady(profile),
  };
}
