import type { ProfileRecord } from './types';

const TEXT_FIELDS = ['name', 'title', 'company', 'phone', 'email', 'website'] as const;

/** `null`, `undefined` and blank strings all mean "no value". */
function normalize(value: string | null | undefined): string {
  return (value ?? '').trim();
}

/**
 * Lists every user-visible difference between a draft and its snapshot, as
 * field paths. Order is fixed, so the result is stable for display.
 */
export function changedFields(current: ProfileRecord, initial: ProfileRecord): string[] {
  const changes: string[] = [];

  for (const field of TEXT_FIELDS) {
    if (normalize(current[field]) !== normalize(initial[field])) changes.push(field);
  }

  if (normalize(current.profileImagePath) !== normalize(initial.profileImagePath)) {
    changes.push('profileImagePath');
  }

  const a = current.cardAesthetics;
  const b = initial.cardAesthetics;
  if (normalize(a.backgroundImagePath) !== normalize(b.backgroundImagePath)) {
    changes.push('cardAesthetics.backgroundImagePath');
  }
  if (a.blurLevel !== b.blurLevel) changes.push('cardAesthetics.blurLevel');
  if (a.primaryColor !== b.primaryColor) changes.push('cardAesthetics.primaryColor');
  if (a.secondaryColor !== b.secondaryColor) changes.push('cardAesthetics.secondaryColor');
  if (a.borderColor !== b.borderColor) changes.push('cardAesthetics.borderColor');
  // null only equals null; it never matches a concrete colour
  if ((a.backgroundColor ?? null) !== (b.backgroundColor ?? null)) {
    changes.push('cardAesthetics.backgroundColor');
  }

  const platforms = new Set([...Object.keys(current.socialMedia), ...Object.keys(initial.socialMedia)]);
  for (const platform of [...platforms].sort()) {
    if (normalize(current.socialMedia[platform]) !== normalize(initial.socialMedia[platform])) {
      changes.push(`socialMedia.${platform}`);
    }
  }

  if (current.customLinks.length !== initial.customLinks.length) {
    changes.push('customLinks.length');
  }
  const shared = Math.min(current.customLinks.length, initial.customLinks.length);
  for (let i = 0; i < shared; i++) {
    if (normalize(current.customLinks[i].title) !== normalize(initial.customLinks[i].title)) {
      changes.push(`customLinks[${i}].title`);
    }
    if (normalize(current.customLinks[i].url) !== normalize(initial.customLinks[i].url)) {
      changes.push(`customLinks[${i}].url`);
    }
  }

  return changes;
}

export function isDirty(current: ProfileRecord, initial: ProfileRecord): boolean {
  return changedFields(current, initial).length > 0;
}
