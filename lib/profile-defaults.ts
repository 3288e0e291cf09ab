import type { CardAesthetics, ProfileRecord, ProfileType } from './types';

export const PROFILE_TYPES: ProfileType[] = ['personal', 'professional', 'custom'];

export const PROFILE_TYPE_LABELS: Record<ProfileType, { label: string; description: string }> = {
  personal: { label: 'Personal', description: 'For friends, family & casual connections' },
  professional: { label: 'Professional', description: 'For work, business & networking' },
  custom: { label: 'Custom', description: 'Customizable fields for specific needs' },
};

export const DEFAULT_AESTHETICS: Record<ProfileType, CardAesthetics> = {
  personal: {
    primaryColor: '#ff6b35',
    secondaryColor: '#ff8e53',
    borderColor: '#ffffff',
    backgroundColor: null,
    blurLevel: 12,
    backgroundImagePath: null,
  },
  professional: {
    primaryColor: '#2196f3',
    secondaryColor: '#64b5f6',
    borderColor: '#1976d2',
    backgroundColor: null,
    blurLevel: 8,
    backgroundImagePath: null,
  },
  custom: {
    primaryColor: '#9c27b0',
    secondaryColor: '#ba68c8',
    borderColor: '#00000000',
    backgroundColor: '#4a148c',
    blurLevel: 15,
    backgroundImagePath: null,
  },
};

export const DEFAULT_FIELDS: Record<ProfileType, string[]> = {
  personal: ['name', 'phone', 'email', 'instagram', 'snapchat', 'tiktok'],
  professional: ['name', 'title', 'company', 'phone', 'email', 'linkedin', 'website'],
  custom: ['name', 'phone', 'email'],
};

export const REQUIRED_FIELDS: Record<ProfileType, string[]> = {
  personal: ['name', 'phone'],
  professional: ['name', 'phone', 'company'],
  custom: ['name', 'phone'],
};

export const AVAILABLE_SOCIALS: Record<ProfileType, string[]> = {
  personal: ['instagram', 'snapchat', 'tiktok', 'twitter', 'facebook', 'discord'],
  professional: ['linkedin', 'twitter', 'github', 'behance', 'dribbble'],
  custom: [
    'instagram', 'snapchat', 'tiktok', 'twitter', 'facebook', 'linkedin',
    'github', 'discord', 'behance', 'dribbble', 'youtube', 'twitch',
  ],
};

export function createEmptyProfile(type: ProfileType, now: Date = new Date()): ProfileRecord {
  return {
    id: String(now.getTime()),
    type,
    name: '',
    title: null,
    company: null,
    phone: null,
    email: null,
    website: null,
    socialMedia: {},
    customLinks: [],
    profileImagePath: null,
    cardAesthetics: { ...DEFAULT_AESTHETICS[type] },
    lastUpdated: now.toISOString(),
    isActive: false,
    sharePayload: null,
  };
}

export function copyProfile(profile: ProfileRecord): ProfileRecord {
  return {
    ...profile,
    socialMedia: { ...profile.socialMedia },
    customLinks: profile.customLinks.map(link => ({ ...link })),
    cardAesthetics: { ...profile.cardAesthetics },
  };
}

function blankToNull(value: string | null): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Cleans a profile for storage: trims text, stores empty optional fields as null,
 * and drops blank social handles and links missing a title or URL.
 */
export function normalizeForSave(profile: ProfileRecord): ProfileRecord {
  const socialMedia: Record<string, string> = {};
  for (const [platform, handle] of Object.entries(profile.socialMedia)) {
    const trimmed = handle.trim();
    if (trimmed !== '') socialMedia[platform] = trimmed;
  }

  return {
    ...copyProfile(profile),
    name: profile.name.trim(),
    title: blankToNull(profile.title),
    company: blankToNull(profile.company),
    phone: blankToNull(profile.phone),
    email: blankToNull(profile.email),
    website: blankToNull(profile.website),
    socialMedia,
    customLinks: profile.customLinks
      .map(link => ({ title: link.title.trim(), url: link.url.trim() }))
      .filter(link => link.title !== '' && link.url !== ''),
    profileImagePath: blankToNull(profile.profileImagePath),
    cardAesthetics: {
      ...profile.cardAesthetics,
      backgroundImagePath: blankToNull(profile.cardAesthetics.backgroundImagePath),
    },
  };
}
