import { describe, expect, it } from 'vitest';
import { changedFields, isDirty } from './change-detector';
import { copyProfile, createEmptyProfile } from './profile-defaults';
import type { ProfileRecord } from './types';

function profile(overrides: Partial<ProfileRecord> = {}): ProfileRecord {
  return {
    ...createEmptyProfile('professional', new Date('2026-01-01T00:00:00Z')),
    name: 'Alice',
    title: 'Engineer',
    phone: '555-0100',
    socialMedia: { linkedin: 'alice' },
    customLinks: [{ title: 'Blog', url: 'https://example.com/blog' }],
    ...overrides,
  };
}

describe('isDirty', () => {
  it('is false for identical records', () => {
    const a = profile();
    expect(isDirty(a, copyProfile(a))).toBe(false);
  });

  it('detects a scalar change from either side', () => {
    const base = profile();
    const edited = profile({ company: 'Initech' });
    expect(isDirty(edited, base)).toBe(true);
    expect(isDirty(base, edited)).toBe(true);
  });

  it('treats an empty title and a missing title as the same', () => {
    expect(isDirty(profile({ title: '' }), profile({ title: null }))).toBe(false);
    expect(isDirty(profile({ title: '   ' }), profile({ title: null }))).toBe(false);
  });

  it('compares text after trimming', () => {
    expect(isDirty(profile({ name: '  Alice ' }), profile())).toBe(false);
  });

  it('ignores bookkeeping fields', () => {
    const a = profile();
    const b = { ...copyProfile(a), lastUpdated: '2026-05-01T00:00:00.000Z', sharePayload: '{}', isActive: true };
    expect(isDirty(a, b)).toBe(false);
  });

  it('treats an absent background colour as different from any colour', () => {
    const none = profile();
    const black = profile({ cardAesthetics: { ...none.cardAesthetics, backgroundColor: '#000000' } });
    expect(isDirty(black, none)).toBe(true);
    expect(isDirty(none, copyProfile(none))).toBe(false);
  });

  it('detects a social handle that exists on one side only', () => {
    expect(isDirty(profile({ socialMedia: { linkedin: 'alice', github: 'alice' } }), profile())).toBe(true);
    expect(isDirty(profile({ socialMedia: {} }), profile())).toBe(true);
  });

  it('treats a blank social handle like a missing one', () => {
    expect(isDirty(profile({ socialMedia: { linkedin: 'alice', github: '' } }), profile())).toBe(false);
  });

  it('detects custom link count and content changes', () => {
    const twoLinks = profile({
      customLinks: [
        { title: 'Blog', url: 'https://example.com/blog' },
        { title: 'Shop', url: 'https://example.com/shop' },
      ],
    });
    expect(isDirty(twoLinks, profile())).toBe(true);
    expect(isDirty(profile({ customLinks: [{ title: 'Blog', url: 'https://example.com/new' }] }), profile())).toBe(true);
  });
});

describe('changedFields', () => {
  it('lists every difference in a fixed order', () => {
    const base = profile();
    const edited = profile({
      name: 'Alice Smith',
      email: 'alice@example.com',
      profileImagePath: 'avatar.jpg',
      socialMedia: { linkedin: 'alice-smith', github: 'alice' },
      customLinks: [{ title: 'Writing', url: 'https://example.com/blog' }, { title: 'Shop', url: 'https://example.com/shop' }],
      cardAesthetics: { ...base.cardAesthetics, blurLevel: 4, primaryColor: '#000000', backgroundImagePath: 'bg.jpg' },
    });

    expect(changedFields(edited, base)).toEqual([
      'name',
      'email',
      'profileImagePath',
      'cardAesthetics.backgroundImagePath',
      'cardAesthetics.blurLevel',
      'cardAesthetics.primaryColor',
      'socialMedia.github',
      'socialMedia.linkedin',
      'customLinks.length',
      'customLinks[0].title',
    ]);
  });

  it('reports border and secondary colour changes', () => {
    const base = profile();
    const edited = profile({
      cardAesthetics: { ...base.cardAesthetics, secondaryColor: '#00ff00', borderColor: '#0000ff' },
    });

    expect(changedFields(edited, base)).toEqual(['cardAesthetics.secondaryColor', 'cardAesthetics.borderColor']);
    expect(isDirty(edited, base)).toBe(true);
  });

  it('reports a background colour replaced or cleared', () => {
    const base = profile();
    const dark = profile({ cardAesthetics: { ...base.cardAesthetics, backgroundColor: '#111111' } });
    const darker = profile({ cardAesthetics: { ...base.cardAesthetics, backgroundColor: '#222222' } });
    const cleared = profile({ cardAesthetics: { ...base.cardAesthetics, backgroundColor: null } });

    expect(changedFields(darker, dark)).toEqual(['cardAesthetics.backgroundColor']);
    expect(changedFields(cleared, dark)).toEqual(['cardAesthetics.backgroundColor']);
    expect(isDirty(cleared, dark)).toBe(true);
  });

  it('is empty when nothing changed', () => {
    const a = profile();
    expect(changedFields(a, copyProfile(a))).toEqual([]);
  });
});
