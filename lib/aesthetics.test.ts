import { afterEach, describe, expect, it, vi } from 'vitest';
import { clampBlurLevel, clear, keep, mergeAesthetics, set, updatesFromFlags } from './aesthetics';
import type { CardAesthetics } from './types';

const base: CardAesthetics = {
  primaryColor: '#ff6b35',
  secondaryColor: '#ff8e53',
  borderColor: '#ffffff',
  backgroundColor: null,
  blurLevel: 5,
  backgroundImagePath: 'bg.jpg',
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('mergeAesthetics', () => {
  it('returns an equal value when nothing is updated', () => {
    expect(mergeAesthetics(base, {})).toEqual(base);
  });

  it('keeps an absent background while changing blur', () => {
    const merged = mergeAesthetics(base, { blurLevel: 9 });
    expect(merged.blurLevel).toBe(9);
    expect(merged.backgroundColor).toBeNull();
  });

  it('sets, keeps and clears the optional fields', () => {
    const merged = mergeAesthetics(base, {
      backgroundColor: set('#123456'),
      backgroundImagePath: clear(),
    });
    expect(merged.backgroundColor).toBe('#123456');
    expect(merged.backgroundImagePath).toBeNull();

    const kept = mergeAesthetics(merged, { backgroundColor: keep(), backgroundImagePath: keep() });
    expect(kept).toEqual(merged);
  });

  it('does not clamp blur', () => {
    expect(mergeAesthetics(base, { blurLevel: 40 }).blurLevel).toBe(40);
  });

  it('leaves the input untouched', () => {
    const snapshot = { ...base };
    mergeAesthetics(base, { primaryColor: '#000000', backgroundImagePath: clear() });
    expect(base).toEqual(snapshot);
  });
});

describe('updatesFromFlags', () => {
  it('lets a clear flag win over a colour for the same field', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const withColor = { ...base, backgroundColor: '#00ff00' };

    const merged = mergeAesthetics(withColor, updatesFromFlags({ backgroundColor: '#ff0000', clearBackgroundColor: true }));

    expect(merged.backgroundColor).toBeNull();
    expect(warn).toHaveBeenCalledWith('Aesthetics update both sets and clears backgroundColor; clearing wins');
  });

  it('maps plain values to set and missing values to keep', () => {
    expect(updatesFromFlags({ borderColor: '#000000', backgroundImagePath: 'new.jpg' })).toEqual({
      borderColor: '#000000',
      backgroundColor: { kind: 'keep' },
      backgroundImagePath: { kind: 'set', value: 'new.jpg' },
    });
  });

  it('clears the background image without a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const merged = mergeAesthetics(base, updatesFromFlags({ clearBackgroundImage: true }));
    expect(merged.backgroundImagePath).toBeNull();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('clampBlurLevel', () => {
  it('keeps blur within the slider range', () => {
    expect(clampBlurLevel(-3)).toBe(0);
    expect(clampBlurLevel(7.5)).toBe(7.5);
    expect(clampBlurLevel(25)).toBe(18);
    expect(clampBlurLevel(Number.NaN)).toBe(0);
  });
});
