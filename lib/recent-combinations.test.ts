import { describe, expect, it } from 'vitest';
import { DEFAULT_AESTHETICS } from './profile-defaults';
import {
  RecentCombinations,
  addRecentCombination,
  combinationFromAesthetics,
  shouldRemember,
} from './recent-combinations';

const red = '#ff0000';
const blue = '#0000ff';
const green = '#00ff00';
const black = '#000000';
const white = '#ffffff';

describe('RecentCombinations', () => {
  it('keeps the three most recent entries, newest first', () => {
    const ring = new RecentCombinations();
    for (const color of ['#000001', '#000002', '#000003', '#000004', '#000005']) {
      ring.add({ primary: color, secondary: white });
    }
    expect(ring.list().map(c => c.primary)).toEqual(['#000005', '#000004', '#000003']);
  });

  it('moves a re-added combination to the front without duplicating it', () => {
    const ring = new RecentCombinations();
    ring.add({ primary: red, secondary: blue });
    ring.add({ background: green, border: black });
    ring.add({ primary: red, secondary: blue });

    expect(ring.list()).toEqual([
      { primary: red, secondary: blue },
      { background: green, border: black },
    ]);
  });

  it('matches on background and border when primary or secondary is missing', () => {
    const ring = new RecentCombinations();
    ring.add({ primary: red, secondary: blue, background: green, border: black });
    ring.add({ primary: red, background: green, border: black });

    expect(ring.list()).toEqual([{ primary: red, background: green, border: black }]);
  });

  it('hands out copies', () => {
    const ring = new RecentCombinations();
    ring.add({ primary: red, secondary: blue });
    ring.list()[0].primary = green;
    expect(ring.list()[0].primary).toBe(red);
  });
});

describe('addRecentCombination', () => {
  it('honours a custom limit', () => {
    const list = addRecentCombination([{ primary: red, secondary: blue }], { primary: green, secondary: blue }, 1);
    expect(list).toEqual([{ primary: green, secondary: blue }]);
  });
});

describe('shouldRemember', () => {
  it('skips the untouched white border with no background', () => {
    expect(shouldRemember(DEFAULT_AESTHETICS.personal)).toBe(false);
  });

  it('remembers a custom border or a solid background', () => {
    expect(shouldRemember(DEFAULT_AESTHETICS.professional)).toBe(true);
    expect(shouldRemember({ ...DEFAULT_AESTHETICS.personal, backgroundColor: black })).toBe(true);
  });
});

describe('combinationFromAesthetics', () => {
  it('copies the four colours', () => {
    expect(combinationFromAesthetics(DEFAULT_AESTHETICS.custom)).toEqual({
      primary: '#9c27b0',
      secondary: '#ba68c8',
      background: '#4a148c',
      border: '#00000000',
    });
  });
});
